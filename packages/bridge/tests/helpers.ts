/**
 * Shared fixtures for bridge tests: fetch stand-ins and a captured logger.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Address } from "@tracebound/types";

export const REQUESTER: Address = "0x1000000000000000000000000000000000000001";
export const REVIEWER: Address = "0x2000000000000000000000000000000000000002";
export const APPROVER: Address = "0x3000000000000000000000000000000000000003";
export const REVIEW_AUTHORITY: Address = "0x4000000000000000000000000000000000000004";
export const APPROVAL_AUTHORITY: Address = "0x5000000000000000000000000000000000000005";
export const OTHER_AUTHORITY: Address = "0x6000000000000000000000000000000000000006";

export const clock = (): Date => new Date("2026-01-01T00:00:00.000Z");

export const NO_WAIT_RETRY = {
  maxAttempts: 3,
  baseDelayMs: 10,
  maxDelayMs: 100,
  jitterMs: 0,
} as const;

export interface LogLine {
  readonly msg?: string;
  readonly level?: number;
  readonly [key: string]: unknown;
}

export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write: (line: string) => {
        lines.push(JSON.parse(line));
      },
    },
  );
  return { logger, lines };
}

export function messages(lines: readonly LogLine[]): string[] {
  return lines.map((l) => l.msg ?? "");
}

// =============================================================================
// Fetch stand-ins
// =============================================================================

export interface RecordedCall {
  readonly url: string;
  readonly method: string;
  readonly headers: Headers;
  readonly body: unknown;
}

type Reply = { status: number; body: unknown } | Error;

function urlOf(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * A fetch that answers from `reply` and records each call.
 */
export function recordingFetch(
  reply: (call: RecordedCall, index: number) => Reply,
): { fetchFn: typeof fetch; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchFn: typeof fetch = async (input, init) => {
    const call: RecordedCall = {
      url: urlOf(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    };
    calls.push(call);

    const answer = reply(call, calls.length - 1);
    if (answer instanceof Error) throw answer;
    return new Response(JSON.stringify(answer.body), {
      status: answer.status,
      headers: { "Content-Type": "application/json" },
    });
  };
  return { fetchFn, calls };
}

/** A JSON-RPC tools/call reply whose tool result is `value`. */
export function toolResult(value: unknown): { status: number; body: unknown } {
  return {
    status: 200,
    body: {
      jsonrpc: "2.0",
      id: 1,
      result: { content: [{ type: "text", text: JSON.stringify(value) }] },
    },
  };
}

/** Read the tool name and arguments out of a recorded JSON-RPC call. */
export function toolCall(call: RecordedCall): { name: unknown; args: unknown } {
  const body = call.body;
  if (body === null || typeof body !== "object" || !("params" in body)) {
    return { name: undefined, args: undefined };
  }
  const params = body.params;
  if (params === null || typeof params !== "object") {
    return { name: undefined, args: undefined };
  }
  return {
    name: "name" in params ? params.name : undefined,
    args: "arguments" in params ? params.arguments : undefined,
  };
}

export function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
