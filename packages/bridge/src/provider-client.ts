/**
 * JSON-RPC client for agent providers.
 *
 * A provider is an agent service reached at `<endpoint>/mcp`. Each call
 * is a JSON-RPC 2.0 `tools/call` carrying the correlation token both as
 * the `X-Trace-Id` header and as the tool's `trace_id` argument. The
 * tool's answer is JSON text inside `result.content[0].text`.
 */

import { z } from "zod";
import { BridgeError } from "./errors.js";

// =============================================================================
// Tool results
// =============================================================================

export const ReviewVerdictSchema = z.object({
  summary: z.unknown().default(""),
  comments: z.array(z.unknown()).default([]),
  approved: z.boolean().default(false),
});

export const ApprovalVerdictSchema = z.object({
  decision: z.enum(["approved", "needs_revision", "rejected"]),
  reason: z.unknown().default(""),
  unresolved_blockers: z.array(z.unknown()).default([]),
});

export type ReviewVerdict = z.infer<typeof ReviewVerdictSchema>;
export type ApprovalVerdict = z.infer<typeof ApprovalVerdictSchema>;

const RpcResponseSchema = z.object({
  error: z.unknown().optional(),
  result: z
    .object({
      content: z.array(z.object({ text: z.string().optional() })).optional(),
    })
    .optional(),
});

export interface ReviewCall {
  readonly prId: string;
  readonly traceId: string;
  readonly focus: readonly string[];
}

export interface ApprovalCall {
  readonly prId: string;
  readonly traceId: string;
  readonly reviewerAgent?: string | undefined;
}

export interface ProviderClientConfig {
  /** Per-call timeout. Default: 30000 */
  readonly timeoutMs?: number;

  /** Custom fetch, for tests */
  readonly fetchFn?: typeof fetch;
}

// =============================================================================
// Client
// =============================================================================

export class ProviderClient {
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private nextId = 1;

  constructor(config: ProviderClientConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async reviewPr(endpoint: string, call: ReviewCall): Promise<ReviewVerdict> {
    const args: Record<string, unknown> = { pr_id: call.prId, trace_id: call.traceId };
    if (call.focus.length > 0) args["focus"] = call.focus;

    const text = await this.callTool(endpoint, "review_pr", args, call.traceId);
    return parseVerdict(ReviewVerdictSchema, text, "review_pr");
  }

  async approvePr(endpoint: string, call: ApprovalCall): Promise<ApprovalVerdict> {
    const args: Record<string, unknown> = { pr_id: call.prId, trace_id: call.traceId };
    if (call.reviewerAgent !== undefined && call.reviewerAgent !== "") {
      args["reviewer_agent"] = call.reviewerAgent;
    }

    const text = await this.callTool(endpoint, "approve_pr", args, call.traceId);
    return parseVerdict(ApprovalVerdictSchema, text, "approve_pr");
  }

  /**
   * Invoke a tool and return the raw JSON text of its first content item.
   */
  async callTool(
    endpoint: string,
    name: string,
    args: Record<string, unknown>,
    traceId: string,
  ): Promise<string> {
    const url = `${endpoint.replace(/\/+$/, "")}/mcp`;
    const body = {
      jsonrpc: "2.0",
      id: this.nextId++,
      method: "tools/call",
      params: { name, arguments: args },
    };

    const response = await this.fetchWithTimeout(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "X-Trace-Id": traceId,
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      throw new BridgeError(
        response.status >= 500 ? "SERVER_ERROR" : "CLIENT_ERROR",
        `Provider ${endpoint} answered HTTP ${response.status}`,
        response.status,
      );
    }

    const parsed = RpcResponseSchema.safeParse(await readJson(response));
    if (!parsed.success) {
      throw new BridgeError("INVALID_PROVIDER_RESPONSE", `Malformed JSON-RPC response from ${endpoint}`);
    }
    if (parsed.data.error !== undefined && parsed.data.error !== null) {
      throw new BridgeError(
        "PROVIDER_ERROR",
        `Provider error from ${name}: ${JSON.stringify(parsed.data.error)}`,
        response.status,
        parsed.data.error,
      );
    }

    const text = parsed.data.result?.content?.[0]?.text;
    if (text === undefined || text === "") {
      throw new BridgeError("INVALID_PROVIDER_RESPONSE", `Empty result from ${name}`);
    }
    return text;
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.fetchFn(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new BridgeError("TIMEOUT", `Provider call timed out after ${this.timeoutMs}ms`);
      }
      throw new BridgeError(
        "NETWORK_ERROR",
        error instanceof Error ? error.message : "Network error",
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseVerdict<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  text: string,
  tool: string,
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new BridgeError("INVALID_PROVIDER_RESPONSE", `${tool} returned non-JSON text`);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new BridgeError(
      "INVALID_PROVIDER_RESPONSE",
      `${tool} returned an unexpected shape`,
      0,
      result.error.issues,
    );
  }
  return result.data;
}
