/**
 * Test helpers for @tracebound/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import { z } from "zod";
import type { ZodType, ZodTypeDef } from "zod";
import { InMemoryEventStore } from "@tracebound/event-store";
import { isBytes32 } from "@tracebound/types";
import type { Address, Bytes32 } from "@tracebound/types";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";
import { ProtocolService } from "../src/services/protocol-service.js";
import type { ProtocolServiceConfig } from "../src/services/protocol-service.js";

export const REQUESTER: Address = "0x1000000000000000000000000000000000000001";
export const REVIEWER: Address = "0x2000000000000000000000000000000000000002";
export const APPROVER: Address = "0x3000000000000000000000000000000000000003";
export const REVIEW_AUTHORITY: Address = "0x4000000000000000000000000000000000000004";
export const APPROVAL_AUTHORITY: Address = "0x5000000000000000000000000000000000000005";
export const STRANGER: Address = "0x6000000000000000000000000000000000000006";
export const REGISTRY: Address = "0x9000000000000000000000000000000000000009";

export const clock = (): Date => new Date("2026-01-01T00:00:00.000Z");
export const NOW = Math.floor(clock().getTime() / 1000);

export function testServiceConfig(
  overrides: Partial<ProtocolServiceConfig> = {},
): ProtocolServiceConfig {
  return {
    chainId: 31337,
    registryAddress: REGISTRY,
    reviewAuthority: REVIEW_AUTHORITY,
    approvalAuthority: APPROVAL_AUTHORITY,
    clock,
    store: new InMemoryEventStore({ clock }),
    ...overrides,
  };
}

/**
 * Create a test app with an in-memory service and no request logging.
 */
export function createTestApp(
  options: Omit<CreateAppOptions, "service" | "serviceConfig"> = {},
): AppInstance {
  return createApp({ ...options, service: new ProtocolService(testServiceConfig()) });
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export interface TestResponse {
  readonly status: number;
  readonly body: unknown;
}

/**
 * Send a request acting as `as` (via X-Principal) and read the JSON body.
 */
export async function send(
  instance: AppInstance,
  method: string,
  path: string,
  options: { as?: Address; body?: unknown; headers?: Record<string, string> } = {},
): Promise<TestResponse> {
  const headers: Record<string, string> = {
    ...(options.as !== undefined ? { "X-Principal": options.as } : {}),
    ...options.headers,
  };
  const res = await instance.app.request(jsonRequest(path, method, options.body, headers));
  const body: unknown = await res.json();
  return { status: res.status, body };
}

/** Parse the `data` member of a success response. */
export function dataOf<T>(schema: ZodType<T, ZodTypeDef, unknown>, response: TestResponse): T {
  return z.object({ data: schema }).parse(response.body).data;
}

export const RequestRef = z.object({
  requestId: z.custom<Bytes32>(isBytes32),
  correlationToken: z.custom<Bytes32>(isBytes32),
  status: z.string(),
});

/**
 * Register REVIEWER and APPROVER as identities 1 and 2, each bound to
 * its engine.
 */
export async function registerWorkers(instance: AppInstance): Promise<void> {
  await send(instance, "POST", "/api/v1/identities", {
    as: REVIEWER,
    body: { boundAuthority: REVIEW_AUTHORITY },
  });
  await send(instance, "POST", "/api/v1/identities", {
    as: APPROVER,
    body: { boundAuthority: APPROVAL_AUTHORITY },
  });
}
