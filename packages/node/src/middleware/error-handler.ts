/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response. Protocol and event store codes
 * map to fixed statuses; anything unrecognized is a 500.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<string, ContentfulStatusCode> = {
  // Protocol errors
  UNKNOWN_ENTITY: 404,
  INVALID_STATE: 409,
  DOMAIN_KEY_MISMATCH: 422,
  UNAUTHORIZED: 403,
  RESERVED_KEY_VIOLATION: 422,
  EXPIRED_OR_INVALID_PROOF: 422,
  EMPTY_HANDLE: 400,
  INVALID_INPUT: 400,

  // Event store errors
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,

  VALIDATION_ERROR: 400,
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof ApiError) {
    return c.json(createErrorEnvelope(err.code, err.message, err.details), err.status);
  }

  if (err instanceof HTTPException) {
    const code = err.status === 400 ? "VALIDATION_ERROR" : "HTTP_ERROR";
    return c.json(createErrorEnvelope(code, err.message), err.status);
  }

  const code = errorCode(err);
  const status = (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;

  // Don't leak internal details
  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }
  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
}
