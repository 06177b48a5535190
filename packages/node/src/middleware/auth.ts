/**
 * Authentication middleware.
 *
 * Secured mode: X-Api-Key header → looked up in the configured key
 * registry, which fixes both the role and the principal.
 * Unsecured mode (no keys configured, tests and development): the
 * principal comes from the X-Principal header and every caller is admin.
 *
 * On success, sets `c.set("auth", authContext)`.
 */

import { getAddress, isAddress } from "viem";
import type { Context, MiddlewareHandler } from "hono";
import type { Address } from "@tracebound/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";

export const PRINCIPAL_HEADER = "X-Principal";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

// =============================================================================
// Auth Middleware
// =============================================================================

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("AUTHENTICATION_REQUIRED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("AUTHENTICATION_REQUIRED", "Invalid API key"),
        401,
      );
    }

    c.set("auth", { type: "api-key", principal: record.principal, role: record.role });
    return next();
  };
}

export function unsecuredAuthMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(PRINCIPAL_HEADER);
    let auth: AuthContext = { type: "anonymous", role: "admin" };

    if (header !== undefined) {
      if (!isAddress(header, { strict: false })) {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", `${PRINCIPAL_HEADER} is not an address`),
          400,
        );
      }
      auth = { type: "header", principal: getAddress(header), role: "admin" };
    }

    c.set("auth", auth);
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Reads need `read`; everything else needs `write`.
 * Must run AFTER an auth middleware.
 */
export function methodPermissionGuard(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const permission: Permission = c.req.method === "GET" ? "read" : "write";
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}

/**
 * The principal the current request acts as.
 *
 * @throws ApiError AUTHENTICATION_REQUIRED for anonymous callers
 */
export function callerOf(c: Context<AppEnv>): Address {
  const principal = c.get("auth").principal;
  if (principal === undefined) {
    throw new ApiError(
      "AUTHENTICATION_REQUIRED",
      `This operation needs a caller; send ${PRINCIPAL_HEADER}`,
      401,
    );
  }
  return principal;
}
