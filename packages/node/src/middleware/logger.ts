/**
 * Request logging middleware.
 *
 * Emits one pino line per request with method, path, status, duration,
 * request id and, when known, the acting principal.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly principal?: string | undefined;
}

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      principal: c.get("auth")?.principal,
    };

    const line = `${entry.method} ${entry.path} ${entry.status}`;
    if (entry.status >= 500) {
      logger.error(entry, line);
    } else {
      logger.info(entry, line);
    }
  };
}
