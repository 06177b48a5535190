/**
 * Read and cancel routes shared by both workflow kinds.
 *
 * GET  /                     : List requests (?status=)
 * GET  /outcomes/:domainKey  : Latest result recorded for a domain key
 * GET  /by-token/:token      : Requests carrying a correlation token
 * GET  /:requestId           : Get one request
 * GET  /:requestId/result    : Result of a decided request
 * POST /:requestId/cancel    : Cancel a pending request (requester only)
 */

import type { Hono } from "hono";
import { z } from "zod";
import type { ZodType, ZodTypeDef } from "zod";
import type { WorkflowEngine, WorkflowStatus } from "@tracebound/workflow";
import type { AppEnv } from "../types/api-contract.js";
import type { ProtocolService } from "../services/protocol-service.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";
import { callerOf } from "../middleware/auth.js";
import { formatZodErrors } from "../middleware/validate.js";
import { bytes32Param } from "./params.js";

export function mountRequestRoutes<
  TTerminal extends string,
  TParams extends object,
  TOutcome extends object,
>(
  routes: Hono<AppEnv>,
  engineOf: (service: ProtocolService) => WorkflowEngine<TTerminal, TParams, TOutcome>,
  statusSchema: ZodType<WorkflowStatus<TTerminal>, ZodTypeDef, unknown>,
): void {
  const ListQuerySchema = z.object({ status: statusSchema.optional() });

  routes.get("/", (c) => {
    const query = ListQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(query.error),
        }),
        400,
      );
    }
    const requests = engineOf(c.get("service")).listRequests(query.data.status);
    return c.json({ data: requests });
  });

  routes.get("/outcomes/:domainKey", (c) => {
    const domainKey = c.req.param("domainKey");
    const result = engineOf(c.get("service")).getLatestOutcome(domainKey);
    if (result === undefined) {
      throw new ApiError("UNKNOWN_ENTITY", `No outcome recorded for "${domainKey}"`, 404);
    }
    return c.json({ data: result });
  });

  routes.get("/by-token/:token", (c) => {
    const token = bytes32Param(c.req.param("token").toLowerCase(), "token");
    return c.json({ data: engineOf(c.get("service")).listByCorrelationToken(token) });
  });

  routes.get("/:requestId", (c) => {
    const requestId = bytes32Param(c.req.param("requestId").toLowerCase(), "requestId");
    return c.json({ data: engineOf(c.get("service")).getRequest(requestId) });
  });

  routes.get("/:requestId/result", (c) => {
    const requestId = bytes32Param(c.req.param("requestId").toLowerCase(), "requestId");
    const engine = engineOf(c.get("service"));
    // Unknown request ids surface as UNKNOWN_ENTITY from the engine.
    engine.getRequest(requestId);
    const result = engine.getResult(requestId);
    if (result === undefined) {
      throw new ApiError("UNKNOWN_ENTITY", `Request ${requestId} has no result yet`, 404);
    }
    return c.json({ data: result });
  });

  routes.post("/:requestId/cancel", (c) => {
    const requestId = bytes32Param(c.req.param("requestId").toLowerCase(), "requestId");
    const request = engineOf(c.get("service")).cancel(callerOf(c), requestId);
    return c.json({ data: request });
  });
}
