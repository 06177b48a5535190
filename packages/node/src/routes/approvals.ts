/**
 * Approval workflow routes.
 *
 * POST /api/v1/approvals                            : Open an approval request
 * POST /api/v1/approvals/:requestId/approve         : Approve
 * POST /api/v1/approvals/:requestId/needs-revision  : Send back with blockers
 * POST /api/v1/approvals/:requestId/reject          : Reject
 * plus the shared read and cancel routes (see requests.ts)
 */

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateApprovalSchema,
  DecideApprovalSchema,
  NeedsRevisionSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { callerOf } from "../middleware/auth.js";
import { bytes32Param } from "./params.js";
import { mountRequestRoutes } from "./requests.js";

const ApprovalStatusSchema = z.enum([
  "pending",
  "cancelled",
  "approved",
  "needs_revision",
  "rejected",
]);

export function createApprovalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateApprovalSchema), (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");
    const tokenStrategy = service.tokenStrategy(body.tokenStrategy);

    const request = service.approvals.requestApproval(callerOf(c), {
      domainKey: body.domainKey,
      params: body.reviewerEndpoint !== undefined ? { reviewerEndpoint: body.reviewerEndpoint } : {},
      ...(body.correlationToken !== undefined ? { correlationToken: body.correlationToken } : {}),
      ...(tokenStrategy !== undefined ? { tokenStrategy } : {}),
    });
    return c.json({ data: request }, 201);
  });

  routes.post("/:requestId/approve", validateBody(DecideApprovalSchema), (c) => {
    const { approvals } = c.get("service");
    const body = c.req.valid("json");
    const result = approvals.approve(
      callerOf(c),
      body.identityId,
      bytes32Param(c.req.param("requestId").toLowerCase(), "requestId"),
      body.domainKey,
      body.reason,
    );
    return c.json({ data: result });
  });

  routes.post("/:requestId/needs-revision", validateBody(NeedsRevisionSchema), (c) => {
    const { approvals } = c.get("service");
    const body = c.req.valid("json");
    const result = approvals.needsRevision(
      callerOf(c),
      body.identityId,
      bytes32Param(c.req.param("requestId").toLowerCase(), "requestId"),
      body.domainKey,
      body.reason,
      body.unresolvedBlockers,
    );
    return c.json({ data: result });
  });

  routes.post("/:requestId/reject", validateBody(DecideApprovalSchema), (c) => {
    const { approvals } = c.get("service");
    const body = c.req.valid("json");
    const result = approvals.reject(
      callerOf(c),
      body.identityId,
      bytes32Param(c.req.param("requestId").toLowerCase(), "requestId"),
      body.domainKey,
      body.reason,
    );
    return c.json({ data: result });
  });

  mountRequestRoutes(routes, (service) => service.approvals, ApprovalStatusSchema);

  return routes;
}
