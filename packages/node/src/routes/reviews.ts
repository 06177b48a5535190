/**
 * Review workflow routes.
 *
 * POST /api/v1/reviews                     : Open a review request
 * POST /api/v1/reviews/:requestId/fulfill  : Record a reviewer's outcome
 * plus the shared read and cancel routes (see requests.ts)
 */

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { CreateReviewSchema, FulfillReviewSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { callerOf } from "../middleware/auth.js";
import { bytes32Param } from "./params.js";
import { mountRequestRoutes } from "./requests.js";

const ReviewStatusSchema = z.enum(["pending", "cancelled", "fulfilled"]);

export function createReviewRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateReviewSchema), (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");
    const tokenStrategy = service.tokenStrategy(body.tokenStrategy);

    const request = service.reviews.requestReview(callerOf(c), {
      domainKey: body.domainKey,
      params: { focus: body.focus },
      ...(body.correlationToken !== undefined ? { correlationToken: body.correlationToken } : {}),
      ...(tokenStrategy !== undefined ? { tokenStrategy } : {}),
    });
    return c.json({ data: request }, 201);
  });

  routes.post("/:requestId/fulfill", validateBody(FulfillReviewSchema), (c) => {
    const { reviews } = c.get("service");
    const body = c.req.valid("json");
    const result = reviews.fulfillReview(
      callerOf(c),
      body.identityId,
      bytes32Param(c.req.param("requestId").toLowerCase(), "requestId"),
      body.domainKey,
      { summary: body.summary, comments: body.comments, approved: body.approved },
    );
    return c.json({ data: result });
  });

  mountRequestRoutes(routes, (service) => service.reviews, ReviewStatusSchema);

  return routes;
}
