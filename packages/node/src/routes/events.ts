/**
 * Event feed routes.
 *
 * GET /api/v1/events?fromPosition=&maxCount= : Global event log, oldest first
 *
 * Bridges poll this feed for request notifications.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const events = service.readEvents(queryResult.data);
    return c.json({ data: events });
  });

  return routes;
}
