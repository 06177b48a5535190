/**
 * Execution trace routes.
 *
 * GET /api/v1/traces/:token         : Every hop recorded for a correlation token
 * GET /api/v1/traces/:token/summary : Aggregated view of the same hops
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { bytes32Param } from "./params.js";

export function createTraceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:token", (c) => {
    const { traces } = c.get("service");
    const token = bytes32Param(c.req.param("token").toLowerCase(), "token");
    const hops = traces.getTrace(token);
    return c.json({ data: { correlationToken: token, hopCount: hops.length, hops } });
  });

  routes.get("/:token/summary", (c) => {
    const { traces } = c.get("service");
    const token = bytes32Param(c.req.param("token").toLowerCase(), "token");
    return c.json({ data: traces.summarizeTrace(token) });
  });

  return routes;
}
