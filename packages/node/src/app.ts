/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Tests create the
 * app here without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { ProtocolService } from "./services/protocol-service.js";
import type { ProtocolServiceConfig } from "./services/protocol-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import {
  authMiddleware,
  methodPermissionGuard,
  unsecuredAuthMiddleware,
} from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createIdentityRoutes, createOperatorRoutes } from "./routes/identities.js";
import { createReviewRoutes } from "./routes/reviews.js";
import { createApprovalRoutes } from "./routes/approvals.js";
import { createTraceRoutes } from "./routes/traces.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Prebuilt service; otherwise one is built from `serviceConfig` */
  readonly service?: ProtocolService;
  readonly serviceConfig?: ProtocolServiceConfig;
  readonly logger?: Logger;
  /** Auth configuration. When provided, API keys are required. */
  readonly auth?: AuthConfig;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ProtocolService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = options.service ?? buildService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logger !== undefined) {
    app.use("*", loggerMiddleware(options.logger));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    app.use("/api/*", unsecuredAuthMiddleware());
  }
  app.use("/api/*", methodPermissionGuard());

  app.route("/api/v1/identities", createIdentityRoutes());
  app.route("/api/v1/operators", createOperatorRoutes());
  app.route("/api/v1/reviews", createReviewRoutes());
  app.route("/api/v1/approvals", createApprovalRoutes());
  app.route("/api/v1/traces", createTraceRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}

function buildService(config: ProtocolServiceConfig | undefined): ProtocolService {
  if (config === undefined) {
    throw new Error("createApp needs either a service or a serviceConfig");
  }
  return new ProtocolService(config);
}
