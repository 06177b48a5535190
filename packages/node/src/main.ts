/**
 * @tracebound/node: Entry point.
 *
 * Loads config, replays the event log, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let auth: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    auth = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured; callers are taken from the X-Principal header");
  }

  const { app, service } = createApp({
    serviceConfig: {
      chainId: config.CHAIN_ID,
      registryAddress: config.REGISTRY_ADDRESS,
      reviewAuthority: config.REVIEW_ENGINE_ADDRESS,
      approvalAuthority: config.APPROVAL_ENGINE_ADDRESS,
      traceEnabled: config.TRACE_ENABLED,
      maxDeadlineDelaySeconds: config.PROOF_MAX_DEADLINE_SECONDS,
      dataDir: config.DATA_DIR,
    },
    logger,
    ...(auth !== undefined ? { auth } : {}),
  });

  logger.info(
    {
      replayedEvents: service.replayedEvents,
      reviewAuthority: service.reviews.authority,
      approvalAuthority: service.approvals.authority,
      persistent: config.DATA_DIR !== undefined,
    },
    "Event log replayed",
  );

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Node started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
