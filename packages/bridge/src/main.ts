/**
 * Bridge entry point.
 *
 * Polls a node's notification feed, asks the configured providers for
 * verdicts and submits fulfillments through the node's API.
 */

import pino from "pino";
import { EndpointPool } from "./endpoint-pool.js";
import { ApprovalBridge, ReviewBridge } from "./bridge.js";
import type { WorkflowBridgeOptions } from "./bridge.js";
import { loadBridgeConfig } from "./config.js";
import { HttpNodeClient, PollingEventSource } from "./node-client.js";
import { ProviderClient } from "./provider-client.js";

async function main(): Promise<void> {
  const config = loadBridgeConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const node = new HttpNodeClient({ baseUrl: config.NODE_URL, apiKey: config.API_KEY });
  const source = new PollingEventSource({
    feed: node,
    intervalMs: config.POLL_INTERVAL_MS,
    batchSize: config.POLL_BATCH_SIZE,
    fromPosition: config.FROM_POSITION,
    onError: (err) => logger.error({ err }, "Polling the node failed"),
  });

  const options: WorkflowBridgeOptions = {
    source,
    authority: config.ENGINE_ADDRESS,
    identityId: config.IDENTITY_ID,
    provider: new ProviderClient({ timeoutMs: config.PROVIDER_TIMEOUT_MS }),
    endpoints: new EndpointPool(config.PROVIDER_ENDPOINTS),
    logger,
  };

  const bridge =
    config.BRIDGE_KIND === "review"
      ? new ReviewBridge({ ...options, target: node })
      : new ApprovalBridge({ ...options, target: node });

  bridge.start();
  logger.info(
    { kind: config.BRIDGE_KIND, node: config.NODE_URL, providers: config.PROVIDER_ENDPOINTS.length },
    "Bridge started",
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    bridge.stop();
    await bridge.drain();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
