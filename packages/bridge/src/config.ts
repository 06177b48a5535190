/**
 * Bridge configuration, loaded from environment variables with Zod.
 */

import { z } from "zod";
import { getAddress, isAddress } from "viem";
import type { Address } from "@tracebound/types";

const address = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), "Expected a 0x-prefixed 20-byte address")
  .transform((v): Address => getAddress(v));

export const BridgeConfigSchema = z.object({
  BRIDGE_KIND: z.enum(["review", "approval"]),
  NODE_URL: z.string().url().default("http://localhost:3000"),
  API_KEY: z.string().optional(),

  /** Identity the bridge fulfills as */
  IDENTITY_ID: z.coerce.number().int().positive(),

  /** Authority of the engine instance to serve */
  ENGINE_ADDRESS: address,

  /** Comma-separated provider base URLs */
  PROVIDER_ENDPOINTS: z
    .string()
    .transform((v) => v.split(",").map((e) => e.trim()).filter((e) => e !== ""))
    .refine((v) => v.length > 0, "At least one provider endpoint is required"),

  POLL_INTERVAL_MS: z.coerce.number().int().min(50).default(1000),

  /** Feed position to start from; earlier notifications are never read */
  FROM_POSITION: z.coerce.number().int().positive().default(1),
  POLL_BATCH_SIZE: z.coerce.number().int().min(1).max(1000).default(100),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().min(100).default(30000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

/**
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadBridgeConfig(
  env: Record<string, string | undefined> = process.env,
): BridgeConfig {
  return BridgeConfigSchema.parse(env);
}
