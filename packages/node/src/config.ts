/**
 * @tracebound/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { getAddress, isAddress } from "viem";
import type { Address } from "@tracebound/types";

// =============================================================================
// Schema
// =============================================================================

const address = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), "Expected a 0x-prefixed 20-byte address")
  .transform((v): Address => getAddress(v));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Identity registry
  CHAIN_ID: z.coerce.number().int().positive().default(31337),
  REGISTRY_ADDRESS: address.default("0x0000000000000000000000000000000000000e01"),
  PROOF_MAX_DEADLINE_SECONDS: z.coerce.number().int().positive().default(300),

  // Engine instances
  REVIEW_ENGINE_ADDRESS: address.default("0x0000000000000000000000000000000000000e02"),
  APPROVAL_ENGINE_ADDRESS: address.default("0x0000000000000000000000000000000000000e03"),

  // Tracing
  TRACE_ENABLED: z
    .string()
    .transform((v) => v === "true")
    .default("true"),

  // Persistence: unset keeps everything in memory
  DATA_DIR: z.string().min(1).optional(),
}).refine((c) => c.REVIEW_ENGINE_ADDRESS !== c.APPROVAL_ENGINE_ADDRESS, {
  message: "REVIEW_ENGINE_ADDRESS and APPROVAL_ENGINE_ADDRESS must differ",
  path: ["APPROVAL_ENGINE_ADDRESS"],
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export type ApiKeyRole = "admin" | "operator" | "viewer";

export interface ParsedApiKey {
  readonly key: string;
  readonly role: ApiKeyRole;

  /** Address the key acts as */
  readonly principal: Address;
}

function isRole(value: string): value is ApiKeyRole {
  return value === "admin" || value === "operator" || value === "viewer";
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:principal1,key2:role2:principal2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, principal] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || principal === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:principal`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (!isAddress(principal, { strict: false })) {
      throw new Error(`Principal "${principal}" in API_KEYS is not an address`);
    }

    keys.push({ key, role, principal: getAddress(principal) });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
