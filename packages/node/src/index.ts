/**
 * @tracebound/node: HTTP node for the identity registry, workflow
 * engines and trace ledger.
 *
 * @packageDocumentation
 */

export { ProtocolService } from "./services/protocol-service.js";
export type { ProtocolServiceConfig, TokenStrategyName } from "./services/protocol-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export type { AuthConfig } from "./middleware/auth.js";
export * from "./types/index.js";
