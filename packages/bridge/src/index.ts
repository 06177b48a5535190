/**
 * @tracebound/bridge: Off-engine workers that fulfill requests.
 *
 * Provides:
 * - WorkflowBridge, ReviewBridge and ApprovalBridge
 * - ProviderClient for JSON-RPC agent providers
 * - In-process and remote notification sources and fulfillment targets
 * - Retry with exponential backoff
 *
 * @packageDocumentation
 */

export { WorkflowBridge, ReviewBridge, ApprovalBridge } from "./bridge.js";
export type {
  WorkflowBridgeOptions,
  ReviewBridgeOptions,
  ApprovalBridgeOptions,
} from "./bridge.js";

export {
  ProviderClient,
  ReviewVerdictSchema,
  ApprovalVerdictSchema,
} from "./provider-client.js";
export type {
  ProviderClientConfig,
  ReviewVerdict,
  ApprovalVerdict,
  ReviewCall,
  ApprovalCall,
} from "./provider-client.js";

export { EndpointPool } from "./endpoint-pool.js";

export {
  storeNotificationSource,
  engineReviewTarget,
  engineApprovalTarget,
} from "./ports.js";
export type { NotificationSource, ReviewTarget, ApprovalTarget } from "./ports.js";

export { HttpNodeClient, PollingEventSource } from "./node-client.js";
export type {
  HttpNodeClientConfig,
  PollingEventSourceOptions,
  EventFeed,
} from "./node-client.js";

export {
  withRetry,
  computeDelay,
  isRetryable,
  sleep,
  RetryExhaustedError,
  DEFAULT_RETRY_CONFIG,
} from "./retry.js";
export type { RetryConfig, RetryOptions } from "./retry.js";

export { BridgeError } from "./errors.js";
export { loadBridgeConfig, BridgeConfigSchema } from "./config.js";
export type { BridgeConfig } from "./config.js";
