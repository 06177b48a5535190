/**
 * @tracebound/workflow: Request → fulfillment engines.
 *
 * Provides:
 * - WorkflowEngine, the shared state machine and authorization guard
 * - ReviewEngine and ApprovalEngine
 * - Correlation-token strategies and request ids
 * - Byte codecs for opaque outcome fields
 *
 * @packageDocumentation
 */

export { WorkflowEngine } from "./engine.js";
export type { Transition, WorkflowDefinition } from "./engine.js";
export { ReviewEngine } from "./review-engine.js";
export { ApprovalEngine } from "./approval-engine.js";
export { WorkflowError } from "./errors.js";

export type {
  WorkflowKind,
  WorkflowStatus,
  ReviewStatus,
  ReviewTerminalStatus,
  ApprovalStatus,
  ApprovalDecision,
  ReviewParams,
  ApprovalParams,
  ReviewOutcome,
  ApprovalOutcome,
  WorkflowRequest,
  WorkflowResult,
  ReviewRequest,
  ReviewResult,
  ApprovalRequest,
  ApprovalResult,
  CreateRequestInput,
  WorkflowEngineOptions,
} from "./types.js";

export {
  deterministicToken,
  randomToken,
  computeRequestId,
} from "./token.js";
export type { CorrelationTokenStrategy, TokenSeed } from "./token.js";

export { encodeText, decodeText, encodeJson, decodeJson } from "./codec.js";

export {
  ReviewParamsSchema,
  ApprovalParamsSchema,
  ReviewOutcomeSchema,
  ApprovalOutcomeSchema,
  WorkflowKindSchema,
  RequestCreatedSchema,
  ResultRecordedSchema,
  RequestCancelledSchema,
} from "./events.js";
export type {
  RequestCreatedPayload,
  ResultRecordedPayload,
  RequestCancelledPayload,
} from "./events.js";
