/**
 * Workflow types.
 *
 * A request moves from `pending` to exactly one terminal status and
 * never back. Params and outcomes are per-kind.
 */

import type {
  Address,
  Bytes32,
  Clock,
  Hex,
  IdentityId,
  IdentityProvider,
  TraceRecorder,
} from "@tracebound/types";
import type { EventStore } from "@tracebound/event-store";
import type { CorrelationTokenStrategy } from "./token.js";

export type WorkflowKind = "review" | "approval";

/** Every request starts pending and may be cancelled by its requester. */
export type WorkflowStatus<TTerminal extends string> =
  | "pending"
  | "cancelled"
  | TTerminal;

export type ReviewTerminalStatus = "fulfilled";
export type ApprovalDecision = "approved" | "needs_revision" | "rejected";

export type ReviewStatus = WorkflowStatus<ReviewTerminalStatus>;
export type ApprovalStatus = WorkflowStatus<ApprovalDecision>;

// =============================================================================
// Params & outcomes
// =============================================================================

export type ReviewParams = {
  /** Areas the reviewer should concentrate on */
  readonly focus: readonly string[];
};

export type ApprovalParams = {
  /** Where the approver can reach the reviewer, if anywhere */
  readonly reviewerEndpoint?: string | undefined;
};

export type ReviewOutcome = {
  readonly summary: Hex;
  readonly comments: Hex;
  readonly approved: boolean;
};

export type ApprovalOutcome = {
  readonly reason: Hex;

  /** `0x` unless the decision is needs_revision */
  readonly unresolvedBlockers: Hex;
};

// =============================================================================
// Requests & results
// =============================================================================

export interface WorkflowRequest<TStatus extends string, TParams> {
  readonly requestId: Bytes32;

  /** Engine instance that owns the request */
  readonly authority: Address;
  readonly kind: WorkflowKind;
  readonly requester: Address;
  readonly domainKey: string;
  readonly correlationToken: Bytes32;
  readonly params: TParams;
  readonly createdAt: string;
  readonly sequence: number;
  readonly status: TStatus;
}

export interface WorkflowResult<TStatus extends string, TOutcome> {
  readonly requestId: Bytes32;
  readonly correlationToken: Bytes32;
  readonly domainKey: string;
  readonly status: TStatus;
  readonly outcome: TOutcome;
  readonly fulfillingIdentityId: IdentityId;
  readonly fulfilledAt: string;
}

export type ReviewRequest = WorkflowRequest<ReviewStatus, ReviewParams>;
export type ReviewResult = WorkflowResult<ReviewTerminalStatus, ReviewOutcome>;
export type ApprovalRequest = WorkflowRequest<ApprovalStatus, ApprovalParams>;
export type ApprovalResult = WorkflowResult<ApprovalDecision, ApprovalOutcome>;

export interface CreateRequestInput<TParams> {
  readonly domainKey: string;

  /** Token of an existing workflow to join. Absent or zero starts a new one. */
  readonly correlationToken?: Bytes32;
  readonly params: TParams;

  /** Overrides the engine's strategy for this request */
  readonly tokenStrategy?: CorrelationTokenStrategy;
}

// =============================================================================
// Engine options
// =============================================================================

export interface WorkflowEngineOptions {
  /** This engine instance's authority handle */
  readonly authority: Address;

  /** Where request and result notifications are appended */
  readonly store: EventStore;

  /** Who may act as which identity */
  readonly identities: IdentityProvider;

  /** Default: NoopTraceRecorder */
  readonly trace?: TraceRecorder;

  /** Default: deterministicToken */
  readonly tokenStrategy?: CorrelationTokenStrategy;

  readonly clock?: Clock;
}
