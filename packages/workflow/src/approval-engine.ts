/**
 * Approval workflow: an approver agent decides a request one of three
 * ways. All three share the fulfillment guard and differ only in the
 * status they reach and the notification they append.
 */

import type { Address, Bytes32, Hex, IdentityId } from "@tracebound/types";
import { EMPTY_BYTES } from "@tracebound/types";
import { PROTOCOL_EVENTS } from "@tracebound/event-store";
import { WorkflowEngine } from "./engine.js";
import type { Transition, WorkflowDefinition } from "./engine.js";
import { ApprovalOutcomeSchema, ApprovalParamsSchema } from "./events.js";
import type {
  ApprovalDecision,
  ApprovalOutcome,
  ApprovalParams,
  ApprovalRequest,
  ApprovalResult,
  ApprovalStatus,
  CreateRequestInput,
  WorkflowEngineOptions,
} from "./types.js";

const VALID_TRANSITIONS: Record<ApprovalStatus, readonly ApprovalStatus[]> = {
  pending: ["approved", "needs_revision", "rejected", "cancelled"],
  approved: [],
  needs_revision: [],
  rejected: [],
  cancelled: [],
};

const APPROVE: Transition<ApprovalDecision> = {
  status: "approved",
  event: PROTOCOL_EVENTS.APPROVAL_APPROVED,
  action: "approvalGranted",
};

const NEEDS_REVISION: Transition<ApprovalDecision> = {
  status: "needs_revision",
  event: PROTOCOL_EVENTS.APPROVAL_NEEDS_REVISION,
  action: "revisionRequested",
};

const REJECT: Transition<ApprovalDecision> = {
  status: "rejected",
  event: PROTOCOL_EVENTS.APPROVAL_REJECTED,
  action: "approvalRejected",
};

const APPROVAL_WORKFLOW: WorkflowDefinition<
  ApprovalDecision,
  ApprovalParams,
  ApprovalOutcome
> = {
  kind: "approval",
  validTransitions: VALID_TRANSITIONS,
  results: [APPROVE, NEEDS_REVISION, REJECT],
  paramsSchema: ApprovalParamsSchema,
  outcomeSchema: ApprovalOutcomeSchema,
};

export class ApprovalEngine extends WorkflowEngine<
  ApprovalDecision,
  ApprovalParams,
  ApprovalOutcome
> {
  constructor(options: WorkflowEngineOptions) {
    super(options, APPROVAL_WORKFLOW);
  }

  requestApproval(
    caller: Address,
    input: CreateRequestInput<ApprovalParams>,
  ): ApprovalRequest {
    return this.createRequest(caller, input);
  }

  approve(
    caller: Address,
    identityId: IdentityId,
    requestId: Bytes32,
    domainKey: string,
    reason: Hex,
  ): ApprovalResult {
    return this.fulfill(caller, identityId, requestId, domainKey, APPROVE, {
      reason,
      unresolvedBlockers: EMPTY_BYTES,
    });
  }

  needsRevision(
    caller: Address,
    identityId: IdentityId,
    requestId: Bytes32,
    domainKey: string,
    reason: Hex,
    unresolvedBlockers: Hex,
  ): ApprovalResult {
    return this.fulfill(caller, identityId, requestId, domainKey, NEEDS_REVISION, {
      reason,
      unresolvedBlockers,
    });
  }

  reject(
    caller: Address,
    identityId: IdentityId,
    requestId: Bytes32,
    domainKey: string,
    reason: Hex,
  ): ApprovalResult {
    return this.fulfill(caller, identityId, requestId, domainKey, REJECT, {
      reason,
      unresolvedBlockers: EMPTY_BYTES,
    });
  }
}
