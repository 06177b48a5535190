/**
 * Review workflow: a reviewer agent fulfills a request with a summary,
 * comments and a verdict.
 */

import type { Address, Bytes32, IdentityId } from "@tracebound/types";
import { PROTOCOL_EVENTS } from "@tracebound/event-store";
import { WorkflowEngine } from "./engine.js";
import type { Transition, WorkflowDefinition } from "./engine.js";
import { ReviewOutcomeSchema, ReviewParamsSchema } from "./events.js";
import type {
  CreateRequestInput,
  ReviewOutcome,
  ReviewParams,
  ReviewRequest,
  ReviewResult,
  ReviewStatus,
  ReviewTerminalStatus,
  WorkflowEngineOptions,
} from "./types.js";

const VALID_TRANSITIONS: Record<ReviewStatus, readonly ReviewStatus[]> = {
  pending: ["fulfilled", "cancelled"],
  fulfilled: [],
  cancelled: [],
};

const FULFILL: Transition<ReviewTerminalStatus> = {
  status: "fulfilled",
  event: PROTOCOL_EVENTS.REVIEW_FULFILLED,
  action: "reviewFulfilled",
};

const REVIEW_WORKFLOW: WorkflowDefinition<
  ReviewTerminalStatus,
  ReviewParams,
  ReviewOutcome
> = {
  kind: "review",
  validTransitions: VALID_TRANSITIONS,
  results: [FULFILL],
  paramsSchema: ReviewParamsSchema,
  outcomeSchema: ReviewOutcomeSchema,
};

export class ReviewEngine extends WorkflowEngine<
  ReviewTerminalStatus,
  ReviewParams,
  ReviewOutcome
> {
  constructor(options: WorkflowEngineOptions) {
    super(options, REVIEW_WORKFLOW);
  }

  requestReview(caller: Address, input: CreateRequestInput<ReviewParams>): ReviewRequest {
    return this.createRequest(caller, input);
  }

  fulfillReview(
    caller: Address,
    identityId: IdentityId,
    requestId: Bytes32,
    domainKey: string,
    outcome: ReviewOutcome,
  ): ReviewResult {
    return this.fulfill(caller, identityId, requestId, domainKey, FULFILL, outcome);
  }
}
