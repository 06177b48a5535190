/**
 * Where a bridge hears about requests and where it sends fulfillments.
 *
 * A bridge runs either beside the engines (in-process adapters below) or
 * against a remote node (`HttpNodeClient`, `PollingEventSource`).
 */

import type { EventHandler, EventStore, Subscription } from "@tracebound/event-store";
import type { Address, Bytes32, Hex, IdentityId } from "@tracebound/types";
import type { ApprovalEngine, ReviewEngine, ReviewOutcome } from "@tracebound/workflow";

// =============================================================================
// Ports
// =============================================================================

export interface NotificationSource {
  /** Start delivering stored notifications; unsubscribe stops delivery. */
  subscribe(handler: EventHandler): Subscription;
}

export interface ReviewTarget {
  fulfillReview(
    identityId: IdentityId,
    requestId: Bytes32,
    domainKey: string,
    outcome: ReviewOutcome,
  ): Promise<void>;
}

export interface ApprovalTarget {
  approve(identityId: IdentityId, requestId: Bytes32, domainKey: string, reason: Hex): Promise<void>;
  needsRevision(
    identityId: IdentityId,
    requestId: Bytes32,
    domainKey: string,
    reason: Hex,
    unresolvedBlockers: Hex,
  ): Promise<void>;
  reject(identityId: IdentityId, requestId: Bytes32, domainKey: string, reason: Hex): Promise<void>;
}

// =============================================================================
// In-process adapters
// =============================================================================

export function storeNotificationSource(store: EventStore): NotificationSource {
  return {
    subscribe: (handler) => store.subscribeAll(handler),
  };
}

/**
 * Submit review results straight to an engine, acting as `wallet`.
 * Engine rejections surface as promise rejections.
 */
export function engineReviewTarget(engine: ReviewEngine, wallet: Address): ReviewTarget {
  return {
    fulfillReview: async (identityId, requestId, domainKey, outcome) => {
      engine.fulfillReview(wallet, identityId, requestId, domainKey, outcome);
    },
  };
}

export function engineApprovalTarget(engine: ApprovalEngine, wallet: Address): ApprovalTarget {
  return {
    approve: async (identityId, requestId, domainKey, reason) => {
      engine.approve(wallet, identityId, requestId, domainKey, reason);
    },
    needsRevision: async (identityId, requestId, domainKey, reason, unresolvedBlockers) => {
      engine.needsRevision(wallet, identityId, requestId, domainKey, reason, unresolvedBlockers);
    },
    reject: async (identityId, requestId, domainKey, reason) => {
      engine.reject(wallet, identityId, requestId, domainKey, reason);
    },
  };
}
