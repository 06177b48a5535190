/**
 * @tracebound/event-store: Protocol event names and stream layout.
 *
 * Naming convention: `<component>.<entity>.<action>`
 *
 * Stream layout:
 * - `identity:<identityId>`            one stream per identity
 * - `operators:<owner>`                operator grants of one owner
 * - `request:<authority>:<requestId>`  one stream per workflow request
 * - `trace:<correlationToken>`         one stream per correlation token
 *
 * Payload shapes are owned (and validated) by the emitting package.
 */

import { randomUUID } from "node:crypto";
import type { Clock, DomainEvent, EventSource } from "@tracebound/types";

export const PROTOCOL_EVENTS = {
  // Identity registry
  IDENTITY_REGISTERED: "identity.registered",
  IDENTITY_WALLET_SET: "identity.wallet.set",
  IDENTITY_AUTHORITY_SET: "identity.authority.set",
  IDENTITY_METADATA_SET: "identity.metadata.set",
  IDENTITY_CARD_SET: "identity.card.set",
  IDENTITY_APPROVAL_SET: "identity.approval.set",
  IDENTITY_OPERATOR_SET: "identity.operator.set",
  IDENTITY_TRANSFERRED: "identity.transferred",

  // Workflow engines
  REQUEST_CREATED: "workflow.request.created",
  REQUEST_CANCELLED: "workflow.request.cancelled",
  REVIEW_FULFILLED: "workflow.review.fulfilled",
  APPROVAL_APPROVED: "workflow.approval.approved",
  APPROVAL_NEEDS_REVISION: "workflow.approval.needs_revision",
  APPROVAL_REJECTED: "workflow.approval.rejected",

  // Trace ledger
  HOP_RECORDED: "trace.hop.recorded",
} as const;

export type ProtocolEventType =
  (typeof PROTOCOL_EVENTS)[keyof typeof PROTOCOL_EVENTS];

export function identityStream(identityId: number): string {
  return `identity:${identityId}`;
}

export function operatorStream(owner: string): string {
  return `operators:${owner.toLowerCase()}`;
}

export function requestStream(authority: string, requestId: string): string {
  return `request:${authority.toLowerCase()}:${requestId.toLowerCase()}`;
}

export function traceStream(correlationToken: string): string {
  return `trace:${correlationToken.toLowerCase()}`;
}

// =============================================================================
// Event construction
// =============================================================================

export interface EventContext {
  /** Principal whose call caused the event */
  readonly actor: string;
  readonly correlationId: string;
  readonly source: EventSource;
  readonly clock: Clock;
  readonly causationId?: string;
}

/**
 * Build a DomainEvent with fresh metadata.
 */
export function createDomainEvent(
  type: ProtocolEventType,
  payload: Readonly<Record<string, unknown>>,
  context: EventContext,
): DomainEvent {
  const base = {
    eventId: randomUUID(),
    timestamp: context.clock().toISOString(),
    actor: context.actor,
    correlationId: context.correlationId,
    source: context.source,
  };
  return {
    type,
    metadata:
      context.causationId !== undefined
        ? { ...base, causationId: context.causationId }
        : base,
    payload,
  };
}
