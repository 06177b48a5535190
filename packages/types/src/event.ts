/**
 * Event Types
 *
 * Every state change in the registry, the workflow engines and the trace
 * ledger is captured as a DomainEvent. Events double as the durable
 * notifications external observers (bridges, auditors) consume.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which thread)
 * - Events are replayable: same events → same state
 * - No UPDATE, no DELETE; only new events
 */

/**
 * Which component emitted an event.
 */
export type EventSource = "identity" | "review" | "approval" | "trace";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Principal whose call caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Correlation token or identity handle grouping related events */
  readonly correlationId: string;

  /** Which component emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "workflow.request.created") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
