/**
 * @tracebound/event-store: Core types.
 *
 * Defines the interfaces and types for append-only event persistence.
 * The store carries every durable notification: request lifecycle events,
 * identity changes and trace hops.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every event is linked into one global hash chain
 * - Concurrency control via expected version (optimistic locking)
 */

import type { DomainEvent, EventMetadata } from "@tracebound/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 *
 * Wraps a DomainEvent with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: monotonically increasing position within the stream
 * - globalPosition: monotonically increasing position across all streams
 * - hash / previousHash: link in the global tamper-evident chain
 */
export interface StoredEvent<TPayload = Record<string, unknown>> {
  /** The domain event */
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<TPayload>;
  }>;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based, monotonically increasing) */
  readonly version: number;

  /** Position across all streams (1-based, monotonically increasing) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 of this event's canonical content plus `previousHash` */
  readonly hash: string;

  /** Hash of the preceding event in global order, or GENESIS_HASH */
  readonly previousHash: string;
}

/**
 * A stored event before it is linked into the chain.
 */
export type UnhashedEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append Options
// =============================================================================

/**
 * Expected version for optimistic concurrency control.
 *
 * - A number: the stream must be at exactly this version before append
 * - "no_stream": the stream must not exist (first write)
 * - "any": no concurrency check (append regardless)
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;

  /** Version of the first event appended */
  readonly fromVersion: number;

  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;

  readonly count: number;

  /** The events as stored, in append order */
  readonly events: readonly StoredEvent[];
}

// =============================================================================
// Read Options
// =============================================================================

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;

  /** Default: "forward" */
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;

  /** Default: "forward" */
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscription
// =============================================================================

/**
 * Callback for event subscriptions.
 *
 * Handlers run after `append` has returned, on the microtask queue, in
 * append order. A handler that starts asynchronous work owns its promise.
 */
export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event whose link verified */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - Optimistic concurrency control prevents lost writes
 * - Subscribers see events in global order
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * @throws EventStoreError if the stream ID is empty, no events are given,
   *   or the concurrency check fails
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Read one stream. Empty when the stream does not exist. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Read across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Current version of a stream, or 0 if it doesn't exist */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 if the store is empty */
  globalPosition(): number;

  /** Recompute and check the global hash chain */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION"
  | "CORRUPT_LOG";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
