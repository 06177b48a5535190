/**
 * @tracebound/event-store: In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 *
 * Also the indexing core of JsonlEventStore, which adds a durable
 * write before events enter the in-memory index.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Subscription dispatch on the microtask queue, in append order
 */

import type { Clock, DomainEvent } from "@tracebound/types";
import { systemClock } from "@tracebound/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { GENESIS_HASH, linkEvent, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Clock for `appendedAt`. Default: wall clock */
  readonly clock?: Clock;

  /**
   * Receives errors thrown by subscribers. Without it, a subscriber error
   * is rethrown from the microtask and surfaces as an uncaught exception.
   */
  readonly onSubscriberError?: (error: unknown, event: StoredEvent) => void;
}

export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();

  private readonly _clock: Clock;
  private readonly _onSubscriberError:
    | ((error: unknown, event: StoredEvent) => void)
    | undefined;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._clock = options.clock ?? systemClock;
    this._onSubscriberError = options.onSubscriberError;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        "Cannot append zero events",
        streamId,
      );
    }

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options);

    const fromVersion = currentVersion + 1;
    const appendedAt = this._clock().toISOString();
    const stored: StoredEvent[] = [];
    let previousHash = this._lastHash();
    let globalPosition = this.globalPosition();

    for (const [i, event] of events.entries()) {
      globalPosition += 1;
      const linked = linkEvent(
        {
          event: {
            type: event.type,
            metadata: event.metadata,
            payload: event.payload,
          },
          streamId,
          version: fromVersion + i,
          globalPosition,
          appendedAt,
        },
        previousHash,
      );
      previousHash = linked.hash;
      stored.push(linked);
    }

    // Durable write (subclasses) happens before the index changes
    this.persist(stored);
    this.index(stored);
    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
      events: stored,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result =
      (options?.direction ?? "forward") === "forward"
        ? stream.filter((e) => e.version >= fromVersion)
        : stream.filter((e) => e.version <= fromVersion).reverse();

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;

    const result =
      (options?.direction ?? "forward") === "forward"
        ? this._globalLog.filter((e) => e.globalPosition >= fromPosition)
        : this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse();

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Extension points ───────────────────────────────────────────────

  /**
   * Make events durable. Throwing aborts the append with nothing indexed.
   */
  protected persist(_events: readonly StoredEvent[]): void {
    // In-memory: nothing to do
  }

  /**
   * Add already-linked events to the in-memory index.
   */
  protected index(events: readonly StoredEvent[]): void {
    for (const event of events) {
      let stream = this._streams.get(event.streamId);
      if (stream === undefined) {
        stream = [];
        this._streams.set(event.streamId, stream);
      }
      stream.push(event);
      this._globalLog.push(event);
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _lastHash(): string {
    return this._globalLog.at(-1)?.hash ?? GENESIS_HASH;
  }

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    options: AppendOptions | undefined,
  ): void {
    const expected = options?.expectedVersion;
    if (expected === undefined || expected === "any") {
      return;
    }
    if (expected === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
          streamId,
        );
      }
      return;
    }
    if (currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const handlers = [
      ...(this._streamSubscribers.get(streamId) ?? []),
      ...this._globalSubscribers,
    ];
    if (handlers.length === 0) {
      return;
    }

    queueMicrotask(() => {
      for (const event of events) {
        for (const handler of handlers) {
          try {
            handler(event);
          } catch (error: unknown) {
            if (this._onSubscriberError === undefined) {
              throw error;
            }
            this._onSubscriberError(error, event);
          }
        }
      }
    });
  }
}

function limit(
  events: StoredEvent[],
  maxCount: number | undefined,
): readonly StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0
    ? events.slice(0, maxCount)
    : events;
}
