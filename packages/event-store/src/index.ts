/**
 * @tracebound/event-store: Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only, hash-chained event streams
 * - InMemoryEventStore for tests and development
 * - JsonlEventStore for durable file-based persistence
 * - Protocol event names and stream layout
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export {
  computeEventHash,
  linkEvent,
  verifyHashChain,
  GENESIS_HASH,
} from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";
export { JsonlEventStore } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

// Protocol events
export {
  PROTOCOL_EVENTS,
  identityStream,
  operatorStream,
  requestStream,
  traceStream,
  createDomainEvent,
} from "./protocol-events.js";
export type { ProtocolEventType, EventContext } from "./protocol-events.js";
