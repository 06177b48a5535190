/**
 * @tracebound/types: Shared domain types.
 *
 * Used across all packages:
 * - Hex primitives (addresses, byte strings, 32-byte handles)
 * - Event architecture (DomainEvent, EventMetadata)
 * - The protocol error taxonomy
 * - Seams between components (IdentityProvider, TraceRecorder)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Primitives
export type {
  Address,
  Hex,
  Bytes32,
  IdentityId,
  Clock,
} from "./primitives.js";
export {
  ZERO_ADDRESS,
  ZERO_BYTES32,
  EMPTY_BYTES,
  systemClock,
} from "./primitives.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Errors
export type { ProtocolErrorCode } from "./errors.js";
export {
  ProtocolError,
  isProtocolErrorCode,
  protocolErrorCode,
} from "./errors.js";

// Component seams
export type { IdentityProvider } from "./identity.js";
export { RESERVED_METADATA_KEYS } from "./identity.js";
export type { TraceHop, TraceRecorder } from "./trace.js";

// Runtime type guards
export {
  isHex,
  isAddressLike,
  isBytes32,
  isZeroAddress,
  isZeroBytes32,
  isEventMetadata,
  isDomainEvent,
  isTraceHop,
} from "./guards.js";
