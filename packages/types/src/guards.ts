/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, notifications read from disk).
 */

import type { Address, Bytes32, Hex } from "./primitives.js";
import { ZERO_ADDRESS, ZERO_BYTES32 } from "./primitives.js";
import type { DomainEvent, EventMetadata } from "./event.js";
import type { TraceHop } from "./trace.js";

// =============================================================================
// Hex guards
// =============================================================================

const HEX_BYTES = /^0x(?:[0-9a-fA-F]{2})*$/;
const ADDRESS = /^0x[0-9a-fA-F]{40}$/;
const BYTES32 = /^0x[0-9a-fA-F]{64}$/;

export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && HEX_BYTES.test(value);
}

export function isAddressLike(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS.test(value);
}

export function isBytes32(value: unknown): value is Bytes32 {
  return typeof value === "string" && BYTES32.test(value);
}

export function isZeroAddress(value: string): boolean {
  return value.toLowerCase() === ZERO_ADDRESS;
}

export function isZeroBytes32(value: string): boolean {
  return value.toLowerCase() === ZERO_BYTES32;
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["identity", "review", "approval", "trace"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}

// =============================================================================
// Trace guards
// =============================================================================

export function isTraceHop(value: unknown): value is TraceHop {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isBytes32(v.correlationToken) &&
    isAddressLike(v.authority) &&
    typeof v.identityId === "number" &&
    Number.isInteger(v.identityId) &&
    v.identityId >= 0 &&
    typeof v.action === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.position === "number"
  );
}
