/**
 * @tracebound/event-store: Hash chain for tamper-evident event logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash, forming a chain:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Editing, dropping or reordering any event breaks the chain from that
 * point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedEvent,
} from "./types.js";

/**
 * The hash used as `previousHash` for the first event in the chain.
 */
export const GENESIS_HASH = "genesis";

function canonicalEventContent(event: UnhashedEvent): string {
  return canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
}

/**
 * Compute the SHA-256 hash of an event given its predecessor's hash.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEventHash(
  event: UnhashedEvent,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

/**
 * Link an event into the chain after `previousHash`.
 */
export function linkEvent(event: UnhashedEvent, previousHash: string): StoredEvent {
  return { ...event, hash: computeEventHash(event, previousHash), previousHash };
}

/**
 * Verify the hash chain of a sequence of events in global position order.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;

  for (const event of events) {
    let intact = true;

    if (event.previousHash !== previousHash) {
      intact = false;
      errors.push({
        position: event.globalPosition,
        reason: `previousHash mismatch at position ${event.globalPosition}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      intact = false;
      errors.push({
        position: event.globalPosition,
        reason: `Hash mismatch at position ${event.globalPosition}: expected "${expectedHash}", got "${event.hash}"`,
      });
    }

    if (intact && errors.length === 0) {
      lastVerifiedPosition = event.globalPosition;
    }
    previousHash = event.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
