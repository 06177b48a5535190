/**
 * Tests for the global hash chain.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  GENESIS_HASH,
  computeEventHash,
  linkEvent,
  verifyHashChain,
} from "../src/hash-chain.js";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import type { StoredEvent, UnhashedEvent } from "../src/types.js";
import { fixedClock, makeEvent } from "./helpers.js";

function unhashed(position: number, payload: Record<string, unknown> = {}): UnhashedEvent {
  return {
    event: makeEvent("test.event", payload),
    streamId: "s",
    version: position,
    globalPosition: position,
    appendedAt: "2026-01-01T00:00:00.000Z",
  };
}

function chain(count: number): StoredEvent[] {
  const out: StoredEvent[] = [];
  let previous = GENESIS_HASH;
  for (let i = 1; i <= count; i++) {
    const linked = linkEvent(unhashed(i, { i }), previous);
    out.push(linked);
    previous = linked.hash;
  }
  return out;
}

describe("computeEventHash", () => {
  it("returns 64 hex characters", () => {
    expect(computeEventHash(unhashed(1), GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic", () => {
    const event = unhashed(1, { a: 1, b: 2 });
    expect(computeEventHash(event, GENESIS_HASH)).toBe(
      computeEventHash(event, GENESIS_HASH),
    );
  });

  it("ignores key order in the payload", () => {
    const a = unhashed(1, { a: 1, b: 2 });
    const b = { ...a, event: { ...a.event, payload: { b: 2, a: 1 } } };
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("depends on the previous hash", () => {
    const event = unhashed(1);
    expect(computeEventHash(event, GENESIS_HASH)).not.toBe(
      computeEventHash(event, "other"),
    );
  });
});

describe("verifyHashChain", () => {
  it("accepts an empty chain", () => {
    expect(verifyHashChain([])).toEqual({
      valid: true,
      lastVerifiedPosition: 0,
      errors: [],
    });
  });

  it("accepts an intact chain", () => {
    const result = verifyHashChain(chain(4));
    expect(result.valid).toBe(true);
    expect(result.lastVerifiedPosition).toBe(4);
  });

  it("detects an edited payload", () => {
    const events = chain(3);
    const second = events[1];
    if (second === undefined) throw new Error("missing event");
    events[1] = { ...second, event: { ...second.event, payload: { i: 99 } } };

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors.map((e) => e.position)).toEqual([2]);
  });

  it("detects a dropped event", () => {
    const events = chain(3);
    events.splice(1, 1);

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors[0]?.reason).toMatch(/^previousHash mismatch at position 3/);
  });

  it("holds for any sequence of appends", () => {
    fc.assert(
      fc.property(
        fc.array(
          fc.record({
            stream: fc.constantFrom("a", "b", "c"),
            value: fc.integer(),
          }),
          { minLength: 1, maxLength: 20 },
        ),
        (appends) => {
          const store = new InMemoryEventStore({ clock: fixedClock });
          for (const { stream, value } of appends) {
            store.append(stream, [makeEvent("prop", { value })]);
          }
          const result = store.verifyIntegrity();
          return result.valid && result.lastVerifiedPosition === appends.length;
        },
      ),
    );
  });
});
