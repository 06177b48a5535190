/**
 * Shared fixtures for event-store tests.
 */

import type { DomainEvent } from "@tracebound/types";

let counter = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
  correlationId = "corr-1",
): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "0x1000000000000000000000000000000000000001",
      correlationId,
      source: "review",
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}

export const fixedClock = (): Date => new Date("2026-01-01T00:00:00.000Z");

/** Let queued subscriber dispatch run. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

/** Run `fn` and return what it threw, or undefined. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  return undefined;
}
