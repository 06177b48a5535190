/**
 * Execution Trace Ledger: append-only hops per correlation token.
 *
 * Hops live in the event store, one stream per token, so a hop's
 * position is its stream version and the ledger shares the store's
 * hash chain. There is no update or delete path.
 */

import { z } from "zod";
import { getAddress, isAddress } from "viem";
import type {
  Address,
  Bytes32,
  Clock,
  IdentityId,
  TraceHop,
  TraceRecorder,
} from "@tracebound/types";
import {
  ZERO_ADDRESS,
  isAddressLike,
  isBytes32,
  isZeroBytes32,
  systemClock,
} from "@tracebound/types";
import type {
  EventStore,
  EventStoreIntegrityResult,
  StoredEvent,
} from "@tracebound/event-store";
import {
  PROTOCOL_EVENTS,
  createDomainEvent,
  traceStream,
} from "@tracebound/event-store";
import { TraceError } from "./errors.js";

export const HopRecordedSchema = z.object({
  correlationToken: z.custom<Bytes32>(isBytes32),
  authority: z.custom<Address>(isAddressLike),
  identityId: z.number().int().nonnegative(),
  action: z.string().min(1),
  timestamp: z.string(),
});

export type HopRecordedPayload = z.infer<typeof HopRecordedSchema>;

/**
 * Who touched a workflow and when.
 */
export interface TraceSummary {
  readonly correlationToken: Bytes32;
  readonly hopCount: number;

  /** Distinct authorities, in order of first appearance */
  readonly authorities: readonly Address[];

  /** Distinct attributable identities (non-zero), in order of first appearance */
  readonly identities: readonly IdentityId[];

  readonly actions: readonly string[];
  readonly firstTimestamp?: string;
  readonly lastTimestamp?: string;
  readonly lastAction?: string;
}

export interface ExecutionTraceLedgerOptions {
  readonly store: EventStore;
  readonly clock?: Clock;
}

export class ExecutionTraceLedger implements TraceRecorder {
  readonly enabled = true;

  private readonly store: EventStore;
  private readonly clock: Clock;

  constructor(options: ExecutionTraceLedgerOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Append a hop.
   *
   * @param identityId - Fulfilling identity, or 0 when not attributable
   */
  recordHop(
    authority: Address,
    correlationToken: Bytes32,
    identityId: IdentityId,
    action: string,
  ): TraceHop {
    const token = requireToken(correlationToken);
    if (!isAddress(authority, { strict: false }) || getAddress(authority) === ZERO_ADDRESS) {
      throw new TraceError("EMPTY_HANDLE", `Authority must be a non-zero address, got ${authority}`);
    }
    if (action.length === 0) {
      throw new TraceError("EMPTY_HANDLE", "Action must not be empty");
    }
    if (!Number.isInteger(identityId) || identityId < 0) {
      throw new TraceError("EMPTY_HANDLE", `Identity id must be a non-negative integer, got ${identityId}`);
    }

    const payload: HopRecordedPayload = {
      correlationToken: token,
      authority: getAddress(authority),
      identityId,
      action,
      timestamp: this.clock().toISOString(),
    };
    const result = this.store.append(traceStream(token), [
      createDomainEvent(PROTOCOL_EVENTS.HOP_RECORDED, payload, {
        actor: payload.authority,
        correlationId: token,
        source: "trace",
        clock: this.clock,
      }),
    ]);

    return { ...payload, position: result.toVersion };
  }

  /** All hops for a token, in insertion order. Empty for an unknown token. */
  getTrace(correlationToken: Bytes32): readonly TraceHop[] {
    const token = requireToken(correlationToken);
    return this.store
      .read(traceStream(token))
      .filter((e) => e.event.type === PROTOCOL_EVENTS.HOP_RECORDED)
      .map(toHop);
  }

  getHopCount(correlationToken: Bytes32): number {
    return this.getTrace(correlationToken).length;
  }

  summarizeTrace(correlationToken: Bytes32): TraceSummary {
    const hops = this.getTrace(correlationToken);
    const authorities = [...new Set(hops.map((h) => h.authority))];
    const identities = [
      ...new Set(hops.map((h) => h.identityId).filter((id) => id !== 0)),
    ];
    const first = hops[0];
    const last = hops.at(-1);

    const base = {
      correlationToken: requireToken(correlationToken),
      hopCount: hops.length,
      authorities,
      identities,
      actions: hops.map((h) => h.action),
    };
    return first !== undefined && last !== undefined
      ? {
          ...base,
          firstTimestamp: first.timestamp,
          lastTimestamp: last.timestamp,
          lastAction: last.action,
        }
      : base;
  }

  /** Hash-chain check of the backing store. */
  verifyIntegrity(): EventStoreIntegrityResult {
    return this.store.verifyIntegrity();
  }
}

function requireToken(token: string): Bytes32 {
  const normalized = token.toLowerCase();
  if (!isBytes32(normalized) || isZeroBytes32(normalized)) {
    throw new TraceError("EMPTY_HANDLE", `Correlation token must be a non-zero 32-byte value, got ${token}`);
  }
  return normalized;
}

function toHop(stored: StoredEvent): TraceHop {
  const payload = HopRecordedSchema.parse(stored.event.payload);
  return { ...payload, position: stored.version };
}
