/**
 * Trace recording contract shared by the trace ledger and workflow engines.
 */

import type { Address, Bytes32, IdentityId } from "./primitives.js";

/**
 * One recorded step in a correlation token's history.
 */
export interface TraceHop {
  readonly correlationToken: Bytes32;

  /** Engine instance that recorded the hop */
  readonly authority: Address;

  /** Fulfilling identity, or 0 when not attributable (e.g., at request time) */
  readonly identityId: IdentityId;

  /** Free-form label such as "reviewRequested" */
  readonly action: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** 1-based insertion order within the token */
  readonly position: number;
}

/**
 * Append-only sink for trace hops.
 *
 * `enabled` is false for the no-op recorder; engines never branch on it,
 * it exists for reporting.
 */
export interface TraceRecorder {
  readonly enabled: boolean;
  recordHop(
    authority: Address,
    correlationToken: Bytes32,
    identityId: IdentityId,
    action: string,
  ): TraceHop | undefined;
}
