/**
 * Identity registry types.
 */

import type {
  Address,
  Clock,
  Hex,
  IdentityId,
} from "@tracebound/types";
import type { EventStore } from "@tracebound/event-store";
import type { DelegatedSignatureValidator } from "./proof.js";

/**
 * Snapshot of a registered agent identity.
 */
export interface AgentIdentity {
  readonly identityId: IdentityId;
  readonly owner: Address;

  /** Principal trusted to act as the identity; zero when unset */
  readonly verifiedWallet: Address;

  /** The one engine authority this identity may fulfill for; zero when unset */
  readonly boundAuthority: Address;

  /** Pointer to an external agent card */
  readonly cardReference: string;

  /** Per-identity delegate; zero when unset */
  readonly approved: Address;

  readonly metadata: Readonly<Record<string, Hex>>;
  readonly registeredAt: string;
}

export interface RegisterInput {
  readonly cardReference?: string;
  readonly metadata?: Readonly<Record<string, Hex>>;
  readonly boundAuthority?: Address;
}

export interface IdentityRegistryOptions {
  /** Where registry events are appended */
  readonly store: EventStore;

  /** Chain id of the proof domain */
  readonly chainId: number;

  /** `verifyingContract` of the proof domain */
  readonly registryAddress: Address;

  /** Furthest a proof deadline may lie in the future. Default: 300 */
  readonly maxDeadlineDelaySeconds?: number;

  /** Fallback for wallets that cannot produce a recoverable signature */
  readonly signatureValidator?: DelegatedSignatureValidator;

  readonly clock?: Clock;
}
