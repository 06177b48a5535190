/**
 * Shared fixtures for workflow tests.
 */

import type {
  Address,
  Hex,
  IdentityId,
  IdentityProvider,
} from "@tracebound/types";
import { EMPTY_BYTES, ProtocolError, ZERO_ADDRESS } from "@tracebound/types";

export const REQUESTER: Address = "0x1000000000000000000000000000000000000001";
export const WALLET: Address = "0x2000000000000000000000000000000000000002";
export const STRANGER: Address = "0x3000000000000000000000000000000000000003";
export const REVIEW_AUTHORITY: Address = "0x4000000000000000000000000000000000000004";
export const APPROVAL_AUTHORITY: Address = "0x5000000000000000000000000000000000000005";

export const clock = (): Date => new Date("2026-01-01T00:00:00.000Z");

interface StubIdentity {
  owner: Address;
  wallet: Address;
  authority: Address;
}

/**
 * In-test identity provider. Engines see only the interface.
 */
export class StubIdentityProvider implements IdentityProvider {
  private readonly identities = new Map<IdentityId, StubIdentity>();

  set(identityId: IdentityId, wallet: Address, authority: Address): void {
    this.identities.set(identityId, { owner: wallet, wallet, authority });
  }

  rebind(identityId: IdentityId, authority: Address): void {
    this.require(identityId).authority = authority;
  }

  revokeWallet(identityId: IdentityId): void {
    this.require(identityId).wallet = ZERO_ADDRESS;
  }

  ownerOf(identityId: IdentityId): Address {
    return this.require(identityId).owner;
  }

  getVerifiedWallet(identityId: IdentityId): Address {
    return this.require(identityId).wallet;
  }

  getBoundAuthority(identityId: IdentityId): Address {
    return this.require(identityId).authority;
  }

  getMetadata(): Hex {
    return EMPTY_BYTES;
  }

  private require(identityId: IdentityId): StubIdentity {
    const identity = this.identities.get(identityId);
    if (identity === undefined) {
      throw new ProtocolError("UNKNOWN_ENTITY", `Identity ${identityId} not found`);
    }
    return identity;
  }
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  return undefined;
}
