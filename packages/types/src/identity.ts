/**
 * Identity Provider
 *
 * The read-only view of the identity registry that a workflow engine
 * consumes. Engines hold no allow-list of their own: every fulfillment is
 * authorized by asking this provider, so a rebind or revocation in the
 * registry takes effect on the next call.
 */

import type { Address, Hex, IdentityId } from "./primitives.js";

export interface IdentityProvider {
  /** Current owner. Throws UNKNOWN_ENTITY for an unregistered identity. */
  ownerOf(identityId: IdentityId): Address;

  /** Principal trusted to act as the identity, or the zero address. */
  getVerifiedWallet(identityId: IdentityId): Address;

  /** Engine authority the identity may fulfill for, or the zero address. */
  getBoundAuthority(identityId: IdentityId): Address;

  /** Metadata bytes for `key`, or `0x` when unset. */
  getMetadata(identityId: IdentityId, key: string): Hex;
}

/** Metadata keys that shadow typed identity fields. */
export const RESERVED_METADATA_KEYS: ReadonlySet<string> = new Set([
  "verifiedWallet",
  "boundAuthority",
]);
