/**
 * Primitive value types shared by every package.
 *
 * Addresses and byte strings are carried as 0x-prefixed hex text so they
 * survive JSON persistence and HTTP transport unchanged.
 */

/** A 20-byte principal or authority handle, 0x-prefixed hex. */
export type Address = `0x${string}`;

/** Arbitrary bytes, 0x-prefixed hex. `0x` is the empty byte string. */
export type Hex = `0x${string}`;

/** Exactly 32 bytes, 0x-prefixed hex (request ids, correlation tokens). */
export type Bytes32 = `0x${string}`;

/** Positive integer handle of a registered identity. 0 means "none". */
export type IdentityId = number;

/** Source of the current time. Injectable for deterministic tests. */
export type Clock = () => Date;

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

export const ZERO_BYTES32: Bytes32 =
  "0x0000000000000000000000000000000000000000000000000000000000000000";

export const EMPTY_BYTES: Hex = "0x";

export const systemClock: Clock = () => new Date();
