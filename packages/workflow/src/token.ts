/**
 * Correlation tokens and request ids.
 */

import { randomBytes } from "node:crypto";
import { bytesToHex, encodePacked, keccak256 } from "viem";
import type { Address, Bytes32 } from "@tracebound/types";

export interface TokenSeed {
  readonly requester: Address;
  readonly domainKey: string;
  readonly timeMs: number;
  readonly sequence: number;
}

/**
 * Produces the correlation token of a request that starts a workflow.
 */
export type CorrelationTokenStrategy = (seed: TokenSeed) => Bytes32;

const TOKEN_TAG = "tracebound.correlation.v1";

/** keccak256 over a tagged (requester, domainKey, time, sequence) tuple. */
export const deterministicToken: CorrelationTokenStrategy = (seed) =>
  keccak256(
    encodePacked(
      ["string", "address", "string", "uint256", "uint256"],
      [
        TOKEN_TAG,
        seed.requester,
        seed.domainKey,
        BigInt(seed.timeMs),
        BigInt(seed.sequence),
      ],
    ),
  );

/** 32 random bytes. */
export const randomToken: CorrelationTokenStrategy = () =>
  bytesToHex(randomBytes(32));

export function computeRequestId(
  authority: Address,
  requester: Address,
  domainKey: string,
  timeMs: number,
  sequence: number,
): Bytes32 {
  return keccak256(
    encodePacked(
      ["address", "address", "string", "uint256", "uint256"],
      [authority, requester, domainKey, BigInt(timeMs), BigInt(sequence)],
    ),
  );
}
