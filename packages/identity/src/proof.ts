/**
 * Verified-wallet proofs.
 *
 * A wallet consents to acting as an identity by signing EIP-712 typed data
 * naming the identity, itself, the current owner and a deadline. Binding
 * the owner means a transfer invalidates every outstanding proof.
 */

import {
  hashTypedData,
  isAddressEqual,
  recoverTypedDataAddress,
} from "viem";
import type { LocalAccount, TypedDataDomain } from "viem";
import type { Address, Bytes32, Hex, IdentityId } from "@tracebound/types";

export const VERIFIED_WALLET_TYPES = {
  VerifiedWalletSet: [
    { name: "identityId", type: "uint256" },
    { name: "newWallet", type: "address" },
    { name: "owner", type: "address" },
    { name: "deadline", type: "uint256" },
  ],
} as const;

/**
 * On-behalf-of signature check for wallets that are not a single key
 * (multisigs, contract accounts).
 */
export interface DelegatedSignatureValidator {
  isValidSignature(
    wallet: Address,
    digest: Bytes32,
    signature: Hex,
  ): Promise<boolean>;
}

export interface WalletProofDomain {
  readonly chainId: number;
  readonly registryAddress: Address;
}

export interface WalletProofMessage {
  readonly identityId: IdentityId;
  readonly newWallet: Address;
  readonly owner: Address;
  /** Unix seconds */
  readonly deadline: number;
}

export function walletProofDomain(domain: WalletProofDomain): TypedDataDomain {
  return {
    name: "IdentityRegistry",
    version: "1",
    chainId: domain.chainId,
    verifyingContract: domain.registryAddress,
  };
}

function typedData(domain: WalletProofDomain, message: WalletProofMessage) {
  return {
    domain: walletProofDomain(domain),
    types: VERIFIED_WALLET_TYPES,
    primaryType: "VerifiedWalletSet",
    message: {
      identityId: BigInt(message.identityId),
      newWallet: message.newWallet,
      owner: message.owner,
      deadline: BigInt(message.deadline),
    },
  } as const;
}

/**
 * EIP-712 digest a delegated validator is asked about.
 */
export function walletProofDigest(
  domain: WalletProofDomain,
  message: WalletProofMessage,
): Bytes32 {
  return hashTypedData(typedData(domain, message));
}

/**
 * Sign a verified-wallet proof with a local key. Used by wallets and tests.
 */
export function signWalletProof(
  account: LocalAccount,
  domain: WalletProofDomain,
  message: WalletProofMessage,
): Promise<Hex> {
  return account.signTypedData(typedData(domain, message));
}

/**
 * Check a proof: the signature either recovers to `newWallet` or the
 * delegated validator accepts it on the wallet's behalf.
 */
export async function verifyWalletProof(
  domain: WalletProofDomain,
  message: WalletProofMessage,
  signature: Hex,
  validator?: DelegatedSignatureValidator,
): Promise<boolean> {
  const data = typedData(domain, message);

  let recovered: Address | undefined;
  try {
    recovered = await recoverTypedDataAddress({ ...data, signature });
  } catch {
    // Not a recoverable ECDSA signature; only the validator can accept it
    recovered = undefined;
  }

  if (recovered !== undefined && isAddressEqual(recovered, message.newWallet)) {
    return true;
  }
  if (validator === undefined) {
    return false;
  }
  return validator.isValidSignature(
    message.newWallet,
    hashTypedData(data),
    signature,
  );
}
