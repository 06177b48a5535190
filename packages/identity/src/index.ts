/**
 * @tracebound/identity: Identity registry.
 *
 * Agent identities, their verified wallets and engine bindings,
 * ERC-721-style delegates, and the signed proofs that move a wallet.
 *
 * @packageDocumentation
 */

export { IdentityRegistry } from "./registry.js";
export { IdentityError } from "./errors.js";
export type {
  AgentIdentity,
  RegisterInput,
  IdentityRegistryOptions,
} from "./types.js";

export {
  VERIFIED_WALLET_TYPES,
  walletProofDomain,
  walletProofDigest,
  signWalletProof,
  verifyWalletProof,
} from "./proof.js";
export type {
  DelegatedSignatureValidator,
  WalletProofDomain,
  WalletProofMessage,
} from "./proof.js";

export {
  IdentityRegisteredSchema,
  WalletSetSchema,
  AuthoritySetSchema,
  MetadataSetSchema,
  CardSetSchema,
  ApprovalSetSchema,
  OperatorSetSchema,
  TransferredSchema,
  parseIdentityEvent,
} from "./events.js";
export type {
  IdentityEvent,
  IdentityRegisteredPayload,
  WalletSetPayload,
  AuthoritySetPayload,
  MetadataSetPayload,
  CardSetPayload,
  ApprovalSetPayload,
  OperatorSetPayload,
  TransferredPayload,
} from "./events.js";
