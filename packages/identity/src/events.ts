/**
 * Identity registry event payloads.
 *
 * Payloads are validated with zod when the registry replays stored events,
 * so a log written by a different build cannot corrupt registry state.
 */

import { z } from "zod";
import { PROTOCOL_EVENTS } from "@tracebound/event-store";
import { isAddressLike, isHex } from "@tracebound/types";
import type { Address, Hex } from "@tracebound/types";

const address = z.custom<Address>(isAddressLike, {
  message: "Expected a 0x-prefixed 20-byte address",
});
const hex = z.custom<Hex>(isHex, { message: "Expected 0x-prefixed hex bytes" });
const identityId = z.number().int().positive();

export const IdentityRegisteredSchema = z.object({
  identityId,
  owner: address,
  boundAuthority: address,
  cardReference: z.string(),
  metadata: z.record(hex),
  registeredAt: z.string(),
});

export const WalletSetSchema = z.object({
  identityId,
  wallet: address,
});

export const AuthoritySetSchema = z.object({
  identityId,
  authority: address,
});

export const MetadataSetSchema = z.object({
  identityId,
  key: z.string().min(1),
  value: hex,
});

export const CardSetSchema = z.object({
  identityId,
  cardReference: z.string(),
});

export const ApprovalSetSchema = z.object({
  identityId,
  spender: address,
});

export const OperatorSetSchema = z.object({
  owner: address,
  operator: address,
  approved: z.boolean(),
});

export const TransferredSchema = z.object({
  identityId,
  from: address,
  to: address,
});

export type IdentityRegisteredPayload = z.infer<typeof IdentityRegisteredSchema>;
export type WalletSetPayload = z.infer<typeof WalletSetSchema>;
export type AuthoritySetPayload = z.infer<typeof AuthoritySetSchema>;
export type MetadataSetPayload = z.infer<typeof MetadataSetSchema>;
export type CardSetPayload = z.infer<typeof CardSetSchema>;
export type ApprovalSetPayload = z.infer<typeof ApprovalSetSchema>;
export type OperatorSetPayload = z.infer<typeof OperatorSetSchema>;
export type TransferredPayload = z.infer<typeof TransferredSchema>;

/**
 * Every identity event, discriminated by type.
 */
export type IdentityEvent =
  | { readonly type: typeof PROTOCOL_EVENTS.IDENTITY_REGISTERED; readonly payload: IdentityRegisteredPayload }
  | { readonly type: typeof PROTOCOL_EVENTS.IDENTITY_WALLET_SET; readonly payload: WalletSetPayload }
  | { readonly type: typeof PROTOCOL_EVENTS.IDENTITY_AUTHORITY_SET; readonly payload: AuthoritySetPayload }
  | { readonly type: typeof PROTOCOL_EVENTS.IDENTITY_METADATA_SET; readonly payload: MetadataSetPayload }
  | { readonly type: typeof PROTOCOL_EVENTS.IDENTITY_CARD_SET; readonly payload: CardSetPayload }
  | { readonly type: typeof PROTOCOL_EVENTS.IDENTITY_APPROVAL_SET; readonly payload: ApprovalSetPayload }
  | { readonly type: typeof PROTOCOL_EVENTS.IDENTITY_OPERATOR_SET; readonly payload: OperatorSetPayload }
  | { readonly type: typeof PROTOCOL_EVENTS.IDENTITY_TRANSFERRED; readonly payload: TransferredPayload };

/**
 * Parse a stored event into an identity event.
 *
 * @returns undefined for events of other components
 * @throws ZodError when an identity event's payload is malformed
 */
export function parseIdentityEvent(
  type: string,
  payload: unknown,
): IdentityEvent | undefined {
  switch (type) {
    case PROTOCOL_EVENTS.IDENTITY_REGISTERED:
      return { type, payload: IdentityRegisteredSchema.parse(payload) };
    case PROTOCOL_EVENTS.IDENTITY_WALLET_SET:
      return { type, payload: WalletSetSchema.parse(payload) };
    case PROTOCOL_EVENTS.IDENTITY_AUTHORITY_SET:
      return { type, payload: AuthoritySetSchema.parse(payload) };
    case PROTOCOL_EVENTS.IDENTITY_METADATA_SET:
      return { type, payload: MetadataSetSchema.parse(payload) };
    case PROTOCOL_EVENTS.IDENTITY_CARD_SET:
      return { type, payload: CardSetSchema.parse(payload) };
    case PROTOCOL_EVENTS.IDENTITY_APPROVAL_SET:
      return { type, payload: ApprovalSetSchema.parse(payload) };
    case PROTOCOL_EVENTS.IDENTITY_OPERATOR_SET:
      return { type, payload: OperatorSetSchema.parse(payload) };
    case PROTOCOL_EVENTS.IDENTITY_TRANSFERRED:
      return { type, payload: TransferredSchema.parse(payload) };
    default:
      return undefined;
  }
}
