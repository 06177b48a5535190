/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import { getAddress, isAddress } from "viem";
import { isBytes32, isHex } from "@tracebound/types";
import type { Address, Bytes32, Hex } from "@tracebound/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), "Expected a 0x-prefixed 20-byte address")
  .transform((v): Address => getAddress(v));

export const Bytes32Schema = z.custom<Bytes32>(isBytes32, {
  message: "Expected a 0x-prefixed 32-byte value",
});

export const HexSchema = z.custom<Hex>(isHex, { message: "Expected 0x-prefixed hex bytes" });

export const IdentityIdSchema = z.coerce.number().int().positive();

export const TokenStrategySchema = z.enum(["deterministic", "random"]);

// =============================================================================
// Identity DTOs
// =============================================================================

export const RegisterIdentitySchema = z.object({
  cardReference: z.string().max(2048).optional(),
  metadata: z.record(HexSchema).optional(),
  boundAuthority: AddressSchema.optional(),
});

export type RegisterIdentityDto = z.infer<typeof RegisterIdentitySchema>;

export const SetMetadataSchema = z.object({
  value: HexSchema,
});

export const SetWalletSchema = z.object({
  wallet: AddressSchema,
  /** Unix seconds */
  deadline: z.number().int().nonnegative(),
  signature: HexSchema,
});

export type SetWalletDto = z.infer<typeof SetWalletSchema>;

export const SetAuthoritySchema = z.object({
  authority: AddressSchema,
});

export const SetCardSchema = z.object({
  cardReference: z.string().max(2048),
});

export const ApproveSpenderSchema = z.object({
  spender: AddressSchema,
});

export const TransferIdentitySchema = z.object({
  from: AddressSchema,
  to: AddressSchema,
});

export const SetOperatorSchema = z.object({
  approved: z.boolean(),
});

// =============================================================================
// Workflow DTOs
// =============================================================================

const RequestBaseSchema = z.object({
  domainKey: z.string().min(1).max(256),
  correlationToken: Bytes32Schema.optional(),
  tokenStrategy: TokenStrategySchema.optional(),
});

export const CreateReviewSchema = RequestBaseSchema.extend({
  focus: z.array(z.string().min(1)).default([]),
});

export type CreateReviewDto = z.infer<typeof CreateReviewSchema>;

export const CreateApprovalSchema = RequestBaseSchema.extend({
  reviewerEndpoint: z.string().min(1).optional(),
});

export type CreateApprovalDto = z.infer<typeof CreateApprovalSchema>;

const FulfillBaseSchema = z.object({
  identityId: z.number().int().positive(),
  domainKey: z.string().min(1),
});

export const FulfillReviewSchema = FulfillBaseSchema.extend({
  summary: HexSchema,
  comments: HexSchema,
  approved: z.boolean(),
});

export const DecideApprovalSchema = FulfillBaseSchema.extend({
  reason: HexSchema,
});

export const NeedsRevisionSchema = DecideApprovalSchema.extend({
  unresolvedBlockers: HexSchema,
});

// =============================================================================
// Query DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  fromPosition: z.coerce.number().int().min(1).default(1),
  maxCount: z.coerce.number().int().min(1).max(1000).default(100),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
