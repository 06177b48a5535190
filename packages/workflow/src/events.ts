/**
 * Workflow notification payloads.
 *
 * `workflow.request.created` carries everything a bridge needs to act on
 * a request; result notifications carry the outcome and who produced it.
 */

import { z } from "zod";
import { isAddressLike, isBytes32, isHex } from "@tracebound/types";
import type { Address, Bytes32, Hex } from "@tracebound/types";

const address = z.custom<Address>(isAddressLike, {
  message: "Expected a 0x-prefixed 20-byte address",
});
const bytes32 = z.custom<Bytes32>(isBytes32, {
  message: "Expected a 0x-prefixed 32-byte value",
});
const hex = z.custom<Hex>(isHex, { message: "Expected 0x-prefixed hex bytes" });

export const ReviewParamsSchema = z.object({
  focus: z.array(z.string()),
});

export const ApprovalParamsSchema = z.object({
  reviewerEndpoint: z.string().optional(),
});

export const ReviewOutcomeSchema = z.object({
  summary: hex,
  comments: hex,
  approved: z.boolean(),
});

export const ApprovalOutcomeSchema = z.object({
  reason: hex,
  unresolvedBlockers: hex,
});

export const WorkflowKindSchema = z.enum(["review", "approval"]);

export const RequestCreatedSchema = z.object({
  authority: address,
  kind: WorkflowKindSchema,
  requestId: bytes32,
  requester: address,
  domainKey: z.string().min(1),
  correlationToken: bytes32,
  /** Validated per kind by the owning engine */
  params: z.record(z.unknown()),
  sequence: z.number().int().positive(),
  createdAt: z.string(),
});

export const ResultRecordedSchema = z.object({
  authority: address,
  requestId: bytes32,
  correlationToken: bytes32,
  domainKey: z.string(),
  /** Validated per kind by the owning engine */
  outcome: z.record(z.unknown()),
  fulfillingIdentityId: z.number().int().positive(),
  fulfilledAt: z.string(),
});

export const RequestCancelledSchema = z.object({
  authority: address,
  requestId: bytes32,
  cancelledAt: z.string(),
});

export type RequestCreatedPayload = z.infer<typeof RequestCreatedSchema>;
export type ResultRecordedPayload = z.infer<typeof ResultRecordedSchema>;
export type RequestCancelledPayload = z.infer<typeof RequestCancelledSchema>;
