/**
 * Path parameter parsing shared by the route modules.
 */

import { getAddress, isAddress } from "viem";
import { isBytes32 } from "@tracebound/types";
import type { Address, Bytes32, IdentityId } from "@tracebound/types";
import { ApiError } from "../types/error.js";

export function identityIdParam(raw: string): IdentityId {
  const id = Number(raw);
  if (!Number.isInteger(id) || id < 1) {
    throw new ApiError("VALIDATION_ERROR", `"${raw}" is not an identity id`, 400);
  }
  return id;
}

export function bytes32Param(raw: string, name: string): Bytes32 {
  if (!isBytes32(raw)) {
    throw new ApiError("VALIDATION_ERROR", `${name} must be a 0x-prefixed 32-byte value`, 400);
  }
  return raw;
}

export function addressParam(raw: string, name: string): Address {
  if (!isAddress(raw, { strict: false })) {
    throw new ApiError("VALIDATION_ERROR", `${name} must be an address`, 400);
  }
  return getAddress(raw);
}
