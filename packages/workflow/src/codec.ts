/**
 * Outcome fields are opaque bytes. These helpers move text and JSON
 * in and out of them.
 */

import { hexToString, stringToHex } from "viem";
import type { Hex } from "@tracebound/types";

export function encodeText(text: string): Hex {
  return text.length === 0 ? "0x" : stringToHex(text);
}

export function decodeText(bytes: Hex): string {
  return bytes === "0x" ? "" : hexToString(bytes);
}

export function encodeJson(value: unknown): Hex {
  return stringToHex(JSON.stringify(value));
}

/** @returns undefined for empty bytes */
export function decodeJson(bytes: Hex): unknown {
  return bytes === "0x" ? undefined : JSON.parse(hexToString(bytes));
}
