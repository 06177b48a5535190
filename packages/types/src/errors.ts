/**
 * Protocol error taxonomy.
 *
 * Every rejected call surfaces one of these codes so a caller can tell
 * "already handled" (INVALID_STATE) from "not authorized" (UNAUTHORIZED)
 * from "bad input" (everything else).
 */

export type ProtocolErrorCode =
  | "UNKNOWN_ENTITY"
  | "INVALID_STATE"
  | "DOMAIN_KEY_MISMATCH"
  | "UNAUTHORIZED"
  | "RESERVED_KEY_VIOLATION"
  | "EXPIRED_OR_INVALID_PROOF"
  | "EMPTY_HANDLE"
  | "INVALID_INPUT";

export class ProtocolError extends Error {
  public readonly code: ProtocolErrorCode;
  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
  }
}

const PROTOCOL_ERROR_CODES = new Set<string>([
  "UNKNOWN_ENTITY",
  "INVALID_STATE",
  "DOMAIN_KEY_MISMATCH",
  "UNAUTHORIZED",
  "RESERVED_KEY_VIOLATION",
  "EXPIRED_OR_INVALID_PROOF",
  "EMPTY_HANDLE",
  "INVALID_INPUT",
]);

export function isProtocolErrorCode(value: unknown): value is ProtocolErrorCode {
  return typeof value === "string" && PROTOCOL_ERROR_CODES.has(value);
}

/**
 * Read the protocol code off any error-like value, including errors
 * rebuilt from an HTTP error envelope.
 */
export function protocolErrorCode(err: unknown): ProtocolErrorCode | undefined {
  if (err === null || typeof err !== "object") return undefined;
  const code = "code" in err ? err.code : undefined;
  return isProtocolErrorCode(code) ? code : undefined;
}
