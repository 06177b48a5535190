/**
 * Bridge errors.
 *
 * One class covers provider and node failures. `code` is either a
 * transport code (TIMEOUT, NETWORK_ERROR, SERVER_ERROR, PROVIDER_ERROR,
 * INVALID_PROVIDER_RESPONSE) or the code the node put in its error
 * envelope, so a rejected submission still reads as INVALID_STATE.
 */

export class BridgeError extends Error {
  readonly code: string;

  /** HTTP status, or 0 when no response arrived */
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode = 0, details?: unknown) {
    super(message);
    this.name = "BridgeError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
