/**
 * Retry with exponential backoff.
 *
 * Wraps provider calls and fulfillment submissions. Protocol rejections
 * are final: retrying an INVALID_STATE or UNAUTHORIZED submission can
 * only fail the same way.
 *
 * Backoff formula: min(baseDelayMs * 2^attempt + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

import { protocolErrorCode } from "@tracebound/types";
import { BridgeError } from "./errors.js";

export interface RetryConfig {
  /** Maximum number of attempts (including the first try). Default: 3 */
  readonly maxAttempts: number;
  /** Base delay in ms before first retry. Default: 500 */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. Default: 10000 */
  readonly maxDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 200 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10000,
  jitterMs: 200,
};

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} retry attempts exhausted. Last error: ${msg}`);
    this.name = "RetryExhaustedError";
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * @param attempt - Zero-based attempt index (0 = first retry)
 */
export function computeDelay(attempt: number, config: RetryConfig): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

export interface RetryOptions {
  readonly config?: RetryConfig;

  /** Default: every error is retryable */
  readonly shouldRetry?: (err: unknown) => boolean;
  readonly sleepFn?: (ms: number) => Promise<void>;

  /** Called before each backoff sleep */
  readonly onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Execute `fn`, retrying retryable failures.
 *
 * @throws RetryExhaustedError if all attempts fail
 * @throws The original error if `shouldRetry` returns false
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const config = options.config ?? DEFAULT_RETRY_CONFIG;
  const shouldRetry = options.shouldRetry ?? (() => true);
  const sleepFn = options.sleepFn ?? sleep;
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;

      if (!shouldRetry(err)) {
        throw err;
      }

      if (attempt < config.maxAttempts - 1) {
        const delay = computeDelay(attempt, config);
        options.onRetry?.(err, attempt + 1, delay);
        await sleepFn(delay);
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}

const PERMANENT_BRIDGE_CODES = new Set([
  "PROVIDER_ERROR",
  "INVALID_PROVIDER_RESPONSE",
  "CLIENT_ERROR",
  "VALIDATION_ERROR",
]);

/**
 * Retry network failures, timeouts and 5xx responses. Protocol
 * rejections, provider tool errors and other 4xx responses are final.
 */
export function isRetryable(err: unknown): boolean {
  if (protocolErrorCode(err) !== undefined) return false;
  if (err instanceof BridgeError) {
    if (PERMANENT_BRIDGE_CODES.has(err.code)) return false;
    return err.statusCode === 0 || err.statusCode >= 500;
  }
  return true;
}
