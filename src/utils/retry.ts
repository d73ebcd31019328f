/**
 * Retry Utility with Exponential Backoff
 *
 * Handles transient provider failures with:
 * - Exponential backoff (1s, 2s, 4s), capped at maxDelayMs
 * - Retry on rate limits (429), 5xx, network resets
 * - No retry on auth errors (401, 403), bad requests (400) or aborted calls
 */

import { createLogger } from "./logger";
import { errorMessage, isAbortError } from "../lib/errors";

const log = createLogger("Retry");

export interface RetryOptions {
  maxAttempts?: number; // Default: 3
  initialDelayMs?: number; // Default: 1000ms
  maxDelayMs?: number; // Default: 8000ms
  backoffMultiplier?: number; // Default: 2
  retryableStatusCodes?: number[]; // Default: [429, 500, 502, 503, 504]
  signal?: AbortSignal;
}

export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(message);
    this.name = "RetryExhaustedError";
  }
}

const RETRYABLE_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "ENETUNREACH",
  "ECONNREFUSED",
]);

/**
 * Execute a function with retry logic and exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 1000,
    maxDelayMs = 8000,
    backoffMultiplier = 2,
    retryableStatusCodes = [429, 500, 502, 503, 504],
    signal,
  } = options;

  let lastError: unknown;
  let delay = initialDelayMs;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (signal?.aborted || isAbortError(error)) {
        throw error;
      }

      if (attempt === maxAttempts) {
        break;
      }

      if (!isRetryableError(error, retryableStatusCodes)) {
        throw error;
      }

      log.warn(
        `Attempt ${attempt}/${maxAttempts} failed: ${errorMessage(error)}. Retrying in ${delay}ms...`
      );

      await sleep(delay);
      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }

  throw new RetryExhaustedError(
    `Failed after ${maxAttempts} attempts: ${errorMessage(lastError)}`,
    maxAttempts,
    lastError
  );
}

function readField(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

/**
 * Determine if an error is retryable
 */
export function isRetryableError(
  error: unknown,
  retryableStatusCodes: number[]
): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }

  const code = readField(error, "code");
  if (typeof code === "string" && RETRYABLE_NETWORK_CODES.has(code)) {
    return true;
  }

  const status = readField(error, "status");
  if (typeof status === "number" && retryableStatusCodes.includes(status)) {
    return true;
  }

  const message = errorMessage(error).toLowerCase();
  return message.includes("rate limit") || message.includes("too many requests");
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
