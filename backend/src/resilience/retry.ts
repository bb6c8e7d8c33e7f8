import { ConnectionError, TimeoutError, TransientServiceError } from "../errors.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  jitterRatio: number;
  isRetryable: (error: unknown) => boolean;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "ENOTFOUND",
  "EPIPE",
]);

export function isTransientError(error: unknown): boolean {
  return error instanceof TransientServiceError;
}

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 3,
    baseDelayMs: 1000,
    multiplier: 2,
    maxDelayMs: 10000,
    jitterRatio: 0,
    isRetryable: isTransientError,
    ...overrides,
  };
}

/**
 * Delay before the attempt following `failedAttempt` (1-based):
 * base * multiplier^(failedAttempt - 1), jittered upwards, capped at maxDelayMs.
 */
export function computeBackoffDelay(policy: RetryPolicy, failedAttempt: number): number {
  const exponential = policy.baseDelayMs * policy.multiplier ** Math.max(0, failedAttempt - 1);
  const random = policy.random ?? Math.random;
  const jitter = policy.jitterRatio > 0 ? exponential * policy.jitterRatio * random() : 0;
  return Math.min(policy.maxDelayMs, Math.round(exponential + jitter));
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

/**
 * Maps low-level socket failures onto ConnectionError so the retry policy
 * can recognise them. Anything else is returned untouched.
 */
export function classifyFailure(error: unknown): unknown {
  if (error instanceof TimeoutError || error instanceof ConnectionError) {
    return error;
  }
  const code = errorCode(error);
  const cause = error instanceof Error && error.cause !== undefined ? errorCode(error.cause) : undefined;
  const networkCode = [code, cause].find((value) => value !== undefined && NETWORK_ERROR_CODES.has(value));
  if (networkCode) {
    const message = error instanceof Error ? error.message : String(error);
    return new ConnectionError(`${networkCode}: ${message}`, { cause: error });
  }
  return error;
}

export async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}
