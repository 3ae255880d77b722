// ---------------------------------------------------------------------------
// Bounded transaction retry with exponential backoff and jitter.
// ---------------------------------------------------------------------------

import { TransientStoreError } from "../core/errors.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface RetryOptions {
  /** Maximum number of retries (0 means no retries, just the initial call). */
  maxRetries: number;
  /** Base delay in milliseconds before the first retry. */
  baseDelayMs: number;
  /**
   * Predicate that decides whether a given error is retryable.
   *
   * When omitted only `TransientStoreError` is retried. Domain errors
   * (not found, conflict, forbidden, ...) are always surfaced to the caller.
   */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each retry with the attempt number (0-based) and error. */
  onRetry?: (attempt: number, error: unknown) => void;
}

function defaultShouldRetry(error: unknown): boolean {
  return error instanceof TransientStoreError;
}

// ── Delay helper ───────────────────────────────────────────────────────────

/**
 * Exponential backoff with full jitter (random value between 0 and the
 * exponential ceiling).
 */
function computeDelay(attempt: number, baseDelayMs: number): number {
  const exponential = baseDelayMs * 2 ** attempt;
  return Math.round(Math.random() * exponential);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Execute `fn`, retrying up to `maxRetries` times while `shouldRetry`
 * accepts the error. The last error is thrown once attempts run out.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { maxRetries, baseDelayMs, shouldRetry = defaultShouldRetry, onRetry } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (!shouldRetry(error) || attempt >= maxRetries) {
        throw error;
      }

      onRetry?.(attempt, error);
      await sleep(computeDelay(attempt, baseDelayMs));
    }
  }

  // Unreachable; keeps the compiler satisfied.
  throw lastError;
}
