/**
 * Retries for the Supabase-backed configuration store.
 *
 * Only transient failures are retried: dropped connections, pool exhaustion,
 * rate limiting and 5xx gateways. Constraint violations and bad input fail at once.
 */

import type { PostgrestError } from "@supabase/supabase-js";
import { getErrorMessage } from "@/lib/errors";

export interface RetryConfig {
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Delay before the first retry; doubles each time (default: 100) */
  baseDelayMs?: number;
  /** Upper bound on a single delay (default: 5000) */
  maxDelayMs?: number;
  /** Source of randomness for jitter, in [0, 1) */
  random?: () => number;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

type ResolvedRetryConfig = Required<RetryConfig>;

const DEFAULTS: ResolvedRetryConfig = {
  maxRetries: 3,
  baseDelayMs: 100,
  maxDelayMs: 5000,
  random: Math.random,
  onRetry: (error, attempt, delayMs) => {
    console.warn(`[supabase-retry] Attempt ${attempt} failed: ${describe(error)}. Retrying in ${delayMs}ms`);
  },
};

// Postgres connection/serialization classes and PostgREST pool errors
const TRANSIENT_CODES = new Set([
  "PGRST301",
  "PGRST302",
  "40001",
  "40P01",
  "57P01",
  "57P03",
  "53300",
  "08000",
  "08003",
  "08006",
]);

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

const TRANSIENT_MESSAGE =
  /network|timeout|timed out|fetch failed|socket hang up|econnreset|econnrefused|etimedout|enotfound|connection pool|too many connections|rate limit|temporarily unavailable/i;

export function isPostgrestError(error: unknown): error is PostgrestError {
  return (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string" &&
    ("code" in error || "details" in error || "hint" in error)
  );
}

function describe(error: unknown): string {
  return isPostgrestError(error) ? error.message : getErrorMessage(error);
}

export function isTransientError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;

  if (isPostgrestError(error) && TRANSIENT_CODES.has(error.code)) {
    return true;
  }
  if ("status" in error && typeof error.status === "number") {
    return TRANSIENT_STATUSES.has(error.status);
  }
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return true;
  }
  return "message" in error && typeof error.message === "string" && TRANSIENT_MESSAGE.test(error.message);
}

/**
 * Delay before retry number `attempt` (1-based): the doubled base delay, capped,
 * with its upper half randomized.
 */
export function backoffDelay(attempt: number, config: RetryConfig = {}): number {
  const { baseDelayMs, maxDelayMs, random } = { ...DEFAULTS, ...config };
  const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  return Math.round(ceiling / 2 + (ceiling / 2) * random());
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    super(`Gave up after ${attempts} attempts: ${describe(lastError)}`, { cause: lastError });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

export async function withRetry<T>(operation: () => Promise<T>, config: RetryConfig = {}): Promise<T> {
  const resolved: ResolvedRetryConfig = { ...DEFAULTS, ...config };

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isTransientError(error)) throw error;
      if (attempt > resolved.maxRetries) throw new RetryExhaustedError(attempt, error);

      const delayMs = backoffDelay(attempt, resolved);
      resolved.onRetry(error, attempt, delayMs);
      await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
    }
  }
}

/**
 * Run a Supabase query with retries and unwrap its `{ data, error }` result.
 * A query that succeeds with no rows resolves to null.
 */
export function withSupabaseRetry<T>(
  query: () => PromiseLike<{ data: T | null; error: PostgrestError | null }>,
  config?: RetryConfig
): Promise<T | null> {
  return withRetry(async () => {
    const { data, error } = await query();
    if (error) throw error;
    return data;
  }, config);
}
