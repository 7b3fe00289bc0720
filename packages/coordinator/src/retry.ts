/**
 * @multicustody/coordinator: Retry with exponential backoff.
 *
 * Used by the XRPL gateway around submission only. Delay before retry n
 * (zero-based) is min(baseDelayMs * 2^n + jitter, maxDelayMs) with
 * jitter drawn from [0, jitterMs).
 */

export interface RetryPolicy {
  /** Attempts including the first. Default: 3 */
  readonly maxAttempts: number;
  /** Default: 500 */
  readonly baseDelayMs: number;
  /** Default: 10000 */
  readonly maxDelayMs: number;
  /** Default: 100 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitterMs: 100,
};

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${String(attempts)} attempts: ${msg}`, { cause: lastError });
    this.name = "RetryExhaustedError";
  }
}

export interface RetryOptions {
  readonly policy?: RetryPolicy;
  /** Default: every error is retried */
  readonly shouldRetry?: (err: unknown) => boolean;
  /** Injectable for tests */
  readonly sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(retry: number, policy: RetryPolicy): number {
  const exponential = policy.baseDelayMs * 2 ** retry;
  return Math.min(exponential + Math.random() * policy.jitterMs, policy.maxDelayMs);
}

/**
 * Run `fn` until it resolves, a non-retryable error occurs (rethrown as is)
 * or the attempts run out (RetryExhaustedError).
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const shouldRetry = options.shouldRetry ?? (() => true);
  const pause = options.sleep ?? sleep;

  let lastError: unknown;
  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;
      if (!shouldRetry(err)) {
        throw err;
      }
      if (attempt < policy.maxAttempts - 1) {
        await pause(backoffDelay(attempt, policy));
      }
    }
  }

  throw new RetryExhaustedError(policy.maxAttempts, lastError);
}

/**
 * Transient XRPL failures: dropped connections, timeouts and `tel`/`ter`
 * engine results. Malformed (`tem`), failed (`tef`) and claimed-fee (`tec`)
 * results will not change on resubmission.
 */
export function isTransientXrplError(err: unknown): boolean {
  if (!(err instanceof Error)) return true;

  if (/\b(tem|tef|tec)[A-Z_]+\b/.test(err.message)) return false;
  return !/not connected/i.test(err.message);
}
