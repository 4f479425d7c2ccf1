export interface RetryPolicy {
  /** Number of retries after the first attempt */
  retries: number;
  initialMs: number;
  maxMs: number;
  multiplier: number;
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 5,
  initialMs: 200,
  maxMs: 10_000,
  multiplier: 2,
  jitter: 0.2,
};

function applyJitter(baseMs: number, jitter: number): number {
  if (jitter <= 0) {
    return baseMs;
  }

  const spread = baseMs * jitter;
  const min = Math.max(0, baseMs - spread);
  const max = baseMs + spread;
  return Math.floor(min + Math.random() * (max - min));
}

export function getBackoffMs(policy: RetryPolicy, attempt: number): number {
  const base = Math.min(
    policy.maxMs,
    Math.floor(policy.initialMs * Math.pow(policy.multiplier, attempt)),
  );

  return applyJitter(base, policy.jitter);
}

export function waitMs(durationMs: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, durationMs));
}

export interface RetryOptions {
  policy: RetryPolicy;
  /** Errors for which this returns false are rethrown immediately */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

/**
 * Runs `operation` until it resolves, sleeping with exponential backoff
 * between attempts. The last error is rethrown once retries are exhausted.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  let attempt = 0;

  while (true) {
    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = options.shouldRetry?.(error) ?? true;
      if (
        !retryable ||
        attempt >= options.policy.retries ||
        options.signal?.aborted
      ) {
        throw error;
      }

      const delayMs = getBackoffMs(options.policy, attempt);
      attempt += 1;
      options.onRetry?.(error, attempt, delayMs);
      await waitMs(delayMs);
    }
  }
}
