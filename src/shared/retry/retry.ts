export type RetryAttemptInfo = {
  attempt: number;       // 1-based number of the attempt that just failed
  maxAttempts: number;
  error: unknown;
};

export type RetryOptions = {
  retries: number;          // extra attempts after the first one
  minDelayMs: number;
  maxDelayMs: number;
  onRetry?: (info: RetryAttemptInfo & { delayMs: number }) => void;
  onGiveUp?: (info: RetryAttemptInfo) => void;
  randomFn?: () => number;
  sleepFn?: (ms: number) => Promise<void>;
};

const jitterRatio = 0.2;

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Exponential backoff: minDelayMs * 2^(n-1) capped at maxDelayMs, plus up to 20% of
 * that as random jitter.
 */
export const computeBackoffMs = (
  failedAttempts: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn">
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random } = opts;
  const backoff = Math.min(maxDelayMs, minDelayMs * Math.pow(2, failedAttempts - 1));
  const jitter = Math.floor(backoff * jitterRatio * Math.min(1, Math.max(0, randomFn())));
  return backoff + jitter;
};

export const retry = async <T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, onRetry, onGiveUp, sleepFn = sleep } = opts;
  const maxAttempts = retries + 1;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts) {
        onGiveUp?.({ attempt, maxAttempts, error: err });
        throw err;
      }

      const delayMs = computeBackoffMs(attempt, opts);
      onRetry?.({ attempt, maxAttempts, delayMs, error: err });
      await sleepFn(delayMs);
    }
  }
};
