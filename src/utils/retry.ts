import { log, LogLevel } from "./logger";

export interface RetryOptions {
  maxAttempts?: number; // total attempts including the first
  baseDelayMs?: number; // starting delay
  maxDelayMs?: number; // upper bound on delay
  shouldRetry?: (err: unknown) => boolean;
}

/**
 * Delay before the attempt following `attempt` (1-based): exponential, capped,
 * plus up to 100ms of jitter.
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs) + random() * 100;
}

/**
 * Resolves after `ms`, or early (without rejecting) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Executes an asynchronous function with an exponential backoff strategy and randomized jitter.
 * @param fn - The asynchronous function or API call to execute
 * @param options - Configuration for max attempts and delay timing (base and cap)
 * @returns The resolved value of the provided function `fn`
 * @throws The final error encountered if the maximum number of attempts is exhausted
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 5,
    baseDelayMs = 500,
    maxDelayMs = 10_000,
    shouldRetry = () => true
  } = options;

  let attempt = 1;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxAttempts || !shouldRetry(err)) {
        throw err;
      }

      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);

      log(
        LogLevel.WARN,
        "Retry",
        `Retryable error on attempt ${attempt}/${maxAttempts}, retrying in ${Math.round(
          delay
        )}ms: ${err instanceof Error ? err.message : String(err)}`
      );

      await sleep(delay);
      attempt += 1;
    }
  }
}
