import { retryWithBackoff, type RetryOptions } from "./retry";

export interface FetchWithRetryOptions extends RetryOptions {
  acceptableStatus?: (status: number) => boolean;
}

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(
      status >= 500
        ? `Server error ${status} for ${url}`
        : `Non-retryable HTTP error ${status} for ${url}`
    );
    this.name = "HttpStatusError";
  }

  get retryable(): boolean {
    return this.status >= 500 && this.status < 600;
  }
}

/**
 * Wraps the native fetch API with automated retry logic for transient failures.
 * Specifically targets 5xx server errors and network-level exceptions for retries,
 * while 4xx responses fail on the first attempt.
 * @param url - The destination endpoint
 * @param init - Standard RequestInit options (headers, method, body, etc.)
 * @param options - Configuration for retry behavior including acceptable status codes
 * @returns A promise resolving to the successful Response object
 * @example
 * await fetchWithRetry('https://solver.example/in.php', { method: 'POST', body }, { maxAttempts: 2 })
 */
export async function fetchWithRetry(
  url: string,
  init?: RequestInit,
  options: FetchWithRetryOptions = {}
): Promise<Response> {
  const {
    acceptableStatus = (status) => status >= 200 && status < 300,
    maxAttempts,
    baseDelayMs,
    maxDelayMs
  } = options;

  return retryWithBackoff(
    async () => {
      const res = await fetch(url, init);

      if (!acceptableStatus(res.status)) {
        throw new HttpStatusError(res.status, url);
      }

      return res;
    },
    {
      maxAttempts,
      baseDelayMs,
      maxDelayMs,
      // Retry on 5xx and network errors, fail fast on 4xx
      shouldRetry: (err) => !(err instanceof HttpStatusError) || err.retryable
    }
  );
}
