/**
 * Retry utility with exponential backoff for transient provider errors.
 */

export interface RetryOptions {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryableStatusCodes: Set<number>;
  retryableErrorCodes: Set<string>;
  /** Aborting stops further attempts and cancels the pending backoff. */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  backoffMultiplier: 2,
  retryableStatusCodes: new Set([408, 429, 500, 502, 503, 504]),
  retryableErrorCodes: new Set([
    "ECONNRESET",
    "ETIMEDOUT",
    "ECONNREFUSED",
    "UND_ERR_CONNECT_TIMEOUT",
    "UND_ERR_SOCKET",
  ]),
};

export class RetryableProviderError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly responseBody: string,
    public readonly retryAfterMs?: number,
  ) {
    super(`Provider returned ${statusCode}: ${responseBody}`);
    this.name = "RetryableProviderError";
  }
}

export class ProviderHttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly responseBody: string,
  ) {
    super(`Provider returned ${statusCode}: ${responseBody}`);
    this.name = "ProviderHttpError";
  }
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

function isRetryableError(err: unknown, options: RetryOptions): boolean {
  if (err instanceof RetryableProviderError) return true;

  if (err instanceof Error) {
    // per-attempt timeout from AbortSignal.timeout()
    if (err.name === "TimeoutError") return true;
    const code = errorCode(err);
    if (code && options.retryableErrorCodes.has(code)) return true;
    const causeCode = errorCode(err.cause);
    if (causeCode && options.retryableErrorCodes.has(causeCode)) return true;
  }

  return false;
}

function getRetryDelay(
  err: unknown,
  attempt: number,
  options: RetryOptions,
): number {
  // Respect Retry-After header if available
  if (err instanceof RetryableProviderError && err.retryAfterMs) {
    return Math.min(err.retryAfterMs, options.maxDelayMs);
  }

  const delay = options.initialDelayMs * options.backoffMultiplier ** attempt;
  return Math.min(delay, options.maxDelayMs);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Execute a function with retry and exponential backoff.
 * Only retries on transient errors (retryable status codes, network errors,
 * per-attempt timeouts). Non-retryable errors propagate immediately, and
 * nothing is retried once the caller's signal has fired.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: Partial<RetryOptions>,
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));

      if (
        opts.signal?.aborted ||
        !isRetryableError(err, opts) ||
        attempt === opts.maxRetries
      ) {
        throw error;
      }

      lastError = error;
      await sleep(getRetryDelay(err, attempt, opts), opts.signal);
    }
  }

  throw lastError ?? new Error("Retry exhausted with no error");
}

/**
 * Perform a fetch with automatic retry on transient errors. Each attempt gets
 * its own timeout; the caller's signal cancels everything.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  options?: Partial<RetryOptions> & { timeoutMs?: number },
): Promise<Response> {
  const { timeoutMs, ...retryOptions } = options ?? {};

  return withRetry(async () => {
    const signals: AbortSignal[] = [];
    if (timeoutMs !== undefined) signals.push(AbortSignal.timeout(timeoutMs));
    if (retryOptions.signal) signals.push(retryOptions.signal);
    const signal =
      signals.length > 1 ? AbortSignal.any(signals) : signals[0];

    const response = await fetch(url, { ...init, ...(signal && { signal }) });

    if (!response.ok) {
      const text = await response.text();
      const retryableStatusCodes =
        retryOptions.retryableStatusCodes ??
        DEFAULT_OPTIONS.retryableStatusCodes;

      if (retryableStatusCodes.has(response.status)) {
        const retryAfter = response.headers.get("retry-after");
        const retryAfterMs = retryAfter
          ? parseRetryAfter(retryAfter)
          : undefined;
        throw new RetryableProviderError(
          response.status,
          text,
          retryAfterMs,
        );
      }

      throw new ProviderHttpError(response.status, text);
    }

    return response;
  }, retryOptions);
}

export function parseRetryAfter(value: string): number | undefined {
  const seconds = Number.parseInt(value, 10);
  if (!Number.isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const ms = date - Date.now();
    return ms > 0 ? ms : undefined;
  }

  return undefined;
}
