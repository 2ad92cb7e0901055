// Backoff for connector requests: delay doubles per attempt, capped, with jitter

export interface RetryOptions {
  maxRetries: number;     // attempts after the first
  baseDelay: number;      // milliseconds
  maxDelay: number;       // milliseconds
  jitterFactor: number;   // 0-1 (e.g., 0.1 = 10% jitter)
}

export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(message);
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Non-2xx HTTP response. Carries the status so retry predicates can inspect it.
 */
export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    statusText: string
  ) {
    super(`HTTP ${statusCode}: ${statusText}`);
    this.name = 'HttpError';
  }
}

const TRANSIENT_NETWORK_MARKERS = ['timeout', 'econnrefused', 'econnreset', 'enotfound', 'fetch failed', 'network'];

function backoffDelay(retry: number, options: RetryOptions): number {
  const capped = Math.min(options.baseDelay * 2 ** retry, options.maxDelay);
  const spread = capped * options.jitterFactor;
  return Math.max(0, capped + (Math.random() * 2 - 1) * spread);
}

function wait(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function asError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
  isRetryable: (error: Error) => boolean,
  onRetry?: (error: Error, attempt: number, delayMs: number) => void
): Promise<T> {
  const attempts = options.maxRetries + 1;
  let lastError = new Error('Operation was not attempted');

  for (let retry = 0; retry < attempts; retry++) {
    try {
      return await operation();
    } catch (caught) {
      lastError = asError(caught);
      if (!isRetryable(lastError)) throw lastError;
      if (retry === attempts - 1) break;

      const delay = backoffDelay(retry, options);
      onRetry?.(lastError, retry + 1, delay);
      await wait(delay);
    }
  }

  throw new RetryExhaustedError(`Operation failed after ${attempts} attempts`, attempts, lastError);
}

/**
 * 429 and 5xx responses, timeouts and connection failures are worth another
 * attempt. Other 4xx responses are not.
 */
export function isRetryableRequestError(error: Error): boolean {
  if (error instanceof HttpError) {
    return error.statusCode === 429 || error.statusCode >= 500;
  }
  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return true;
  }
  const message = error.message.toLowerCase();
  return TRANSIENT_NETWORK_MARKERS.some(marker => message.includes(marker));
}
