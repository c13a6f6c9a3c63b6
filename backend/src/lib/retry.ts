/**
 * Bounded retries with exponential backoff for upstream calls.
 * Only transient upstream failures are retried; permanent failures
 * (not-found, malformed payloads, non-retryable HTTP errors) surface at once.
 */
import { config } from './config.js';
import { isRetryable, UpstreamUnavailableError } from './errors.js';

export interface RetryOptions {
  maxAttempts?: number;
  initialMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  // No further attempts once aborted
  signal?: AbortSignal;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = config.upstream.maxAttempts,
    initialMs = config.upstream.initialBackoffMs,
    sleep = defaultSleep,
    onRetry,
    signal,
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryable(error) || signal?.aborted) {
        throw error;
      }
      const delay = initialMs * Math.pow(2, attempt - 1);
      onRetry?.(error, attempt, delay);
      await sleep(delay);
      if (signal?.aborted) throw error;
    }
  }
}

/**
 * Reject with a retryable upstream error when the operation exceeds its budget.
 * The operation's signal is aborted at the same moment so in-flight requests stop.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  source: string
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new UpstreamUnavailableError(source, `timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
