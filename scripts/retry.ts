/**
 * Retry policy and backoff helpers shared by the API client
 */

export interface RetryPolicy {
  maxAttempts: number;
  backoff(attempt: number): number;
  isRetryable(error: unknown): boolean;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, Math.max(0, ms)));
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep
};

/**
 * Exponential backoff for a zero-based attempt, capped at maxDelayMs
 */
export function calculateBackoff(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EPIPE', 'EAI_AGAIN', 'UND_ERR_SOCKET']);
const TRANSIENT_MESSAGES = ['ECONNRESET', 'ETIMEDOUT', 'socket hang up', 'fetch failed', 'network'];

function readProperty(value: unknown, key: string): unknown {
  if (typeof value === 'object' && value !== null && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

/**
 * Status code carried by an Octokit RequestError (or anything shaped like one)
 */
export function statusOf(error: unknown): number | undefined {
  const status = readProperty(error, 'status');
  return typeof status === 'number' ? status : undefined;
}

/**
 * Timeouts, connection resets and 5xx responses are worth another attempt
 */
export function isTransientError(error: unknown): boolean {
  const status = statusOf(error);
  if (status !== undefined && (status >= 500 || status === 408)) {
    return true;
  }

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return true;
  }

  const code = readProperty(error, 'code');
  if (typeof code === 'string' && TRANSIENT_CODES.has(code)) {
    return true;
  }

  const cause = readProperty(error, 'cause');
  const causeCode = readProperty(cause, 'code');
  if (typeof causeCode === 'string' && TRANSIENT_CODES.has(causeCode)) {
    return true;
  }

  if (status === undefined && error instanceof Error) {
    return TRANSIENT_MESSAGES.some(fragment => error.message.includes(fragment));
  }

  return false;
}

export function createRetryPolicy(
  config: RetryConfig,
  isRetryable: (error: unknown) => boolean = isTransientError
): RetryPolicy {
  return {
    maxAttempts: config.maxAttempts,
    backoff: attempt => calculateBackoff(attempt, config.baseDelayMs, config.maxDelayMs),
    isRetryable
  };
}

/**
 * Run an operation under a retry policy; the last error is rethrown once
 * attempts run out or the error is not retryable
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  clock: Clock = systemClock,
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!policy.isRetryable(error) || attempt + 1 >= policy.maxAttempts) {
        throw error;
      }
      const delay = policy.backoff(attempt);
      onRetry?.(error, attempt, delay);
      await clock.sleep(delay);
      attempt++;
    }
  }
}
