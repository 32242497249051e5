import { describe, it, expect } from 'vitest';
import { Clock, calculateBackoff, createRetryPolicy, isTransientError, statusOf, withRetry } from './retry.js';

class FakeClock implements Clock {
  time = 1_000_000;
  sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}

function httpError(status: number): Error & { status: number } {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe('calculateBackoff', () => {
  it('should double per attempt up to the cap', () => {
    expect(calculateBackoff(0, 1000, 30000)).toBe(1000);
    expect(calculateBackoff(3, 1000, 30000)).toBe(8000);
    expect(calculateBackoff(10, 1000, 30000)).toBe(30000);
  });
});

describe('statusOf', () => {
  it('should read a numeric status', () => {
    expect(statusOf(httpError(422))).toBe(422);
    expect(statusOf({ status: '422' })).toBeUndefined();
    expect(statusOf('422')).toBeUndefined();
  });
});

describe('isTransientError', () => {
  it('should retry server errors and request timeouts', () => {
    expect(isTransientError(httpError(500))).toBe(true);
    expect(isTransientError(httpError(503))).toBe(true);
    expect(isTransientError(httpError(408))).toBe(true);
  });

  it('should not retry client errors', () => {
    expect(isTransientError(httpError(404))).toBe(false);
    expect(isTransientError(httpError(422))).toBe(false);
  });

  it('should retry aborted and timed out requests', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    const timeout = new Error('timed out');
    timeout.name = 'TimeoutError';

    expect(isTransientError(abort)).toBe(true);
    expect(isTransientError(timeout)).toBe(true);
  });

  it('should retry connection failures by code or cause', () => {
    expect(isTransientError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe(true);
    expect(isTransientError(new Error('request failed', { cause: { code: 'UND_ERR_SOCKET' } }))).toBe(true);
    expect(isTransientError(new Error('socket hang up'))).toBe(true);
  });

  it('should not retry ordinary errors', () => {
    expect(isTransientError(new Error('boom'))).toBe(false);
    expect(isTransientError('boom')).toBe(false);
  });
});

describe('withRetry', () => {
  const policy = createRetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 });

  it('should retry transient failures with backoff', async () => {
    const clock = new FakeClock();
    const retries: number[] = [];
    let calls = 0;

    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) {
          throw httpError(502);
        }
        return 'ok';
      },
      policy,
      clock,
      (_error, attempt) => retries.push(attempt)
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(clock.sleeps).toEqual([100, 200]);
    expect(retries).toEqual([0, 1]);
  });

  it('should rethrow a non-retryable error at once', async () => {
    const clock = new FakeClock();
    const error = httpError(404);
    let calls = 0;

    await expect(withRetry(async () => {
      calls++;
      throw error;
    }, policy, clock)).rejects.toBe(error);

    expect(calls).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should give up after maxAttempts with the last error', async () => {
    const clock = new FakeClock();
    const errors = [httpError(500), httpError(502), httpError(503)];
    let calls = 0;

    await expect(withRetry(async attempt => {
      calls++;
      throw errors[attempt];
    }, policy, clock)).rejects.toBe(errors[2]);

    expect(calls).toBe(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it('should honor a custom retry predicate', async () => {
    const clock = new FakeClock();
    const custom = createRetryPolicy({ maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 10 }, () => true);
    let calls = 0;

    const result = await withRetry(async () => {
      calls++;
      if (calls === 1) {
        throw new Error('boom');
      }
      return calls;
    }, custom, clock);

    expect(result).toBe(2);
    expect(clock.sleeps).toEqual([10]);
  });
});
