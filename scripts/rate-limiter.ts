/**
 * Shared request throttle: a sliding-window budget per request class plus
 * the remaining/reset hints the API returns in its headers
 */

import { Clock, systemClock } from './retry.js';
import { Logger, defaultLogger } from './logger.js';

export type RequestClass = 'search' | 'core';

export type HeaderMap = Record<string, string | number | undefined>;

export interface BudgetConfig {
  limit: number;
  windowMs: number;
}

export interface ThrottleConfig {
  searchPerMinute: number;
  corePerHour: number;
}

class RequestBudget {
  private timestamps: number[] = [];
  private remaining: number | null = null;
  private resetAt = 0;

  constructor(private readonly config: BudgetConfig) {}

  /**
   * Milliseconds until a request may be sent; 0 when one may go now
   */
  waitTime(now: number): number {
    this.timestamps = this.timestamps.filter(t => now - t < this.config.windowMs);

    let wait = 0;
    if (this.timestamps.length >= this.config.limit) {
      wait = this.timestamps[0] + this.config.windowMs - now;
    }

    if (this.remaining !== null && this.remaining <= 0 && this.resetAt > now) {
      wait = Math.max(wait, this.resetAt - now + 1000);
    }

    return wait;
  }

  record(now: number): void {
    this.timestamps.push(now);
    if (this.remaining !== null) {
      this.remaining--;
    }
  }

  updateFromHeaders(headers: HeaderMap): void {
    const remaining = parseHeaderNumber(headers['x-ratelimit-remaining']);
    if (remaining !== undefined) {
      this.remaining = remaining;
    }

    const reset = parseHeaderNumber(headers['x-ratelimit-reset']);
    if (reset !== undefined) {
      this.resetAt = reset * 1000;
    }
  }

  get inWindow(): number {
    return this.timestamps.length;
  }
}

export function parseHeaderNumber(value: string | number | undefined): number | undefined {
  if (typeof value === 'number') {
    return Number.isNaN(value) ? undefined : value;
  }
  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

/**
 * Serializes acquisitions so concurrent workers never overrun a budget
 */
export class Throttle {
  private budgets: Record<RequestClass, RequestBudget>;
  private queue: Promise<void> = Promise.resolve();
  private clock: Clock;
  private logger: Logger;
  private waits = 0;

  constructor(config: ThrottleConfig, clock: Clock = systemClock, logger: Logger = defaultLogger) {
    this.budgets = {
      search: new RequestBudget({ limit: config.searchPerMinute, windowMs: 60_000 }),
      core: new RequestBudget({ limit: config.corePerHour, windowMs: 3_600_000 })
    };
    this.clock = clock;
    this.logger = logger;
  }

  /**
   * Resolve once a request of the given class may be sent
   */
  acquire(requestClass: RequestClass): Promise<void> {
    const turn = this.queue.then(() => this.waitForSlot(requestClass));
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  updateFromHeaders(requestClass: RequestClass, headers: HeaderMap): void {
    this.budgets[requestClass].updateFromHeaders(headers);
  }

  getStats(): { waits: number; searchInWindow: number; coreInWindow: number } {
    return {
      waits: this.waits,
      searchInWindow: this.budgets.search.inWindow,
      coreInWindow: this.budgets.core.inWindow
    };
  }

  private async waitForSlot(requestClass: RequestClass): Promise<void> {
    const budget = this.budgets[requestClass];
    for (;;) {
      const now = this.clock.now();
      const wait = budget.waitTime(now);
      if (wait <= 0) {
        budget.record(now);
        return;
      }

      this.waits++;
      this.logger.info(`Throttling ${requestClass} request for ${Math.ceil(wait / 1000)}s`);
      await this.clock.sleep(wait);
    }
  }
}
