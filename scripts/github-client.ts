/**
 * GitHub API client for code search, repository lookup and file content,
 * with request throttling, rate-limit backoff and transient retry
 */

import { Octokit } from '@octokit/rest';
import { QueryStrategy, RepositoryRef, SearchHit, SearchPage } from './types.js';
import { Throttle, RequestClass, HeaderMap, parseHeaderNumber } from './rate-limiter.js';
import { Clock, RetryPolicy, createRetryPolicy, calculateBackoff, statusOf, systemClock, withRetry } from './retry.js';
import { Logger, defaultLogger } from './logger.js';
import { isRecord } from './validation.js';
import {
  CensusError,
  ErrorCode,
  createAuthError,
  createRateLimitError,
  createTransientFetchError,
  errorMessage,
  isCensusError
} from './error-handler.js';

/** Code search returns at most this many results per query */
export const SEARCH_RESULT_CAP = 1000;

export interface GitHubClientConfig {
  token: string;
  perPage: number;
  requestTimeoutMs: number;
  rateLimit: {
    searchPerMinute: number;
    corePerHour: number;
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
}

export interface GitHubClientDeps {
  octokit?: Octokit;
  clock?: Clock;
  retryPolicy?: RetryPolicy;
  throttle?: Throttle;
  logger?: Logger;
}

export interface ClientStats {
  apiCallsUsed: number;
  rateLimitWaits: number;
  throttleWaits: number;
  transientRetries: number;
}

/**
 * The surface the crawl orchestrator drives
 */
export interface CodeSearchClient {
  search(strategy: QueryStrategy, cursor: number): Promise<SearchPage>;
  getRepository(id: string, strategy: string): Promise<RepositoryRef>;
  fetchContent(ref: RepositoryRef, path: string): Promise<string | null>;
  getStats(): ClientStats;
}

/**
 * Response headers attached to an Octokit RequestError, if any
 */
export function headersOf(error: unknown): HeaderMap {
  const headers: HeaderMap = {};
  const response = isRecord(error) ? error.response : undefined;
  const raw = isRecord(response) ? response.headers : undefined;
  if (!isRecord(raw)) {
    return headers;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'number') {
      headers[key.toLowerCase()] = value;
    }
  }
  return headers;
}

/**
 * Repository values used when the lookup fails
 */
export function fallbackRepository(id: string, strategy: string): RepositoryRef {
  const [owner, name = ''] = id.split('/');
  return {
    id,
    owner,
    name,
    url: `https://github.com/${id}`,
    stars: 0,
    defaultBranch: 'main',
    pushedAt: null,
    strategy
  };
}

/**
 * GitHub API client with built-in throttling and retry
 */
export class GitHubClient implements CodeSearchClient {
  private octokit: Octokit;
  private config: GitHubClientConfig;
  private clock: Clock;
  private retryPolicy: RetryPolicy;
  private throttle: Throttle;
  private logger: Logger;
  private apiCallsUsed: number = 0;
  private rateLimitWaits: number = 0;
  private transientRetries: number = 0;

  constructor(config: GitHubClientConfig, deps: GitHubClientDeps = {}) {
    this.config = config;
    this.octokit = deps.octokit ?? new Octokit({
      auth: config.token,
      userAgent: 'nvim-census/1.0.0'
    });
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? defaultLogger;
    this.retryPolicy = deps.retryPolicy ?? createRetryPolicy(config.retry);
    this.throttle = deps.throttle ?? new Throttle(config.rateLimit, this.clock, this.logger);
  }

  /**
   * Fetch one page of code search results. A 422 means the query has no more
   * reachable results and is reported as an empty final page.
   */
  async search(strategy: QueryStrategy, cursor: number): Promise<SearchPage> {
    const { perPage } = this.config;
    const capPage = Math.ceil(SEARCH_RESULT_CAP / perPage);

    try {
      const data = await this.execute('search', 'search', strategy.query, signal =>
        this.octokit.rest.search.code({
          q: strategy.query,
          per_page: perPage,
          page: cursor,
          request: { signal }
        })
      );

      const hits: SearchHit[] = data.items.map(item => ({
        repo: item.repository.full_name,
        url: item.repository.html_url,
        path: item.path
      }));

      const reachable = Math.min(data.total_count, SEARCH_RESULT_CAP);
      const exhausted = hits.length === 0 || cursor * perPage >= reachable || cursor >= capPage;

      return {
        hits,
        nextCursor: exhausted ? null : cursor + 1,
        totalCount: data.total_count
      };
    } catch (error) {
      if (statusOf(error) === 422) {
        this.logger.info(`Search for "${strategy.query}" page ${cursor} returned 422, treating as exhausted`);
        return { hits: [], nextCursor: null, totalCount: 0 };
      }
      throw error;
    }
  }

  /**
   * Resolve repository metadata; lookup failures fall back to defaults
   */
  async getRepository(id: string, strategy: string): Promise<RepositoryRef> {
    const fallback = fallbackRepository(id, strategy);

    try {
      const data = await this.execute('core', 'getRepository', id, signal =>
        this.octokit.rest.repos.get({
          owner: fallback.owner,
          repo: fallback.name,
          request: { signal }
        })
      );

      return {
        id,
        owner: fallback.owner,
        name: fallback.name,
        url: data.html_url,
        stars: data.stargazers_count,
        defaultBranch: data.default_branch || 'main',
        pushedAt: data.pushed_at ?? null,
        strategy
      };
    } catch (error) {
      if (isCensusError(error, ErrorCode.AUTH_REQUIRED) || isCensusError(error, ErrorCode.RATE_LIMITED)) {
        throw error;
      }
      this.logger.warn(`Repository lookup failed for ${id}, using defaults: ${errorMessage(error)}`);
      return fallback;
    }
  }

  /**
   * Fetch a file's text. Returns null when it does not exist or is not a file.
   */
  async fetchContent(ref: RepositoryRef, path: string): Promise<string | null> {
    try {
      const data = await this.execute('core', 'fetchContent', `${ref.id}:${path}`, signal =>
        this.octokit.rest.repos.getContent({
          owner: ref.owner,
          repo: ref.name,
          path,
          ref: ref.defaultBranch,
          request: { signal }
        })
      );

      if (Array.isArray(data) || !('content' in data) || data.encoding !== 'base64') {
        return null;
      }

      return Buffer.from(data.content, 'base64').toString('utf-8');
    } catch (error) {
      if (statusOf(error) === 404) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Get statistics for this session
   */
  getStats(): ClientStats {
    return {
      apiCallsUsed: this.apiCallsUsed,
      rateLimitWaits: this.rateLimitWaits,
      throttleWaits: this.throttle.getStats().waits,
      transientRetries: this.transientRetries
    };
  }

  /**
   * Run a request under the transient retry policy; rate limiting and auth
   * are handled one level down and never retried here
   */
  private async execute<T>(
    requestClass: RequestClass,
    operation: string,
    resource: string,
    call: (signal: AbortSignal) => Promise<{ data: T; headers: HeaderMap }>
  ): Promise<T> {
    const policy: RetryPolicy = {
      maxAttempts: this.retryPolicy.maxAttempts,
      backoff: attempt => this.retryPolicy.backoff(attempt),
      isRetryable: error => !(error instanceof CensusError) && this.retryPolicy.isRetryable(error)
    };

    try {
      return await withRetry(
        () => this.executeRateLimited(requestClass, operation, resource, call),
        policy,
        this.clock,
        (error, attempt, delay) => {
          this.transientRetries++;
          this.logger.warn(`${operation} ${resource} failed (${errorMessage(error)}), retrying in ${delay}ms (attempt ${attempt + 1}/${policy.maxAttempts})`);
        }
      );
    } catch (error) {
      if (policy.isRetryable(error)) {
        throw createTransientFetchError(`${operation} failed after ${policy.maxAttempts} attempts: ${errorMessage(error)}`, {
          operation,
          resource,
          statusCode: statusOf(error)
        });
      }
      throw error;
    }
  }

  private async executeRateLimited<T>(
    requestClass: RequestClass,
    operation: string,
    resource: string,
    call: (signal: AbortSignal) => Promise<{ data: T; headers: HeaderMap }>
  ): Promise<T> {
    const { maxRetries, baseDelayMs, maxDelayMs } = this.config.rateLimit;
    let rateLimitHits = 0;

    for (;;) {
      await this.throttle.acquire(requestClass);
      this.apiCallsUsed++;

      try {
        const response = await call(AbortSignal.timeout(this.config.requestTimeoutMs));
        this.throttle.updateFromHeaders(requestClass, response.headers);
        return response.data;
      } catch (error) {
        const headers = headersOf(error);
        this.throttle.updateFromHeaders(requestClass, headers);

        if (statusOf(error) === 401) {
          throw createAuthError(`GitHub rejected the token: ${errorMessage(error)}`, { operation, resource, statusCode: 401 });
        }

        if (!this.isRateLimitResponse(error, headers)) {
          throw error;
        }

        rateLimitHits++;
        if (rateLimitHits >= maxRetries) {
          throw createRateLimitError(`Rate limit persisted after ${rateLimitHits} responses`, {
            operation,
            resource,
            statusCode: statusOf(error)
          });
        }

        const delay = this.rateLimitDelay(headers, rateLimitHits - 1, baseDelayMs, maxDelayMs);
        this.rateLimitWaits++;
        this.logger.warn(`Rate limit hit on ${operation}, waiting ${Math.ceil(delay / 1000)}s (${rateLimitHits}/${maxRetries})`);
        await this.clock.sleep(delay);
      }
    }
  }

  private isRateLimitResponse(error: unknown, headers: HeaderMap): boolean {
    const status = statusOf(error);
    if (status === 429) {
      return true;
    }
    if (status !== 403) {
      return false;
    }
    if (parseHeaderNumber(headers['x-ratelimit-remaining']) === 0 || headers['retry-after'] !== undefined) {
      return true;
    }
    return /rate limit/i.test(errorMessage(error));
  }

  /**
   * retry-after wins, then the reset hint, then exponential backoff
   */
  private rateLimitDelay(headers: HeaderMap, attempt: number, baseDelayMs: number, maxDelayMs: number): number {
    const retryAfter = parseHeaderNumber(headers['retry-after']);
    if (retryAfter !== undefined) {
      return retryAfter * 1000;
    }

    const reset = parseHeaderNumber(headers['x-ratelimit-reset']);
    if (reset !== undefined) {
      const wait = reset * 1000 - this.clock.now() + 1000;
      if (wait > 0) {
        return wait;
      }
    }

    return calculateBackoff(attempt, baseDelayMs, maxDelayMs);
  }
}
