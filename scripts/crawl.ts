/**
 * Resumable crawl over the query strategy set
 */

import { CodeSearchClient } from './github-client.js';
import { ConfigCache } from './cache-manager.js';
import { CheckpointWriter } from './checkpoint.js';
import { QueryStrategy, SearchHit, SearchPage, StrategyStatus } from './types.js';
import { Logger, defaultLogger } from './logger.js';
import {
  CensusError,
  ErrorCode,
  ErrorTracker,
  createNotFoundError,
  isCensusError
} from './error-handler.js';

export interface CrawlerOptions {
  maxRepos?: number;
  concurrency?: number;
  checkpointInterval?: number;
  resetStrategies?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
  now?: () => Date;
}

export type StopReason = 'completed' | 'interrupted' | 'rate-limited' | 'limit-reached';

export interface FailedItem {
  id: string;
  code: ErrorCode;
  message: string;
}

export interface StrategyReport {
  id: string;
  status: StrategyStatus;
  cursor: number;
  fetched: number;
  error?: string;
}

export interface CrawlSummary {
  fetched: number;
  skipped: number;
  failed: FailedItem[];
  strategies: StrategyReport[];
  stopReason: StopReason;
  totalFetched: number;
  apiCalls: number;
  durationMs: number;
}

/**
 * Drives each strategy through the client and records progress in the checkpoint
 */
export class CrawlOrchestrator {
  private client: CodeSearchClient;
  private strategies: QueryStrategy[];
  private checkpoint: CheckpointWriter;
  private cache: ConfigCache;
  private options: Required<Omit<CrawlerOptions, 'signal'>> & { signal?: AbortSignal };
  private errors: ErrorTracker;

  private stopReason: StopReason | null = null;
  private fatalError: CensusError | null = null;
  private attemptedThisRun = new Set<string>();
  private reserved = 0;
  private fetched = 0;
  private skipped = 0;
  private sinceFlush = 0;
  private failed: FailedItem[] = [];
  private fetchedByStrategy = new Map<string, number>();

  constructor(
    client: CodeSearchClient,
    strategies: QueryStrategy[],
    checkpoint: CheckpointWriter,
    cache: ConfigCache,
    options: CrawlerOptions = {}
  ) {
    this.client = client;
    this.strategies = strategies;
    this.checkpoint = checkpoint;
    this.cache = cache;
    this.options = {
      maxRepos: Number.POSITIVE_INFINITY,
      concurrency: 4,
      checkpointInterval: 10,
      resetStrategies: false,
      logger: defaultLogger,
      now: () => new Date(),
      ...options
    };
    this.errors = new ErrorTracker(this.options.logger);
  }

  private get logger(): Logger {
    return this.options.logger;
  }

  /**
   * Run until every strategy is terminal or a stop condition fires
   */
  async run(): Promise<CrawlSummary> {
    const started = Date.now();

    for (const id of this.cache.listIdentities()) {
      this.checkpoint.markProcessed(id);
    }

    if (this.options.resetStrategies) {
      this.logger.info('Resetting strategy progress; processed identities are kept');
      this.checkpoint.resetStrategies();
    }

    this.logger.info(`Starting crawl with ${this.strategies.length} strategies, ${this.checkpoint.processedCount} repositories already known`);

    try {
      for (const strategy of this.strategies) {
        if (this.checkStop()) {
          break;
        }
        await this.runStrategy(strategy);
        if (this.fatalError) {
          throw this.fatalError;
        }
      }
    } finally {
      this.checkpoint.flush();
    }

    const snapshot = this.checkpoint.snapshot();
    const summary: CrawlSummary = {
      fetched: this.fetched,
      skipped: this.skipped,
      failed: this.failed,
      strategies: this.strategies.map(strategy => {
        const progress = this.checkpoint.getStrategy(strategy.id);
        const report: StrategyReport = {
          id: strategy.id,
          status: progress.status,
          cursor: progress.cursor,
          fetched: this.fetchedByStrategy.get(strategy.id) ?? 0
        };
        if (progress.error) {
          report.error = progress.error;
        }
        return report;
      }),
      stopReason: this.stopReason ?? 'completed',
      totalFetched: snapshot.totalFetched,
      apiCalls: this.client.getStats().apiCallsUsed,
      durationMs: Date.now() - started
    };

    this.logger.info(`Crawl finished (${summary.stopReason}): ${summary.fetched} fetched, ${summary.skipped} skipped, ${summary.failed.length} failed`);
    return summary;
  }

  /**
   * Set the stop reason from the abort signal or the run limit; true when the run must stop
   */
  private checkStop(): boolean {
    if (this.stopReason || this.fatalError) {
      return true;
    }
    if (this.options.signal?.aborted) {
      this.stopReason = 'interrupted';
      return true;
    }
    if (this.reserved >= this.options.maxRepos) {
      this.stopReason = 'limit-reached';
      return true;
    }
    return false;
  }

  private async runStrategy(strategy: QueryStrategy): Promise<void> {
    const progress = this.checkpoint.getStrategy(strategy.id);
    if (progress.status === 'exhausted') {
      this.logger.info(`Skipping exhausted strategy "${strategy.id}"`);
      return;
    }

    let cursor = progress.cursor;
    this.checkpoint.setStrategy(strategy.id, { status: 'paginating', cursor });
    this.logger.info(`Running strategy "${strategy.id}" from page ${cursor}`);

    for (;;) {
      if (this.checkStop()) {
        return;
      }

      let page: SearchPage;
      try {
        page = await this.client.search(strategy, cursor);
      } catch (error) {
        this.handleSearchError(strategy, cursor, error);
        return;
      }

      const completed = await this.processPage(strategy, page.hits);
      if (!completed) {
        // cursor stays on this page so the next run sees its remaining hits
        this.checkpoint.flush();
        return;
      }

      if (page.nextCursor === null) {
        this.checkpoint.setStrategy(strategy.id, { status: 'exhausted', cursor });
        this.checkpoint.flush();
        this.logger.info(`Strategy "${strategy.id}" exhausted after page ${cursor}`);
        return;
      }

      cursor = page.nextCursor;
      this.checkpoint.setStrategy(strategy.id, { status: 'paginating', cursor });
      this.checkpoint.flush();
    }
  }

  private handleSearchError(strategy: QueryStrategy, cursor: number, error: unknown): void {
    if (isCensusError(error, ErrorCode.RATE_LIMITED)) {
      this.logger.warn(`Rate limit persisted on "${strategy.id}"; stopping until the next run`);
      this.stopReason = 'rate-limited';
      return;
    }

    if (isCensusError(error, ErrorCode.AUTH_REQUIRED)) {
      this.fatalError = error;
      return;
    }

    const recorded = this.errors.record(error, strategy.id);
    this.checkpoint.setStrategy(strategy.id, { status: 'failed', cursor, error: recorded.message });
    this.checkpoint.flush();
  }

  /**
   * Process every hit of a page on a bounded worker pool. Returns true when
   * each hit was fetched, skipped or recorded as failed.
   */
  private async processPage(strategy: QueryStrategy, hits: SearchHit[]): Promise<boolean> {
    let next = 0;
    let handled = 0;

    const worker = async (): Promise<void> => {
      while (next < hits.length) {
        if (this.checkStop() && !this.isKnown(hits[next].repo)) {
          return;
        }
        const hit = hits[next++];
        if (await this.processHit(strategy, hit)) {
          handled++;
        }
      }
    };

    const workers = Math.max(1, Math.min(this.options.concurrency, hits.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));

    return handled === hits.length;
  }

  private isKnown(id: string): boolean {
    return this.checkpoint.isProcessed(id) || this.attemptedThisRun.has(id);
  }

  /**
   * Returns false when the hit was left for a later run
   */
  private async processHit(strategy: QueryStrategy, hit: SearchHit): Promise<boolean> {
    const id = hit.repo;
    if (this.isKnown(id)) {
      this.skipped++;
      return true;
    }

    this.attemptedThisRun.add(id);
    this.reserved++;

    try {
      const ref = await this.client.getRepository(id, strategy.id);
      const content = await this.client.fetchContent(ref, hit.path);
      if (content === null) {
        throw createNotFoundError(`No file at ${hit.path}`, { operation: 'fetchContent', resource: id });
      }

      this.cache.write(ref, hit.path, content, this.options.now());
      this.checkpoint.markProcessed(id);
      this.checkpoint.recordFetched();
      this.fetched++;
      this.fetchedByStrategy.set(strategy.id, (this.fetchedByStrategy.get(strategy.id) ?? 0) + 1);
      this.logger.info(`Cached ${id} (${this.fetched} this run)`);

      this.sinceFlush++;
      if (this.sinceFlush >= this.options.checkpointInterval) {
        this.sinceFlush = 0;
        this.checkpoint.flush();
      }
      return true;
    } catch (error) {
      this.reserved--;

      if (isCensusError(error, ErrorCode.RATE_LIMITED)) {
        this.attemptedThisRun.delete(id);
        this.stopReason = this.stopReason ?? 'rate-limited';
        return false;
      }

      if (isCensusError(error, ErrorCode.AUTH_REQUIRED)) {
        this.attemptedThisRun.delete(id);
        this.fatalError = error;
        return false;
      }

      const recorded = this.errors.record(error, id);
      this.checkpoint.markFailed(id);
      this.failed.push({ id, code: recorded.code, message: recorded.message });
      return true;
    }
  }

  getErrorStats() {
    return this.errors.getErrorStats();
  }
}

/**
 * Create a crawl orchestrator instance
 */
export function createCrawler(
  client: CodeSearchClient,
  strategies: QueryStrategy[],
  checkpoint: CheckpointWriter,
  cache: ConfigCache,
  options?: CrawlerOptions
): CrawlOrchestrator {
  return new CrawlOrchestrator(client, strategies, checkpoint, cache, options);
}
