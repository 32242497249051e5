/**
 * Crawl checkpoint persistence. All mutation goes through one CheckpointWriter
 * whose methods and file writes are synchronous.
 */

import { existsSync, readFileSync } from 'fs';
import { CrawlCheckpoint, StrategyProgress } from './types.js';
import { CheckpointData, ValidationError, validateCheckpointData } from './validation.js';
import { writeFileAtomic } from './cache-manager.js';
import { createCheckpointError, errorMessage } from './error-handler.js';

export const CHECKPOINT_VERSION = 1;

export function emptyCheckpoint(): CrawlCheckpoint {
  return {
    processed: new Set(),
    failed: new Set(),
    strategies: new Map(),
    totalFetched: 0,
    savedAt: null
  };
}

export function serializeCheckpoint(checkpoint: CrawlCheckpoint): CheckpointData {
  const strategies: Record<string, StrategyProgress> = {};
  for (const [id, progress] of checkpoint.strategies) {
    strategies[id] = { ...progress };
  }

  return {
    version: CHECKPOINT_VERSION,
    processed: [...checkpoint.processed].sort(),
    failed: [...checkpoint.failed].sort(),
    strategies,
    totalFetched: checkpoint.totalFetched,
    savedAt: checkpoint.savedAt
  };
}

export function deserializeCheckpoint(data: CheckpointData): CrawlCheckpoint {
  return {
    processed: new Set(data.processed),
    failed: new Set(data.failed),
    strategies: new Map(Object.entries(data.strategies)),
    totalFetched: data.totalFetched,
    savedAt: data.savedAt
  };
}

/**
 * Load a checkpoint file. A missing file is an empty checkpoint; an unreadable
 * or malformed one is CHECKPOINT_CORRUPT.
 */
export function loadCheckpoint(filePath: string): CrawlCheckpoint {
  if (!existsSync(filePath)) {
    return emptyCheckpoint();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw createCheckpointError(`Checkpoint is not valid JSON: ${errorMessage(error)}`, filePath);
  }

  try {
    return deserializeCheckpoint(validateCheckpointData(parsed));
  } catch (error) {
    if (error instanceof ValidationError) {
      throw createCheckpointError(`Checkpoint is malformed: ${error.message}`, filePath);
    }
    throw error;
  }
}

export function saveCheckpoint(filePath: string, checkpoint: CrawlCheckpoint): void {
  writeFileAtomic(filePath, JSON.stringify(serializeCheckpoint(checkpoint), null, 2));
}

function copyCheckpoint(checkpoint: CrawlCheckpoint): CrawlCheckpoint {
  const strategies = new Map<string, StrategyProgress>();
  for (const [id, progress] of checkpoint.strategies) {
    strategies.set(id, { ...progress });
  }
  return {
    processed: new Set(checkpoint.processed),
    failed: new Set(checkpoint.failed),
    strategies,
    totalFetched: checkpoint.totalFetched,
    savedAt: checkpoint.savedAt
  };
}

/**
 * Single owner of the crawl checkpoint. A null path keeps state in memory only.
 */
export class CheckpointWriter {
  private state: CrawlCheckpoint;
  private filePath: string | null;
  private now: () => Date;

  constructor(filePath: string | null, initial: CrawlCheckpoint = emptyCheckpoint(), now: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.state = copyCheckpoint(initial);
    this.now = now;
  }

  /**
   * Open the checkpoint at filePath, or start fresh when resume is off
   */
  static open(filePath: string, resume: boolean): CheckpointWriter {
    return new CheckpointWriter(filePath, resume ? loadCheckpoint(filePath) : emptyCheckpoint());
  }

  isProcessed(id: string): boolean {
    return this.state.processed.has(id);
  }

  /**
   * Record an id as cached. The processed set only grows.
   */
  markProcessed(id: string): void {
    this.state.processed.add(id);
    this.state.failed.delete(id);
  }

  markFailed(id: string): void {
    if (!this.state.processed.has(id)) {
      this.state.failed.add(id);
    }
  }

  recordFetched(): void {
    this.state.totalFetched++;
  }

  getStrategy(id: string): StrategyProgress {
    const progress = this.state.strategies.get(id);
    return progress ? { ...progress } : { status: 'pending', cursor: 1 };
  }

  setStrategy(id: string, progress: StrategyProgress): void {
    this.state.strategies.set(id, { ...progress });
  }

  /**
   * Forget strategy progress but keep every processed identity
   */
  resetStrategies(): void {
    this.state.strategies.clear();
  }

  /**
   * Persist the current state, if this writer has a file
   */
  flush(): void {
    this.state.savedAt = this.now().toISOString();
    if (this.filePath) {
      saveCheckpoint(this.filePath, this.state);
    }
  }

  /**
   * Consistent copy of the current state
   */
  snapshot(): CrawlCheckpoint {
    return copyCheckpoint(this.state);
  }

  get processedCount(): number {
    return this.state.processed.size;
  }
}
