/**
 * Analysis pipeline: cache -> date filter -> detector -> extractor -> aggregator
 */

import { ConfigCache, writeFileAtomic } from './cache-manager.js';
import { ConfigFacts, RankedTables, SkippedFile, Thresholds } from './types.js';
import { DetectionPatterns } from './validation.js';
import { DEFAULT_DETECTION_THRESHOLD, createDetector } from './detector.js';
import { extract } from './extractor.js';
import { aggregate, applyThresholds } from './aggregate.js';
import { renderConsensusLua, renderPluginSpec, renderReport } from './render.js';
import { Logger, defaultLogger } from './logger.js';
import { createConfigError } from './error-handler.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const UNIT_DAYS: Record<string, number> = {
  y: 365,
  m: 30,
  w: 7,
  d: 1
};

/**
 * Parse a `since` window: `1y`, `6m`, `2w`, `30d` relative to now, or an
 * absolute `YYYY-MM-DD` (UTC midnight)
 */
export function parseSince(value: string, now: Date = new Date()): Date {
  const since = value.trim().toLowerCase();

  const relative = /^(\d+)([ymwd])$/.exec(since);
  if (relative) {
    return new Date(now.getTime() - Number(relative[1]) * UNIT_DAYS[relative[2]] * DAY_MS);
  }

  const absolute = /^(\d{4})-(\d{2})-(\d{2})$/.exec(since);
  if (absolute) {
    const date = new Date(Date.UTC(Number(absolute[1]), Number(absolute[2]) - 1, Number(absolute[3])));
    if (date.toISOString().slice(0, 10) === since) {
      return date;
    }
  }

  throw createConfigError(`Invalid since value "${value}"`, {
    operation: 'parseSince',
    metadata: { expected: '1y, 6m, 2w, 30d or YYYY-MM-DD' }
  });
}

export interface AnalysisOptions {
  cache: ConfigCache;
  thresholds: Thresholds;
  since?: string | null;
  detect?: boolean;
  detectionThreshold?: number;
  detectionPatterns?: DetectionPatterns;
  now?: Date;
  logger?: Logger;
}

export interface AnalysisResult {
  scanned: number;
  tables: RankedTables;
  report: RankedTables;
  consensus: RankedTables;
  pluginSpec: RankedTables | null;
  thresholds: Thresholds;
  skipped: SkippedFile[];
  since: Date | null;
}

/**
 * Run the pipeline over every cached config. Unparseable files are reported
 * and left out of the total.
 */
export function runAnalysis(options: AnalysisOptions): AnalysisResult {
  const logger = options.logger ?? defaultLogger;
  const since = options.since ? parseSince(options.since, options.now) : null;
  const detector = options.detect === false
    ? null
    : createDetector(options.detectionThreshold ?? DEFAULT_DETECTION_THRESHOLD, options.detectionPatterns);

  const cached = options.cache.loadAll();
  logger.info(`Loaded ${cached.length} cached configs from ${options.cache.directory}`);
  if (since) {
    logger.info(`Only configs pushed after ${since.toISOString().slice(0, 10)}`);
  }

  const skipped: SkippedFile[] = [];
  const configs: ConfigFacts[] = [];

  for (const config of cached) {
    const id = config.repo.id;

    if (since) {
      const pushedAt = config.repo.pushedAt ? Date.parse(config.repo.pushedAt) : Number.NaN;
      if (Number.isNaN(pushedAt)) {
        skipped.push({ id, reason: 'filtered-by-date', detail: 'no push timestamp' });
        continue;
      }
      if (pushedAt < since.getTime()) {
        skipped.push({ id, reason: 'filtered-by-date', detail: config.repo.pushedAt ?? undefined });
        continue;
      }
    }

    if (detector) {
      const detection = detector(config.content);
      if (!detection.isNeovim) {
        skipped.push({ id, reason: 'not-neovim', detail: `confidence ${detection.confidence.toFixed(2)}` });
        continue;
      }
    }

    const { facts, outcome } = extract(config.content, id);
    if (outcome.status === 'unparseable') {
      skipped.push({ id, reason: 'unparseable', detail: outcome.error });
      continue;
    }

    configs.push({ id, popularity: config.repo.stars, facts });
  }

  const tables = aggregate(configs);
  const { thresholds } = options;

  logger.info(`Analyzed ${tables.total} configs, skipped ${skipped.length}`);

  return {
    scanned: cached.length,
    tables,
    report: applyThresholds(tables, thresholds.report),
    consensus: applyThresholds(tables, thresholds.consensus),
    pluginSpec: thresholds.pluginSpec === null ? null : applyThresholds(tables, thresholds.pluginSpec),
    thresholds,
    skipped,
    since
  };
}

export function summarizeSkipped(skipped: SkippedFile[]): Record<SkippedFile['reason'], number> {
  const summary: Record<SkippedFile['reason'], number> = {
    'filtered-by-date': 0,
    'not-neovim': 0,
    unparseable: 0
  };
  for (const file of skipped) {
    summary[file.reason]++;
  }
  return summary;
}

export interface ArtifactPaths {
  template: string;
  report: string;
  consensus: string;
  pluginSpec: string | null;
}

/**
 * Write the report, the consensus module and, when both a path and a
 * threshold are set, the plugin spec. Returns the written paths.
 */
export function writeArtifacts(
  result: AnalysisResult,
  paths: ArtifactPaths,
  topN: number,
  generatedAt: Date = new Date()
): string[] {
  const written: string[] = [];

  writeFileAtomic(paths.report, renderReport(result.tables, {
    templatePath: paths.template,
    thresholds: result.thresholds,
    topN,
    skipped: result.skipped,
    scanned: result.scanned,
    generatedAt
  }));
  written.push(paths.report);

  writeFileAtomic(paths.consensus, renderConsensusLua(result.tables, result.thresholds.consensus, generatedAt));
  written.push(paths.consensus);

  if (paths.pluginSpec && result.thresholds.pluginSpec !== null) {
    writeFileAtomic(paths.pluginSpec, renderPluginSpec(result.tables, result.thresholds.pluginSpec, generatedAt));
    written.push(paths.pluginSpec);
  }

  return written;
}
