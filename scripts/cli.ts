#!/usr/bin/env node

/**
 * nvim-census command line: fetch, fetch-all, analyze and run
 */

import { Command, InvalidArgumentError } from 'commander';
import { pathToFileURL } from 'url';
import { ConfigManager, DataLoader, SystemConfig, resolveThresholds, resolveToken } from './config.js';
import { GitHubClient } from './github-client.js';
import { CheckpointWriter, emptyCheckpoint, loadCheckpoint } from './checkpoint.js';
import { createConfigCache } from './cache-manager.js';
import { CrawlSummary, createCrawler } from './crawl.js';
import { AnalysisResult, runAnalysis, summarizeSkipped, writeArtifacts } from './analyze.js';
import { formatPercentage } from './aggregate.js';
import { settingStatement } from './render.js';
import { Logger } from './logger.js';
import { errorMessage, isCensusError } from './error-handler.js';
import { QueryStrategy, Thresholds } from './types.js';

export const DEFAULT_QUERY = 'filename:init.lua path:nvim';

type Print = (line: string) => void;

interface GlobalOptions {
  config: string;
  dataDir: string;
  verbose?: boolean;
}

interface AnalysisFlags {
  threshold?: number;
  minPercentage?: number;
  pluginThreshold?: number;
  pluginsOutput?: string;
  output?: string;
  consensusOutput?: string;
  since?: string;
  detect: boolean;
  cacheDir?: string;
  topN?: number;
}

interface FetchFlags {
  token?: string;
  query: string;
  maxRepos: number;
  cacheDir?: string;
  concurrency?: number;
}

interface FetchAllFlags {
  token?: string;
  showStrategies?: boolean;
  resetStrategies?: boolean;
  resume: boolean;
  stateFile?: string;
  concurrency?: number;
  maxRepos?: number;
  cacheDir?: string;
}

interface CliContext {
  config: SystemConfig;
  logger: Logger;
  data: DataLoader;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

// range checks happen in resolveThresholds so they raise THRESHOLD_CONFIG
function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return parsed;
}

function createClient(context: CliContext, token: string): GitHubClient {
  const { crawler } = context.config;
  return new GitHubClient(
    {
      token,
      perPage: crawler.perPage,
      requestTimeoutMs: crawler.requestTimeoutMs,
      rateLimit: crawler.rateLimit,
      retry: crawler.retry
    },
    { logger: context.logger }
  );
}

/**
 * Run a crawl with SIGINT wired to its abort signal. In-flight items finish
 * and the checkpoint is saved before the promise settles.
 */
async function withInterrupt<T>(logger: Logger, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('Interrupt received; finishing in-flight items and saving progress');
    controller.abort();
  };

  process.once('SIGINT', onInterrupt);
  try {
    return await task(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

function printCrawlSummary(summary: CrawlSummary, print: Print): void {
  print('');
  print(`📊 Crawl summary (${summary.stopReason})`);
  print(`   Fetched: ${summary.fetched}, skipped: ${summary.skipped}, failed: ${summary.failed.length}`);
  print(`   Total cached over all runs: ${summary.totalFetched}`);
  print(`   API calls: ${summary.apiCalls}, duration: ${(summary.durationMs / 1000).toFixed(1)}s`);

  for (const strategy of summary.strategies) {
    const error = strategy.error ? ` (${strategy.error})` : '';
    print(`   ${strategy.status.padEnd(10)} ${strategy.id} page ${strategy.cursor}, ${strategy.fetched} fetched${error}`);
  }

  for (const item of summary.failed.slice(0, 20)) {
    print(`   ✗ ${item.id} [${item.code}] ${item.message}`);
  }
  if (summary.failed.length > 20) {
    print(`   ... ${summary.failed.length - 20} more failures`);
  }

  if (summary.stopReason === 'rate-limited') {
    print('   Rate limit persisted; run fetch-all again later to resume.');
  }
}

function printAnalysisSummary(result: AnalysisResult, print: Print): void {
  const skipped = summarizeSkipped(result.skipped);

  print('');
  print('📊 Analysis summary');
  print(`   Cached files: ${result.scanned}`);
  print(`   Configs analyzed: ${result.tables.total}`);
  print(`   Skipped (date window): ${skipped['filtered-by-date']}`);
  print(`   Skipped (not Neovim): ${skipped['not-neovim']}`);
  print(`   Parse errors: ${skipped.unparseable}`);

  print('');
  print('   Top settings:');
  for (const entry of result.report.settings.slice(0, 10)) {
    print(`   ${formatPercentage(entry.percentage).padStart(8)}  ${settingStatement(entry)}`);
  }
  const leader = result.tables.leaderKeys[0];
  if (leader) {
    print(`   Leader key: ${leader.key} (${formatPercentage(leader.percentage)})`);
  }
  print('   Top plugins:');
  for (const entry of result.report.plugins.slice(0, 10)) {
    print(`   ${formatPercentage(entry.percentage).padStart(8)}  ${entry.key}`);
  }
  print('   Top colorschemes:');
  for (const entry of result.report.colorschemes.slice(0, 5)) {
    print(`   ${formatPercentage(entry.percentage).padStart(8)}  ${entry.key}`);
  }
}

function thresholdsFrom(context: CliContext, flags: AnalysisFlags): Thresholds {
  return resolveThresholds(context.config.analysis.thresholds, {
    report: flags.minPercentage,
    consensus: flags.threshold,
    pluginSpec: flags.pluginThreshold
  });
}

function analyze(context: CliContext, flags: AnalysisFlags, thresholds: Thresholds, print: Print): AnalysisResult {
  const { analysis, rendering, crawler } = context.config;
  const detect = flags.detect && analysis.detection.enabled;

  const result = runAnalysis({
    cache: createConfigCache(flags.cacheDir ?? crawler.cache.directory, context.logger),
    thresholds,
    since: flags.since ?? analysis.since,
    detect,
    detectionThreshold: analysis.detection.threshold,
    detectionPatterns: detect ? context.data.loadDetectionPatterns(analysis.detection.patterns) : undefined,
    logger: context.logger
  });

  printAnalysisSummary(result, print);

  const written = writeArtifacts(
    result,
    {
      template: rendering.template,
      report: flags.output ?? rendering.report,
      consensus: flags.consensusOutput ?? rendering.consensus,
      pluginSpec: flags.pluginsOutput ?? rendering.pluginSpec
    },
    flags.topN ?? analysis.topN
  );

  print('');
  for (const path of written) {
    print(`✅ Wrote ${path}`);
  }
  return result;
}

function addAnalysisOptions(command: Command): Command {
  return command
    .option('--threshold <percent>', 'minimum share for the consensus module', parseNumber)
    .option('--min-percentage <percent>', 'minimum share for report tables', parseNumber)
    .option('--plugin-threshold <percent>', 'minimum share for the plugin spec', parseNumber)
    .option('--plugins-output <path>', 'write a lazy.nvim plugin spec')
    .option('-o, --output <path>', 'markdown report path')
    .option('--consensus-output <path>', 'consensus Lua module path')
    .option('--since <window>', 'only configs pushed within 1y, 6m, 2w, 30d or since YYYY-MM-DD')
    .option('--no-detect', 'keep every Lua file, skipping the Neovim detector')
    .option('--top-n <count>', 'rows per report table', parseInteger);
}

export interface ProgramOptions {
  print?: Print;
  env?: NodeJS.ProcessEnv;
  // throw CommanderError instead of exiting; help and usage errors go to print
  exitOverride?: boolean;
}

/**
 * Build the command tree. Output goes through print, so tests can capture it.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const print = options.print ?? ((line: string) => console.log(line));
  const env = options.env ?? process.env;
  const program = new Command();

  if (options.exitOverride) {
    program.exitOverride().configureOutput({
      writeOut: text => print(text.trimEnd()),
      writeErr: text => print(text.trimEnd())
    });
  }

  program
    .name('nvim-census')
    .description('Harvest Neovim init.lua files from GitHub and compute a consensus configuration')
    .option('-c, --config <path>', 'configuration file', 'config.yml')
    .option('--data-dir <path>', 'directory holding strategies.yml and detection patterns', 'data')
    .option('-v, --verbose', 'log progress details');

  const loadContext = (): CliContext => {
    const globals = program.opts<GlobalOptions>();
    return {
      config: new ConfigManager(globals.config).loadConfig(),
      logger: new Logger({ verbose: globals.verbose ?? false }),
      data: new DataLoader(globals.dataDir)
    };
  };

  program
    .command('fetch')
    .description('fetch configs for a single search query')
    .option('--token <token>', 'GitHub API token (or GH_TOKEN / GITHUB_TOKEN)')
    .option('-q, --query <query>', 'code search query', DEFAULT_QUERY)
    .option('--max-repos <count>', 'maximum repositories to fetch', parseInteger, 500)
    .option('--concurrency <count>', 'parallel content fetches', parseInteger)
    .option('--cache-dir <path>', 'cache directory')
    .action(async (flags: FetchFlags) => {
      const context = loadContext();
      const token = resolveToken(flags.token, context.config, env);
      const summary = await fetchOne(context, token, flags);
      printCrawlSummary(summary, print);
    });

  program
    .command('fetch-all')
    .description('crawl every query strategy, resuming from the checkpoint')
    .option('--token <token>', 'GitHub API token (or GH_TOKEN / GITHUB_TOKEN)')
    .option('--show-strategies', 'list strategies and their progress, then exit')
    .option('--reset-strategies', 'restart every strategy but keep processed repositories')
    .option('--no-resume', 'ignore the saved checkpoint')
    .option('--state-file <path>', 'checkpoint file')
    .option('--concurrency <count>', 'parallel content fetches', parseInteger)
    .option('--max-repos <count>', 'maximum repositories to fetch this run', parseInteger)
    .option('--cache-dir <path>', 'cache directory')
    .action(async (flags: FetchAllFlags) => {
      const context = loadContext();
      const { crawler } = context.config;
      const stateFile = flags.stateFile ?? crawler.stateFile;
      const strategies = context.data.loadStrategies();

      if (flags.showStrategies) {
        const checkpoint = flags.resume ? loadCheckpoint(stateFile) : emptyCheckpoint();
        print(`${strategies.length} strategies, ${checkpoint.processed.size} repositories processed`);
        for (const strategy of strategies) {
          const progress = checkpoint.strategies.get(strategy.id) ?? { status: 'pending', cursor: 1 };
          print(`  ${progress.status.padEnd(10)} page ${String(progress.cursor).padStart(2)}  ${strategy.id}  ${strategy.query}`);
        }
        return;
      }

      const token = resolveToken(flags.token, context.config, env);
      const checkpoint = CheckpointWriter.open(stateFile, flags.resume);
      const client = createClient(context, token);
      const cache = createConfigCache(flags.cacheDir ?? crawler.cache.directory, context.logger);

      const summary = await withInterrupt(context.logger, signal =>
        createCrawler(client, strategies, checkpoint, cache, {
          maxRepos: flags.maxRepos ?? crawler.maxRepos,
          concurrency: flags.concurrency ?? crawler.concurrency,
          checkpointInterval: crawler.checkpointInterval,
          resetStrategies: flags.resetStrategies ?? false,
          signal,
          logger: context.logger
        }).run()
      );
      printCrawlSummary(summary, print);
    });

  addAnalysisOptions(
    program
      .command('analyze')
      .description('analyze cached configs and write the report artifacts')
      .option('--cache-dir <path>', 'cache directory')
  ).action((flags: AnalysisFlags) => {
    const context = loadContext();
    const thresholds = thresholdsFrom(context, flags);
    analyze(context, flags, thresholds, print);
  });

  addAnalysisOptions(
    program
      .command('run')
      .description('fetch for one query, then analyze')
      .option('--token <token>', 'GitHub API token (or GH_TOKEN / GITHUB_TOKEN)')
      .option('-q, --query <query>', 'code search query', DEFAULT_QUERY)
      .option('--max-repos <count>', 'maximum repositories to fetch', parseInteger, 500)
      .option('--concurrency <count>', 'parallel content fetches', parseInteger)
      .option('--cache-dir <path>', 'cache directory')
  ).action(async (flags: AnalysisFlags & FetchFlags) => {
    const context = loadContext();
    const thresholds = thresholdsFrom(context, flags);
    const token = resolveToken(flags.token, context.config, env);

    const summary = await fetchOne(context, token, flags);
    printCrawlSummary(summary, print);
    analyze(context, flags, thresholds, print);
  });

  return program;
}

async function fetchOne(context: CliContext, token: string, flags: FetchFlags): Promise<CrawlSummary> {
  const { crawler } = context.config;
  const strategy: QueryStrategy = { id: 'query', query: flags.query, kind: 'custom' };
  context.logger.info(`Fetching up to ${flags.maxRepos} configs for "${flags.query}"`);

  return withInterrupt(context.logger, signal =>
    createCrawler(
      createClient(context, token),
      [strategy],
      new CheckpointWriter(null),
      createConfigCache(flags.cacheDir ?? crawler.cache.directory, context.logger),
      {
        maxRepos: flags.maxRepos,
        concurrency: flags.concurrency ?? crawler.concurrency,
        checkpointInterval: crawler.checkpointInterval,
        signal,
        logger: context.logger
      }
    ).run()
  );
}

/**
 * Print a top-level failure with its recovery suggestions
 */
export function reportFatal(error: unknown, print: Print = line => console.error(line)): void {
  if (isCensusError(error)) {
    print(`❌ ${error.getFormattedMessage()}`);
    for (const suggestion of error.getRecoverySuggestions()) {
      print(`   • ${suggestion}`);
    }
    return;
  }
  print(`❌ Fatal error: ${errorMessage(error)}`);
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch(error => {
    reportFatal(error);
    process.exit(1);
  });
}
