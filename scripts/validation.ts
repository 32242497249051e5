/**
 * Schema validation for data files, cache sidecars and checkpoints
 */

import * as yaml from 'js-yaml';
import {
  QueryStrategy,
  StrategyKind,
  ConfigSidecar,
  StrategyProgress,
  StrategyStatus
} from './types.js';

/**
 * Validation error class
 */
export class ValidationError extends Error {
  constructor(message: string, public field?: string, public value?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const STRATEGY_KINDS: readonly StrategyKind[] = ['path', 'popularity', 'created', 'pushed', 'language', 'topic', 'custom'];
const STRATEGY_STATUSES: readonly StrategyStatus[] = ['pending', 'paginating', 'exhausted', 'failed'];

function isStrategyKind(value: unknown): value is StrategyKind {
  return STRATEGY_KINDS.some(kind => kind === value);
}

function isStrategyStatus(value: unknown): value is StrategyStatus {
  return STRATEGY_STATUSES.some(status => status === value);
}

/**
 * Validate a QueryStrategy object
 */
export function validateStrategy(strategy: unknown): QueryStrategy {
  if (!isRecord(strategy)) {
    throw new ValidationError('Strategy must be an object');
  }

  const { query, id } = strategy;
  if (!query || typeof query !== 'string') {
    throw new ValidationError('query is required and must be a string', 'query', query);
  }

  const kind = strategy.kind ?? 'custom';
  if (!isStrategyKind(kind)) {
    throw new ValidationError(`kind must be one of: ${STRATEGY_KINDS.join(', ')}`, 'kind', strategy.kind);
  }

  if (id !== undefined && (typeof id !== 'string' || id.length === 0)) {
    throw new ValidationError('id must be a non-empty string if provided', 'id', id);
  }

  return {
    id: typeof id === 'string' ? id : query,
    query,
    kind
  };
}

/**
 * Parse and validate YAML content
 */
export function parseAndValidateYaml<T>(content: string, validator: (item: unknown) => T): T {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new ValidationError(`YAML parsing error: ${error.message}`);
    }
    throw error;
  }
  return validator(parsed);
}

/**
 * Validate every element of an array, prefixing failures with the index
 */
export function validateArray<T>(items: unknown, validator: (item: unknown) => T): T[] {
  if (!Array.isArray(items)) {
    throw new ValidationError('content must be an array');
  }

  return items.map((item, index) => {
    try {
      return validator(item);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new ValidationError(`Item ${index}: ${error.message}`, error.field, error.value);
      }
      throw error;
    }
  });
}

/**
 * Validate strategies.yml content. Ids must be unique since they key the checkpoint.
 */
export function validateStrategiesYaml(content: string): QueryStrategy[] {
  const strategies = parseAndValidateYaml(content, parsed => validateArray(parsed, validateStrategy));

  if (strategies.length === 0) {
    throw new ValidationError('at least one strategy is required');
  }

  const seen = new Set<string>();
  for (const strategy of strategies) {
    if (seen.has(strategy.id)) {
      throw new ValidationError(`duplicate strategy id: ${strategy.id}`, 'id', strategy.id);
    }
    seen.add(strategy.id);
  }

  return strategies;
}

export interface DetectionPatterns {
  positive: RegExp[];
  negative: RegExp[];
}

function validatePatternList(value: unknown, field: string): RegExp[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${field} must be an array`, field, value);
  }

  return value.map((pattern, i) => {
    if (typeof pattern !== 'string') {
      throw new ValidationError(`${field}[${i}] must be a string`, `${field}[${i}]`, pattern);
    }
    try {
      return new RegExp(pattern, 'm');
    } catch {
      throw new ValidationError(`${field}[${i}] must be a valid regex pattern`, `${field}[${i}]`, pattern);
    }
  });
}

/**
 * Validate detection-patterns.json content
 */
export function validateDetectionPatterns(data: unknown): DetectionPatterns {
  if (!isRecord(data)) {
    throw new ValidationError('Detection patterns must be an object');
  }

  return {
    positive: validatePatternList(data.positive, 'positive'),
    negative: validatePatternList(data.negative, 'negative')
  };
}

/** Lua module name of a theme plugin mapped to the colorscheme it sets */
export type ColorschemeModules = ReadonlyMap<string, string>;

/**
 * Validate colorschemes.json content
 */
export function validateColorschemeModules(data: unknown): ColorschemeModules {
  const entries = isRecord(data) ? data.modules : undefined;
  if (!isRecord(entries)) {
    throw new ValidationError('Colorscheme modules must be an object under "modules"', 'modules');
  }

  const modules = new Map<string, string>();
  for (const [module, name] of Object.entries(entries)) {
    if (typeof name !== 'string' || !name.trim()) {
      throw new ValidationError(`modules.${module} must be a non-empty string`, `modules.${module}`, name);
    }
    modules.set(module, name);
  }
  return modules;
}

/**
 * Validate a cache sidecar object
 */
export function validateSidecar(data: unknown): ConfigSidecar {
  if (!isRecord(data)) {
    throw new ValidationError('Sidecar must be an object');
  }

  const requiredStrings = ['repo', 'url', 'defaultBranch', 'path', 'strategy', 'fetchedAt', 'contentHash'] as const;
  for (const field of requiredStrings) {
    if (typeof data[field] !== 'string') {
      throw new ValidationError(`${field} is required and must be a string`, field, data[field]);
    }
  }

  const stars = data.stars;
  if (typeof stars !== 'number' || stars < 0) {
    throw new ValidationError('stars must be a non-negative number', 'stars', stars);
  }

  const pushedAt = data.pushedAt ?? null;
  if (pushedAt !== null && (typeof pushedAt !== 'string' || isNaN(Date.parse(pushedAt)))) {
    throw new ValidationError('pushedAt must be a valid ISO date string or null', 'pushedAt', pushedAt);
  }

  return {
    repo: String(data.repo),
    url: String(data.url),
    stars,
    defaultBranch: String(data.defaultBranch),
    pushedAt,
    path: String(data.path),
    strategy: String(data.strategy),
    fetchedAt: String(data.fetchedAt),
    contentHash: String(data.contentHash)
  };
}

function validateStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${field} must be an array`, field, value);
  }
  return value.map((item, i) => {
    if (typeof item !== 'string') {
      throw new ValidationError(`${field}[${i}] must be a string`, `${field}[${i}]`, item);
    }
    return item;
  });
}

function validateStrategyProgress(value: unknown, id: string): StrategyProgress {
  if (!isRecord(value)) {
    throw new ValidationError(`strategies["${id}"] must be an object`, 'strategies', value);
  }
  const { status, cursor } = value;
  if (!isStrategyStatus(status)) {
    throw new ValidationError(`strategies["${id}"].status is not a known status`, 'status', status);
  }
  if (typeof cursor !== 'number' || !Number.isInteger(cursor) || cursor < 1) {
    throw new ValidationError(`strategies["${id}"].cursor must be a positive integer`, 'cursor', cursor);
  }

  const progress: StrategyProgress = { status, cursor };
  if (typeof value.error === 'string') {
    progress.error = value.error;
  }
  return progress;
}

export interface CheckpointData {
  version: number;
  processed: string[];
  failed: string[];
  strategies: Record<string, StrategyProgress>;
  totalFetched: number;
  savedAt: string | null;
}

/**
 * Validate a parsed checkpoint document. Unknown fields are ignored.
 */
export function validateCheckpointData(data: unknown): CheckpointData {
  if (!isRecord(data)) {
    throw new ValidationError('Checkpoint must be an object');
  }

  const version = data.version;
  if (typeof version !== 'number') {
    throw new ValidationError('version must be a number', 'version', version);
  }

  const strategies: Record<string, StrategyProgress> = {};
  const rawStrategies = data.strategies ?? {};
  if (!isRecord(rawStrategies)) {
    throw new ValidationError('strategies must be an object', 'strategies', rawStrategies);
  }
  for (const [id, progress] of Object.entries(rawStrategies)) {
    strategies[id] = validateStrategyProgress(progress, id);
  }

  const totalFetched = data.totalFetched ?? 0;
  if (typeof totalFetched !== 'number' || totalFetched < 0) {
    throw new ValidationError('totalFetched must be a non-negative number', 'totalFetched', totalFetched);
  }

  const savedAt = data.savedAt ?? null;
  if (savedAt !== null && typeof savedAt !== 'string') {
    throw new ValidationError('savedAt must be a string or null', 'savedAt', savedAt);
  }

  return {
    version,
    processed: validateStringArray(data.processed ?? [], 'processed'),
    failed: validateStringArray(data.failed ?? [], 'failed'),
    strategies,
    totalFetched,
    savedAt
  };
}
