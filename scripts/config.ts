/**
 * Configuration management for nvim-census
 */

import { config } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import * as yaml from 'js-yaml';

// Load environment variables from .env file
config();
import {
  validateStrategiesYaml,
  validateDetectionPatterns,
  validateColorschemeModules,
  ColorschemeModules,
  DetectionPatterns,
  ValidationError,
  isRecord,
  UnknownRecord
} from './validation.js';
import { QueryStrategy, Thresholds } from './types.js';
import {
  createAuthError,
  createConfigError,
  createDataError,
  createThresholdError,
  errorMessage
} from './error-handler.js';

export interface CrawlerConfig {
  maxRepos: number;
  concurrency: number;
  checkpointInterval: number;
  stateFile: string;
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
  cache: {
    directory: string;
  };
}

export interface AnalysisConfig {
  thresholds: Thresholds;
  topN: number;
  since: string | null;
  detection: {
    enabled: boolean;
    threshold: number;
    patterns: string;
  };
}

export interface RenderingConfig {
  template: string;
  report: string;
  consensus: string;
  pluginSpec: string | null;
}

/**
 * System configuration interface
 */
export interface SystemConfig {
  crawler: CrawlerConfig;
  analysis: AnalysisConfig;
  rendering: RenderingConfig;
  github: {
    token: string;
  };
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  crawler: {
    maxRepos: 1_000_000,
    concurrency: 4,
    checkpointInterval: 10,
    stateFile: 'fetch_state.json',
    perPage: 100,
    requestTimeoutMs: 30000,
    rateLimit: {
      searchPerMinute: 10,
      corePerHour: 5000,
      maxRetries: 8,
      baseDelayMs: 2000,
      maxDelayMs: 60000
    },
    retry: {
      maxAttempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 30000
    },
    cache: {
      directory: 'cache'
    }
  },
  analysis: {
    thresholds: {
      report: 1,
      consensus: 40,
      pluginSpec: 5
    },
    topN: 50,
    since: null,
    detection: {
      enabled: true,
      threshold: 0.5,
      patterns: 'data/detection-patterns.json'
    }
  },
  rendering: {
    template: 'templates/report.template.md',
    report: 'output/report.md',
    consensus: 'output/consensus.lua',
    pluginSpec: null
  }
} as const;

function section(config: UnknownRecord, key: string): UnknownRecord {
  const value = config[key];
  if (!isRecord(value)) {
    throw new ValidationError(`${key} must be an object`, key, value);
  }
  return value;
}

function positiveInteger(config: UnknownRecord, key: string, field: string): number {
  const value = config[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer`, field, value);
  }
  return value;
}

function nonEmptyString(config: UnknownRecord, key: string, field: string): string {
  const value = config[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${field} must be a non-empty string`, field, value);
  }
  return value;
}

function optionalString(config: UnknownRecord, key: string, field: string): string | null {
  const value = config[key];
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string or null`, field, value);
  }
  return value;
}

/**
 * Check a percentage threshold; anything outside 0..100 is a THRESHOLD_CONFIG error
 */
export function validateThreshold(value: unknown, field: string): number {
  if (typeof value !== 'number' || Number.isNaN(value) || value < 0 || value > 100) {
    throw createThresholdError(`${field} must be a number between 0 and 100, got ${String(value)}`, {
      resource: field
    });
  }
  return value;
}

/**
 * Configuration validation functions
 */
export class ConfigValidator {

  /**
   * Validate crawler configuration
   */
  static validateCrawlerConfig(config: unknown): CrawlerConfig {
    if (!isRecord(config)) {
      throw new ValidationError('Crawler config must be an object');
    }

    const rateLimit = section(config, 'rateLimit');
    const retry = section(config, 'retry');
    const cache = section(config, 'cache');

    const perPage = positiveInteger(config, 'perPage', 'crawler.perPage');
    if (perPage > 100) {
      throw new ValidationError('crawler.perPage must be at most 100', 'crawler.perPage', perPage);
    }

    return {
      maxRepos: positiveInteger(config, 'maxRepos', 'crawler.maxRepos'),
      concurrency: positiveInteger(config, 'concurrency', 'crawler.concurrency'),
      checkpointInterval: positiveInteger(config, 'checkpointInterval', 'crawler.checkpointInterval'),
      stateFile: nonEmptyString(config, 'stateFile', 'crawler.stateFile'),
      perPage,
      requestTimeoutMs: positiveInteger(config, 'requestTimeoutMs', 'crawler.requestTimeoutMs'),
      rateLimit: {
        searchPerMinute: positiveInteger(rateLimit, 'searchPerMinute', 'rateLimit.searchPerMinute'),
        corePerHour: positiveInteger(rateLimit, 'corePerHour', 'rateLimit.corePerHour'),
        maxRetries: positiveInteger(rateLimit, 'maxRetries', 'rateLimit.maxRetries'),
        baseDelayMs: positiveInteger(rateLimit, 'baseDelayMs', 'rateLimit.baseDelayMs'),
        maxDelayMs: positiveInteger(rateLimit, 'maxDelayMs', 'rateLimit.maxDelayMs')
      },
      retry: {
        maxAttempts: positiveInteger(retry, 'maxAttempts', 'retry.maxAttempts'),
        baseDelayMs: positiveInteger(retry, 'baseDelayMs', 'retry.baseDelayMs'),
        maxDelayMs: positiveInteger(retry, 'maxDelayMs', 'retry.maxDelayMs')
      },
      cache: {
        directory: nonEmptyString(cache, 'directory', 'cache.directory')
      }
    };
  }

  /**
   * Validate analysis configuration. Threshold problems surface as THRESHOLD_CONFIG.
   */
  static validateAnalysisConfig(config: unknown): AnalysisConfig {
    if (!isRecord(config)) {
      throw new ValidationError('Analysis config must be an object');
    }

    const thresholds = section(config, 'thresholds');
    const detection = section(config, 'detection');

    const pluginSpec = thresholds.pluginSpec;
    const detectionThreshold = detection.threshold;
    if (typeof detectionThreshold !== 'number' || detectionThreshold < 0 || detectionThreshold > 1) {
      throw new ValidationError('detection.threshold must be a number between 0 and 1', 'detection.threshold', detectionThreshold);
    }
    const enabled = detection.enabled;
    if (typeof enabled !== 'boolean') {
      throw new ValidationError('detection.enabled must be a boolean', 'detection.enabled', enabled);
    }

    return {
      thresholds: {
        report: validateThreshold(thresholds.report, 'thresholds.report'),
        consensus: validateThreshold(thresholds.consensus, 'thresholds.consensus'),
        pluginSpec: pluginSpec === null || pluginSpec === undefined
          ? null
          : validateThreshold(pluginSpec, 'thresholds.pluginSpec')
      },
      topN: positiveInteger(config, 'topN', 'analysis.topN'),
      since: optionalString(config, 'since', 'analysis.since'),
      detection: {
        enabled,
        threshold: detectionThreshold,
        patterns: nonEmptyString(detection, 'patterns', 'detection.patterns')
      }
    };
  }

  /**
   * Validate rendering configuration
   */
  static validateRenderingConfig(config: unknown): RenderingConfig {
    if (!isRecord(config)) {
      throw new ValidationError('Rendering config must be an object');
    }

    return {
      template: nonEmptyString(config, 'template', 'rendering.template'),
      report: nonEmptyString(config, 'report', 'rendering.report'),
      consensus: nonEmptyString(config, 'consensus', 'rendering.consensus'),
      pluginSpec: optionalString(config, 'pluginSpec', 'rendering.pluginSpec')
    };
  }

  /**
   * Validate complete system configuration
   */
  static validateSystemConfig(config: unknown): SystemConfig {
    if (!isRecord(config)) {
      throw new ValidationError('System config must be an object');
    }

    const github = isRecord(config.github) ? config.github : {};

    return {
      crawler: this.validateCrawlerConfig(config.crawler),
      analysis: this.validateAnalysisConfig(config.analysis),
      rendering: this.validateRenderingConfig(config.rendering),
      github: {
        token: typeof github.token === 'string' ? github.token : ''
      }
    };
  }
}

/**
 * Recursively merge user values over defaults; arrays and scalars replace
 */
export function mergeDeep(defaults: UnknownRecord, overrides: UnknownRecord): UnknownRecord {
  const merged: UnknownRecord = { ...defaults };
  for (const [key, value] of Object.entries(overrides)) {
    const base = merged[key];
    merged[key] = isRecord(base) && isRecord(value) ? mergeDeep(base, value) : value;
  }
  return merged;
}

/**
 * Configuration file manager
 */
export class ConfigManager {
  private configPath: string;

  constructor(configPath: string = 'config.yml') {
    this.configPath = configPath;
  }

  /**
   * Load configuration from file with defaults
   */
  loadConfig(): SystemConfig {
    let userConfig: UnknownRecord = {};

    // Load user configuration if it exists
    if (existsSync(this.configPath)) {
      let parsed: unknown;
      try {
        const content = readFileSync(this.configPath, 'utf-8');
        parsed = yaml.load(content);
      } catch (error) {
        throw createConfigError(`Failed to load config file: ${errorMessage(error)}`, { resource: this.configPath });
      }
      if (isRecord(parsed)) {
        userConfig = parsed;
      } else if (parsed !== undefined && parsed !== null) {
        throw createConfigError('Config file must contain a mapping', { resource: this.configPath });
      }
    }

    const mergedConfig = this.mergeWithDefaults(userConfig);

    try {
      return ConfigValidator.validateSystemConfig(mergedConfig);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw createConfigError(error.message, { resource: this.configPath, operation: error.field });
      }
      throw error;
    }
  }

  /**
   * Merge user configuration with defaults
   */
  private mergeWithDefaults(userConfig: UnknownRecord): UnknownRecord {
    const defaults: UnknownRecord = JSON.parse(JSON.stringify(DEFAULT_CONFIG));
    return mergeDeep(defaults, userConfig);
  }
}

/**
 * Load and validate data files
 */
export class DataLoader {
  private dataDir: string;

  constructor(dataDir: string = 'data') {
    this.dataDir = dataDir;
  }

  /**
   * Load strategies.yml with validation
   */
  loadStrategies(): QueryStrategy[] {
    const filePath = join(this.dataDir, 'strategies.yml');
    try {
      const content = readFileSync(filePath, 'utf-8');
      return validateStrategiesYaml(content);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw createDataError(`Invalid strategies.yml: ${error.message}`, { resource: filePath });
      }
      throw createDataError(`Failed to load strategies.yml: ${errorMessage(error)}`, { resource: filePath });
    }
  }

  /**
   * Load detection patterns (JSON) with validation
   */
  loadDetectionPatterns(filePath: string = join(this.dataDir, 'detection-patterns.json')): DetectionPatterns {
    try {
      const content = readFileSync(filePath, 'utf-8');
      return validateDetectionPatterns(JSON.parse(content));
    } catch (error) {
      if (error instanceof ValidationError) {
        throw createDataError(`Invalid detection patterns: ${error.message}`, { resource: filePath });
      }
      throw createDataError(`Failed to load detection patterns: ${errorMessage(error)}`, { resource: filePath });
    }
  }

  /**
   * Load the theme module table (JSON) used to recognise colorschemes set up through require
   */
  loadColorschemeModules(filePath: string = join(this.dataDir, 'colorschemes.json')): ColorschemeModules {
    try {
      const content = readFileSync(filePath, 'utf-8');
      return validateColorschemeModules(JSON.parse(content));
    } catch (error) {
      if (error instanceof ValidationError) {
        throw createDataError(`Invalid colorscheme modules: ${error.message}`, { resource: filePath });
      }
      throw createDataError(`Failed to load colorscheme modules: ${errorMessage(error)}`, { resource: filePath });
    }
  }
}

/**
 * Resolve the API token: explicit flag, then config file, then GH_TOKEN, then GITHUB_TOKEN
 */
export function resolveToken(cliToken: string | undefined, systemConfig: SystemConfig, env: NodeJS.ProcessEnv = process.env): string {
  const token = cliToken || systemConfig.github.token || env.GH_TOKEN || env.GITHUB_TOKEN || '';
  if (!token) {
    throw createAuthError('A GitHub token is required for code search', { operation: 'resolveToken' });
  }
  return token;
}

/**
 * Build effective thresholds from config and CLI overrides, validating each
 */
export function resolveThresholds(
  base: Thresholds,
  overrides: { report?: number; consensus?: number; pluginSpec?: number | null } = {}
): Thresholds {
  const pluginSpec = overrides.pluginSpec !== undefined ? overrides.pluginSpec : base.pluginSpec;
  return {
    report: validateThreshold(overrides.report ?? base.report, 'report threshold'),
    consensus: validateThreshold(overrides.consensus ?? base.consensus, 'consensus threshold'),
    pluginSpec: pluginSpec === null ? null : validateThreshold(pluginSpec, 'plugin spec threshold')
  };
}
