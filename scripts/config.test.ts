/**
 * Unit tests for configuration management
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, mkdirSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import * as yaml from 'js-yaml';
import {
  ConfigManager,
  ConfigValidator,
  DataLoader,
  DEFAULT_CONFIG,
  mergeDeep,
  resolveThresholds,
  resolveToken
} from './config.js';
import { ValidationError } from './validation.js';
import { CensusError, ErrorCode, isCensusError } from './error-handler.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('ConfigValidator', () => {
  describe('validateCrawlerConfig', () => {
    it('should accept the default crawler configuration', () => {
      expect(ConfigValidator.validateCrawlerConfig(DEFAULT_CONFIG.crawler)).toEqual(DEFAULT_CONFIG.crawler);
    });

    it('should reject non-object crawler config', () => {
      expect(() => ConfigValidator.validateCrawlerConfig(null)).toThrow(ValidationError);
      expect(() => ConfigValidator.validateCrawlerConfig('crawler')).toThrow('Crawler config must be an object');
    });

    it('should reject a page size above the search API maximum', () => {
      const config = { ...DEFAULT_CONFIG.crawler, perPage: 101 };
      expect(() => ConfigValidator.validateCrawlerConfig(config)).toThrow('crawler.perPage must be at most 100');
    });

    it('should reject non-positive concurrency', () => {
      const config = { ...DEFAULT_CONFIG.crawler, concurrency: 0 };
      expect(() => ConfigValidator.validateCrawlerConfig(config)).toThrow('crawler.concurrency must be a positive integer');
    });

    it('should reject a missing rate limit section', () => {
      const { rateLimit: _rateLimit, ...config } = DEFAULT_CONFIG.crawler;
      expect(() => ConfigValidator.validateCrawlerConfig(config)).toThrow('rateLimit must be an object');
    });
  });

  describe('validateAnalysisConfig', () => {
    it('should accept the default analysis configuration', () => {
      expect(ConfigValidator.validateAnalysisConfig(DEFAULT_CONFIG.analysis)).toEqual(DEFAULT_CONFIG.analysis);
    });

    it('should allow the plugin spec threshold to be null', () => {
      const config = { ...DEFAULT_CONFIG.analysis, thresholds: { report: 1, consensus: 40, pluginSpec: null } };
      expect(ConfigValidator.validateAnalysisConfig(config).thresholds.pluginSpec).toBeNull();
    });

    it('should raise THRESHOLD_CONFIG for a threshold above 100', () => {
      const config = { ...DEFAULT_CONFIG.analysis, thresholds: { report: 1, consensus: 150, pluginSpec: 5 } };
      const error = captureError(() => ConfigValidator.validateAnalysisConfig(config));

      expect(isCensusError(error, ErrorCode.THRESHOLD_CONFIG)).toBe(true);
      expect(error instanceof CensusError && error.message).toBe(
        'thresholds.consensus must be a number between 0 and 100, got 150'
      );
    });

    it('should reject a detection threshold outside 0..1', () => {
      const config = { ...DEFAULT_CONFIG.analysis, detection: { enabled: true, threshold: 2, patterns: 'p.json' } };
      expect(() => ConfigValidator.validateAnalysisConfig(config)).toThrow(
        'detection.threshold must be a number between 0 and 1'
      );
    });
  });
});

describe('ConfigManager', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'nvim-census-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults when the file is missing', () => {
    const config = new ConfigManager(join(dir, 'missing.yml')).loadConfig();

    expect(config.crawler).toEqual(DEFAULT_CONFIG.crawler);
    expect(config.analysis.thresholds).toEqual({ report: 1, consensus: 40, pluginSpec: 5 });
    expect(config.github.token).toBe('');
  });

  it('should merge file values over defaults', () => {
    const path = join(dir, 'config.yml');
    writeFileSync(path, yaml.dump({ analysis: { thresholds: { consensus: 30 } }, crawler: { concurrency: 2 } }));

    const config = new ConfigManager(path).loadConfig();

    expect(config.analysis.thresholds).toEqual({ report: 1, consensus: 30, pluginSpec: 5 });
    expect(config.crawler.concurrency).toBe(2);
    expect(config.crawler.perPage).toBe(100);
  });

  it('should report invalid YAML as CONFIG_INVALID', () => {
    const path = join(dir, 'config.yml');
    writeFileSync(path, 'crawler: [');

    const error = captureError(() => new ConfigManager(path).loadConfig());
    expect(isCensusError(error, ErrorCode.CONFIG_INVALID)).toBe(true);
  });

  it('should reject a file that is not a mapping', () => {
    const path = join(dir, 'config.yml');
    writeFileSync(path, 'just a string\n');

    const error = captureError(() => new ConfigManager(path).loadConfig());
    expect(isCensusError(error, ErrorCode.CONFIG_INVALID)).toBe(true);
    expect(error instanceof Error && error.message).toBe('Config file must contain a mapping');
  });

  it('should turn validation failures into CONFIG_INVALID naming the field', () => {
    const path = join(dir, 'config.yml');
    writeFileSync(path, yaml.dump({ crawler: { perPage: 500 } }));

    const error = captureError(() => new ConfigManager(path).loadConfig());
    expect(isCensusError(error, ErrorCode.CONFIG_INVALID)).toBe(true);
    expect(error instanceof Error && error.message).toBe('crawler.perPage must be at most 100');
  });

  it('should let threshold errors through unchanged', () => {
    const path = join(dir, 'config.yml');
    writeFileSync(path, yaml.dump({ analysis: { thresholds: { report: -5 } } }));

    const error = captureError(() => new ConfigManager(path).loadConfig());
    expect(isCensusError(error, ErrorCode.THRESHOLD_CONFIG)).toBe(true);
  });
});

describe('mergeDeep', () => {
  it('should merge nested objects and replace arrays and scalars', () => {
    const merged = mergeDeep(
      { a: { b: 1, c: 2 }, list: [1, 2], flag: true },
      { a: { c: 3 }, list: [9], flag: false }
    );

    expect(merged).toEqual({ a: { b: 1, c: 3 }, list: [9], flag: false });
  });
});

describe('resolveToken', () => {
  const config = new ConfigManager('/nonexistent/config.yml').loadConfig();

  it('should prefer the explicit token', () => {
    expect(resolveToken('test-cli', config, { GH_TOKEN: 'test-env' })).toBe('test-cli');
  });

  it('should use the config token before the environment', () => {
    const withToken = { ...config, github: { token: 'test-config' } };
    expect(resolveToken(undefined, withToken, { GH_TOKEN: 'test-env' })).toBe('test-config');
  });

  it('should read GH_TOKEN before GITHUB_TOKEN', () => {
    expect(resolveToken(undefined, config, { GH_TOKEN: 'test-gh', GITHUB_TOKEN: 'test-github' })).toBe('test-gh');
    expect(resolveToken(undefined, config, { GITHUB_TOKEN: 'test-github' })).toBe('test-github');
  });

  it('should raise AUTH_REQUIRED when no token is available', () => {
    const error = captureError(() => resolveToken(undefined, config, {}));
    expect(isCensusError(error, ErrorCode.AUTH_REQUIRED)).toBe(true);
  });
});

describe('resolveThresholds', () => {
  const base = { report: 1, consensus: 40, pluginSpec: 5 };

  it('should apply overrides', () => {
    expect(resolveThresholds(base, { consensus: 50, report: 2 })).toEqual({ report: 2, consensus: 50, pluginSpec: 5 });
  });

  it('should keep the base values without overrides', () => {
    expect(resolveThresholds(base)).toEqual(base);
  });

  it('should accept the boundaries and a null plugin spec threshold', () => {
    expect(resolveThresholds(base, { report: 0, consensus: 100, pluginSpec: null })).toEqual({
      report: 0,
      consensus: 100,
      pluginSpec: null
    });
  });

  it('should reject thresholds outside 0..100', () => {
    expect(isCensusError(captureError(() => resolveThresholds(base, { report: -1 })), ErrorCode.THRESHOLD_CONFIG)).toBe(true);
    expect(isCensusError(captureError(() => resolveThresholds(base, { pluginSpec: 101 })), ErrorCode.THRESHOLD_CONFIG)).toBe(true);
    expect(isCensusError(captureError(() => resolveThresholds(base, { consensus: Number.NaN })), ErrorCode.THRESHOLD_CONFIG)).toBe(true);
  });
});

describe('DataLoader', () => {
  it('should load the bundled strategy set', () => {
    const strategies = new DataLoader('data').loadStrategies();

    expect(strategies).toHaveLength(67);
    expect(strategies[0]).toEqual({
      id: 'path-dotconfig-nvim',
      query: 'filename:init.lua path:.config/nvim',
      kind: 'path'
    });
    expect(new Set(strategies.map(strategy => strategy.id)).size).toBe(67);
  });

  it('should load the bundled detection patterns', () => {
    const patterns = new DataLoader('data').loadDetectionPatterns();

    expect(patterns.positive).toHaveLength(54);
    expect(patterns.negative).toHaveLength(35);
    expect(patterns.positive[0].test('vim.opt.number = true')).toBe(true);
  });

  it('should load the bundled colorscheme modules', () => {
    const modules = new DataLoader('data').loadColorschemeModules();

    expect(modules.size).toBe(45);
    expect(modules.get('tokyonight.nvim')).toBe('tokyonight');
    expect(modules.get('github-theme')).toBe('github');
  });

  describe('with a temporary data directory', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'nvim-census-data-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should reject duplicate strategy ids as DATA_INVALID', () => {
      writeFileSync(join(dir, 'strategies.yml'), yaml.dump([
        { id: 'a', query: 'filename:init.lua' },
        { id: 'a', query: 'filename:init.lua stars:0' }
      ]));

      const error = captureError(() => new DataLoader(dir).loadStrategies());
      expect(isCensusError(error, ErrorCode.DATA_INVALID)).toBe(true);
      expect(error instanceof Error && error.message).toBe('Invalid strategies.yml: duplicate strategy id: a');
    });

    it('should default the id to the query and the kind to custom', () => {
      writeFileSync(join(dir, 'strategies.yml'), yaml.dump([{ query: 'filename:init.lua' }]));

      expect(new DataLoader(dir).loadStrategies()).toEqual([
        { id: 'filename:init.lua', query: 'filename:init.lua', kind: 'custom' }
      ]);
    });

    it('should name the failing item', () => {
      writeFileSync(join(dir, 'strategies.yml'), yaml.dump([{ query: 'a' }, { kind: 'path' }]));

      expect(() => new DataLoader(dir).loadStrategies()).toThrow(
        'Invalid strategies.yml: Item 1: query is required and must be a string'
      );
    });

    it('should reject detection patterns that are not valid regexes', () => {
      mkdirSync(join(dir, 'nested'), { recursive: true });
      const path = join(dir, 'nested', 'patterns.json');
      writeFileSync(path, JSON.stringify({ positive: ['('], negative: [] }));

      const error = captureError(() => new DataLoader(dir).loadDetectionPatterns(path));
      expect(isCensusError(error, ErrorCode.DATA_INVALID)).toBe(true);
    });

    it('should name a colorscheme module without a name', () => {
      writeFileSync(join(dir, 'colorschemes.json'), JSON.stringify({ modules: { tokyonight: 'tokyonight', nord: '' } }));

      const error = captureError(() => new DataLoader(dir).loadColorschemeModules());
      expect(isCensusError(error, ErrorCode.DATA_INVALID)).toBe(true);
      expect(error instanceof Error && error.message).toBe(
        'Invalid colorscheme modules: modules.nord must be a non-empty string'
      );
    });
  });
});
