/**
 * Analysis pipeline over a temporary cache
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { parseSince, runAnalysis, summarizeSkipped, writeArtifacts } from './analyze.js';
import { ConfigCache } from './cache-manager.js';
import { fallbackRepository } from './github-client.js';
import { createSilentLogger } from './logger.js';
import { ErrorCode, isCensusError } from './error-handler.js';
import { Thresholds } from './types.js';

const TEMPLATE_PATH = fileURLToPath(new URL('../templates/report.template.md', import.meta.url));
const NOW = new Date('2024-06-01T00:00:00Z');

describe('parseSince', () => {
  it('should read relative windows', () => {
    expect(parseSince('1y', NOW).toISOString()).toBe('2023-06-02T00:00:00.000Z');
    expect(parseSince(' 2W ', NOW).toISOString()).toBe('2024-05-18T00:00:00.000Z');
    expect(parseSince('30d', NOW).toISOString()).toBe('2024-05-02T00:00:00.000Z');
  });

  it('should read absolute dates as UTC midnight', () => {
    expect(parseSince('2024-01-15', NOW).toISOString()).toBe('2024-01-15T00:00:00.000Z');
  });

  it('should reject anything else', () => {
    for (const value of ['2024-02-30', 'last year', '10x']) {
      let caught: unknown;
      try {
        parseSince(value, NOW);
      } catch (error) {
        caught = error;
      }
      expect(isCensusError(caught, ErrorCode.CONFIG_INVALID)).toBe(true);
    }
  });
});

describe('runAnalysis', () => {
  let dir: string;
  let cache: ConfigCache;

  const thresholds = (consensus: number): Thresholds => ({ report: 1, consensus, pluginSpec: null });

  const store = (id: string, content: string, pushedAt: string | null = null, stars: number = 0) => {
    cache.write({ ...fallbackRepository(id, 'test'), pushedAt, stars }, 'init.lua', content);
  };

  const seedTen = () => {
    for (let i = 0; i < 10; i++) {
      store(`user${i}/nvim`, i < 4 ? 'vim.opt.relativenumber = true\n' : 'local x = 1\n');
    }
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'nvim-census-analyze-'));
    cache = new ConfigCache(join(dir, 'cache'), createSilentLogger());
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should count settings across every config and apply each threshold', () => {
    seedTen();

    const strict = runAnalysis({ cache, thresholds: thresholds(50), detect: false, logger: createSilentLogger() });

    expect(strict.scanned).toBe(10);
    expect(strict.tables.total).toBe(10);
    expect(strict.tables.settings.map(entry => [entry.key, entry.count, entry.percentage])).toEqual([
      ['relativenumber', 4, 40]
    ]);
    expect(strict.report.settings).toHaveLength(1);
    expect(strict.consensus.settings).toEqual([]);
    expect(strict.pluginSpec).toBeNull();

    const loose = runAnalysis({ cache, thresholds: thresholds(30), detect: false, logger: createSilentLogger() });
    expect(loose.consensus.settings.map(entry => entry.key)).toEqual(['relativenumber']);
  });

  it('should leave unparseable files out of the total', () => {
    seedTen();
    store('x/broken', 'vim.opt.number = ');

    const result = runAnalysis({ cache, thresholds: thresholds(50), detect: false, logger: createSilentLogger() });

    expect(result.scanned).toBe(11);
    expect(result.tables.total).toBe(10);
    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0]).toMatchObject({ id: 'x/broken', reason: 'unparseable' });
  });

  it('should filter by push date', () => {
    store('a/recent', 'vim.opt.number = true\n', '2024-05-01T00:00:00Z');
    store('b/old', 'vim.opt.number = true\n', '2023-01-01T00:00:00Z');
    store('c/unknown', 'vim.opt.number = true\n');

    const result = runAnalysis({
      cache,
      thresholds: thresholds(50),
      detect: false,
      since: '6m',
      now: NOW,
      logger: createSilentLogger()
    });

    expect(result.since?.toISOString()).toBe('2023-12-04T00:00:00.000Z');
    expect(result.tables.total).toBe(1);
    expect(result.skipped).toEqual([
      { id: 'b/old', reason: 'filtered-by-date', detail: '2023-01-01T00:00:00Z' },
      { id: 'c/unknown', reason: 'filtered-by-date', detail: 'no push timestamp' }
    ]);
  });

  it('should drop files that do not look like Neovim configs', () => {
    store('a/nvim', 'vim.opt.number = true\nvim.keymap.set("n", "<leader>w", ":w<CR>")\n');
    store('b/awesome', 'local awful = require("awful")\nawful.spawn("xterm")\n');

    const result = runAnalysis({ cache, thresholds: thresholds(50), logger: createSilentLogger() });

    expect(result.tables.total).toBe(1);
    expect(result.skipped).toEqual([{ id: 'b/awesome', reason: 'not-neovim', detail: 'confidence 0.00' }]);
    expect(summarizeSkipped(result.skipped)).toEqual({ 'filtered-by-date': 0, 'not-neovim': 1, unparseable: 0 });
  });

  it('should break consensus ties by popularity', () => {
    store('a/small', 'vim.opt.tabstop = 2\n', null, 3);
    store('z/large', 'vim.opt.tabstop = 4\n', null, 900);

    const result = runAnalysis({ cache, thresholds: thresholds(50), detect: false, logger: createSilentLogger() });

    expect(result.tables.settings[0].consensusValue).toBe('4');
  });

  describe('writeArtifacts', () => {
    it('should write the report and consensus module', () => {
      seedTen();
      const result = runAnalysis({ cache, thresholds: thresholds(30), detect: false, logger: createSilentLogger() });
      const out = join(dir, 'output');

      const written = writeArtifacts(
        result,
        {
          template: TEMPLATE_PATH,
          report: join(out, 'report.md'),
          consensus: join(out, 'consensus.lua'),
          pluginSpec: join(out, 'plugins.lua')
        },
        20,
        NOW
      );

      expect(written).toEqual([join(out, 'report.md'), join(out, 'consensus.lua')]);
      expect(existsSync(join(out, 'plugins.lua'))).toBe(false);
      expect(readFileSync(join(out, 'report.md'), 'utf-8').split('\n')).toContain(
        '| 1 | `vim.opt.relativenumber = true` | 4 | 40.00% |'
      );
      expect(readFileSync(join(out, 'consensus.lua'), 'utf-8').split('\n')).toContain(
        '  vim.opt.relativenumber = true -- 40.00%'
      );
    });

    it('should write the plugin spec when it has a threshold', () => {
      store('a/one', 'require("lazy").setup({ "folke/tokyonight.nvim" })\n');
      const result = runAnalysis({
        cache,
        thresholds: { report: 1, consensus: 50, pluginSpec: 10 },
        detect: false,
        logger: createSilentLogger()
      });
      const out = join(dir, 'output');

      const written = writeArtifacts(
        result,
        {
          template: TEMPLATE_PATH,
          report: join(out, 'report.md'),
          consensus: join(out, 'consensus.lua'),
          pluginSpec: join(out, 'plugins.lua')
        },
        20,
        NOW
      );

      expect(written).toHaveLength(3);
      expect(readFileSync(join(out, 'plugins.lua'), 'utf-8').split('\n')).toContain(
        '  { "folke/tokyonight.nvim" }, -- 100.00%'
      );
    });
  });
});
