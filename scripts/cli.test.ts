/**
 * Command line wiring, driven through createProgram with captured output
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import * as yaml from 'js-yaml';
import { createProgram, reportFatal } from './cli.js';
import { ConfigCache } from './cache-manager.js';
import { fallbackRepository } from './github-client.js';
import { createSilentLogger } from './logger.js';
import { ErrorCode, createCheckpointError } from './error-handler.js';

const TEMPLATE_PATH = fileURLToPath(new URL('../templates/report.template.md', import.meta.url));
const DATA_DIR = fileURLToPath(new URL('../data', import.meta.url));

describe('nvim-census CLI', () => {
  let dir: string;
  let configPath: string;
  let output: string[];

  const run = (...args: string[]) =>
    createProgram({ print: line => output.push(line), env: {}, exitOverride: true }).parseAsync(
      ['--config', configPath, '--data-dir', DATA_DIR, ...args],
      { from: 'user' }
    );

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'nvim-census-cli-'));
    configPath = join(dir, 'config.yml');
    output = [];

    writeFileSync(
      configPath,
      yaml.dump({
        crawler: { cache: { directory: join(dir, 'cache') }, stateFile: join(dir, 'fetch_state.json') },
        rendering: {
          template: TEMPLATE_PATH,
          report: join(dir, 'output', 'report.md'),
          consensus: join(dir, 'output', 'consensus.lua')
        }
      })
    );

    const cache = new ConfigCache(join(dir, 'cache'), createSilentLogger());
    for (let i = 0; i < 10; i++) {
      cache.write(
        fallbackRepository(`user${i}/nvim`, 'test'),
        'init.lua',
        i < 4 ? 'vim.opt.relativenumber = true\n' : 'local x = 1\n'
      );
    }
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('analyze', () => {
    it('should print a summary and write the artifacts', async () => {
      await run('analyze', '--no-detect', '--threshold', '30');

      expect(output).toContain('   Cached files: 10');
      expect(output).toContain('   Configs analyzed: 10');
      expect(output).toContain('     40.00%  vim.opt.relativenumber = true');
      expect(output).toContain(`✅ Wrote ${join(dir, 'output', 'report.md')}`);
      expect(output).toContain(`✅ Wrote ${join(dir, 'output', 'consensus.lua')}`);
      expect(readFileSync(join(dir, 'output', 'consensus.lua'), 'utf-8')).toContain(
        '  vim.opt.relativenumber = true -- 40.00%'
      );
    });

    it('should honor output flags and the plugin spec', async () => {
      const report = join(dir, 'elsewhere', 'census.md');
      const plugins = join(dir, 'elsewhere', 'plugins.lua');

      await run('analyze', '--no-detect', '-o', report, '--plugins-output', plugins, '--plugin-threshold', '10');

      expect(existsSync(report)).toBe(true);
      expect(readFileSync(plugins, 'utf-8')).toContain('return {\n}\n');
    });

    it('should reject thresholds outside 0..100', async () => {
      await expect(run('analyze', '--no-detect', '--threshold', '150')).rejects.toMatchObject({
        code: ErrorCode.THRESHOLD_CONFIG
      });
    });

    it('should reject a malformed row count', async () => {
      await expect(run('analyze', '--top-n', 'many')).rejects.toMatchObject({ code: 'commander.invalidArgument' });
      expect(output.join('\n')).toContain('Expected a positive integer.');
    });

    it('should reject an invalid since window', async () => {
      await expect(run('analyze', '--no-detect', '--since', 'yesterday')).rejects.toMatchObject({
        code: ErrorCode.CONFIG_INVALID
      });
    });
  });

  describe('fetch-all', () => {
    it('should list strategies without a token', async () => {
      await run('fetch-all', '--show-strategies');

      expect(output[0]).toMatch(/^\d+ strategies, 0 repositories processed$/);
      expect(output).toContain('  pending    page  1  path-nvim  filename:init.lua path:nvim');
    });

    it('should require a token to crawl', async () => {
      await expect(run('fetch-all')).rejects.toMatchObject({ code: ErrorCode.AUTH_REQUIRED });
    });
  });
});

describe('reportFatal', () => {
  it('should print the formatted error and its suggestions', () => {
    const lines: string[] = [];
    reportFatal(createCheckpointError('Checkpoint is not valid JSON', 'fetch_state.json'), line => lines.push(line));

    expect(lines).toEqual([
      '❌ [CHECKPOINT_CORRUPT] Checkpoint is not valid JSON (Component: checkpoint) (Resource: fetch_state.json)',
      '   • Run again with --no-resume to start from a fresh checkpoint',
      '   • Cached configs are kept and will not be fetched again'
    ]);
  });

  it('should print plain errors', () => {
    const lines: string[] = [];
    reportFatal(new Error('boom'), line => lines.push(line));
    expect(lines).toEqual(['❌ Fatal error: boom']);
  });
});
