import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import {
  TemplateRenderer,
  escapeTableCell,
  renderConsensusLua,
  renderPluginSpec,
  renderReport,
  settingStatement
} from './render.js';
import { ErrorCode, isCensusError } from './error-handler.js';
import { RankedTables, SettingEntry } from './types.js';

const TEMPLATE_PATH = fileURLToPath(new URL('../templates/report.template.md', import.meta.url));
const GENERATED_AT = new Date('2024-06-01T08:30:00Z');

function settingEntry(key: string, count: number, consensusValue: string): SettingEntry {
  const global = key.startsWith('g.');
  return {
    key,
    count,
    total: 4,
    percentage: (count / 4) * 100,
    scope: global ? 'global' : 'option',
    name: global ? key.slice(2) : key,
    values: [{ value: consensusValue, count }],
    consensusValue
  };
}

const tables: RankedTables = {
  total: 4,
  settings: [
    settingEntry('number', 4, 'true'),
    settingEntry('g.mapleader', 3, '" "'),
    settingEntry('foldexpr', 2, '<expr>'),
    settingEntry('g.my-var', 1, '1')
  ],
  colorschemes: [{ key: 'habamax', count: 2, total: 4, percentage: 50 }],
  plugins: [
    { key: 'folke/lazy.nvim', count: 3, total: 4, percentage: 75 },
    { key: 'nvim-lualine/lualine.nvim', count: 1, total: 4, percentage: 25 }
  ],
  keymaps: [
    { key: 'n <leader>w', count: 2, total: 4, percentage: 50 },
    { key: 'n a|b', count: 1, total: 4, percentage: 25 }
  ],
  leaderKeys: [{ key: '" "', count: 3, total: 4, percentage: 75 }]
};

describe('TemplateRenderer', () => {
  const renderer = new TemplateRenderer();

  it('should substitute nested variables', () => {
    expect(renderer.render('Hello {{user.name}}{{missing}}!', { user: { name: 'Ann' } })).toBe('Hello Ann!');
  });

  it('should render conditionals and each-blocks', () => {
    const template = '{{#if list}}has {{#each list}}[{{this.name}}]{{/each}}{{/if}}!';

    expect(renderer.render(template, { list: [{ name: 'a' }, { name: 'b' }] })).toBe('has [a][b]!');
    expect(renderer.render(template, { list: [] })).toBe('!');
  });

  it('should not expand placeholders inside substituted values', () => {
    expect(renderer.render('{{a}}', { a: '{{b}}', b: 'x' })).toBe('{{b}}');
  });
});

describe('escapeTableCell', () => {
  it('should escape pipes and flatten newlines', () => {
    expect(escapeTableCell('a|b\nc')).toBe('a\\|b c');
  });
});

describe('settingStatement', () => {
  it('should write options, globals and non-identifier names', () => {
    expect(tables.settings.map(settingStatement)).toEqual([
      'vim.opt.number = true',
      'vim.g.mapleader = " "',
      'vim.opt.foldexpr = <expr>',
      'vim.g["my-var"] = 1'
    ]);
  });

  it('should write each segment of a nested option path', () => {
    expect(settingStatement(settingEntry('listchars.tab', 2, '"» "'))).toBe('vim.opt.listchars.tab = "» "');
    expect(settingStatement(settingEntry('g.plugin.my-flag', 1, 'true'))).toBe('vim.g.plugin["my-flag"] = true');
  });
});

describe('renderReport', () => {
  const options = {
    templatePath: TEMPLATE_PATH,
    thresholds: { report: 50, consensus: 50, pluginSpec: null },
    topN: 1,
    scanned: 6,
    generatedAt: GENERATED_AT
  };

  it('should fill the header and limit every table to the top entries', () => {
    const report = renderReport(tables, { ...options, skipped: [{ id: 'x/y', reason: 'not-neovim' }] });
    const lines = report.split('\n');

    expect(lines).toContain(
      'Statistics over **4** Neovim `init.lua` configurations harvested from GitHub code search (6 cached files scanned). Generated 2024-06-01.'
    );
    expect(lines).toContain('Every table lists entries found in at least 50.00% of configurations, limited to the top 1.');
    expect(lines).toContain('| Not a Neovim config | 1 |');
    expect(lines).toContain('| 1 | `vim.opt.number = true` | 4 | 100.00% |');
    expect(lines).toContain('| 1 | `habamax` | 2 | 50.00% |');
    expect(lines).toContain('| 1 | `folke/lazy.nvim` | 3 | 75.00% |');
    expect(lines).toContain('| 1 | `n <leader>w` | 2 | 50.00% |');
    expect(lines).toContain('| 1 | `" "` | 3 | 75.00% |');
    expect(lines.filter(line => line.startsWith('| 2 |'))).toEqual([]);
  });

  it('should drop the skipped section when nothing was skipped', () => {
    const report = renderReport(tables, { ...options, skipped: [] });
    expect(report).not.toContain('## Skipped files');
  });

  it('should escape pipes in table cells', () => {
    const report = renderReport(tables, { ...options, thresholds: { ...options.thresholds, report: 0 }, topN: 5, skipped: [] });
    expect(report.split('\n')).toContain('| 2 | `n a\\|b` | 1 | 25.00% |');
  });

  it('should fail with a file error when the template is missing', () => {
    let caught: unknown;
    try {
      renderReport(tables, { ...options, templatePath: '/nonexistent/report.md', skipped: [] });
    } catch (error) {
      caught = error;
    }
    expect(isCensusError(caught, ErrorCode.FILE_NOT_FOUND)).toBe(true);
  });
});

describe('renderConsensusLua', () => {
  it('should write the leader key, options and listings at the threshold', () => {
    expect(renderConsensusLua(tables, 50, GENERATED_AT)).toBe(
      [
        '-- consensus.lua',
        '-- Community-consensus Neovim configuration',
        '-- Based on analysis of 4 configurations',
        '-- Generated: 2024-06-01',
        '-- Settings appearing in 50.00%+ of configs',
        '',
        'local M = {}',
        '',
        'function M.setup()',
        '  -- Leader key',
        '  vim.g.mapleader = " " -- 75.00%',
        '  vim.g.maplocalleader = " "',
        '',
        '  -- Options',
        '  vim.opt.number = true -- 100.00%',
        '  -- vim.opt.foldexpr = <expr> -- 50.00%',
        'end',
        '',
        'M.plugins = {',
        '  "folke/lazy.nvim", -- 75.00%',
        '}',
        '',
        'M.colorschemes = {',
        '  "habamax", -- 50.00%',
        '}',
        '',
        'return M',
        ''
      ].join('\n')
    );
  });

  it('should write globals without the leader keys and runtime flags', () => {
    const withFlags: RankedTables = {
      ...tables,
      settings: [...tables.settings, settingEntry('g.loaded_netrw', 2, '1')],
      leaderKeys: [{ key: '","', count: 1, total: 4, percentage: 25 }]
    };

    expect(renderConsensusLua(withFlags, 20, GENERATED_AT)).toContain(
      [
        'function M.setup()',
        '  -- Leader key',
        '  vim.g.mapleader = "," -- 25.00%',
        '',
        '  -- Globals',
        '  vim.g["my-var"] = 1 -- 25.00%',
        '',
        '  -- Options',
        '  vim.opt.number = true -- 100.00%',
        '  -- vim.opt.foldexpr = <expr> -- 50.00%',
        'end'
      ].join('\n')
    );
  });

  it('should write the leader key even below the threshold', () => {
    const lua = renderConsensusLua(tables, 100.5, GENERATED_AT);
    expect(lua).toContain('function M.setup()\n  -- Leader key\n  vim.g.mapleader = " " -- 75.00%\n  vim.g.maplocalleader = " "\nend\n');
  });

  it('should leave the setup function empty above every percentage without a leader key', () => {
    const lua = renderConsensusLua({ ...tables, leaderKeys: [] }, 100.5, GENERATED_AT);
    expect(lua).toContain('function M.setup()\nend\n\nM.plugins = {\n}\n');
  });
});

describe('renderPluginSpec', () => {
  it('should list plugins at or above the threshold', () => {
    expect(renderPluginSpec(tables, 20, GENERATED_AT)).toBe(
      [
        '-- Popular plugins for lazy.nvim',
        '-- Based on analysis of 4 configurations',
        '-- Generated: 2024-06-01',
        '',
        'return {',
        '  { "folke/lazy.nvim" }, -- 75.00%',
        '  { "nvim-lualine/lualine.nvim" }, -- 25.00%',
        '}',
        ''
      ].join('\n')
    );
  });
});
