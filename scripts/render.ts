/**
 * Report artifacts: the Markdown report, the consensus Lua module and the
 * lazy.nvim plugin spec
 */

import { readFileSync } from 'fs';
import { AggregateEntry, RankedTables, SettingEntry, SkippedFile, Thresholds } from './types.js';
import { formatPercentage, meetsThreshold } from './aggregate.js';
import { isLuaIdentifier } from './lua-syntax.js';
import { quoteLuaString } from './extractor.js';
import { isRecord } from './validation.js';
import { createFileError, errorMessage } from './error-handler.js';

/**
 * Handlebars-like renderer for `{{var}}`, `{{#if x}}...{{/if}}` and
 * `{{#each list}}...{{this.field}}...{{/each}}`.
 *
 * Conditionals are resolved first. Variables and each-blocks are then
 * substituted in one pass, so inserted values are never scanned again.
 */
export class TemplateRenderer {
  render(template: string, data: Record<string, unknown>): string {
    const withConditionals = template.replace(
      /\{\{#if\s+([^}]+)\}\}([\s\S]*?)\{\{\/if\}\}/g,
      (_match, condition: string, content: string) => (this.isTruthy(this.getNestedValue(data, condition.trim())) ? content : '')
    );

    return withConditionals.replace(
      /\{\{#each\s+([^}]+)\}\}([\s\S]*?)\{\{\/each\}\}|\{\{([^#/\s}]+)\}\}/g,
      (_match, arrayPath: string | undefined, content: string | undefined, key: string | undefined) => {
        if (arrayPath !== undefined && content !== undefined) {
          return this.renderEach(this.getNestedValue(data, arrayPath.trim()), content);
        }
        return this.stringify(this.getNestedValue(data, (key ?? '').trim()));
      }
    );
  }

  private renderEach(list: unknown, content: string): string {
    if (!Array.isArray(list)) {
      return '';
    }

    return list
      .map(item =>
        content.replace(/\{\{this(?:\.([^}]+))?\}\}/g, (_match, prop: string | undefined) =>
          this.stringify(prop === undefined ? item : this.getNestedValue(item, prop.trim()))
        )
      )
      .join('');
  }

  private isTruthy(value: unknown): boolean {
    return Array.isArray(value) ? value.length > 0 : Boolean(value);
  }

  private stringify(value: unknown): string {
    return value === undefined || value === null ? '' : String(value);
  }

  /**
   * Get nested value from object using dot notation
   */
  private getNestedValue(obj: unknown, path: string): unknown {
    return path.split('.').reduce<unknown>((current, key) => (isRecord(current) ? current[key] : undefined), obj);
  }
}

// ---------------------------------------------------------------------------
// Lua text

// `listchars.tab` is a field of the listchars option, not a name containing a dot
function luaPath(prefix: string, name: string): string {
  return name
    .split('.')
    .reduce((path, segment) => (isLuaIdentifier(segment) ? `${path}.${segment}` : `${path}[${quoteLuaString(segment)}]`), prefix);
}

/**
 * Lua statement that reproduces a setting with its consensus value
 */
export function settingStatement(entry: SettingEntry): string {
  const prefix = entry.scope === 'global' ? 'vim.g' : 'vim.opt';
  return `${luaPath(prefix, entry.name)} = ${entry.consensusValue}`;
}

// `<function>` and `<expr>` are placeholders, not Lua
function isLiteralLua(value: string): boolean {
  return !/<(?:function|expr)>/.test(value);
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// ---------------------------------------------------------------------------
// Markdown

export function escapeTableCell(text: string): string {
  return text.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
}

function codeSpan(text: string): string {
  return text.includes('`') ? `\`\` ${text} \`\`` : `\`${text}\``;
}

interface ReportRow {
  rank: number;
  label: string;
  percentage: string;
  count: number;
}

function toRows<T extends AggregateEntry>(entries: T[], topN: number, label: (entry: T) => string): ReportRow[] {
  return entries.slice(0, topN).map((entry, index) => ({
    rank: index + 1,
    label: escapeTableCell(codeSpan(label(entry))),
    percentage: formatPercentage(entry.percentage),
    count: entry.count
  }));
}

export interface ReportOptions {
  templatePath: string;
  thresholds: Thresholds;
  topN: number;
  skipped: SkippedFile[];
  scanned: number;
  generatedAt?: Date;
}

/**
 * Render the Markdown report. Each table keeps entries at or above the report
 * threshold, limited to the top N.
 */
export function renderReport(tables: RankedTables, options: ReportOptions): string {
  let template: string;
  try {
    template = readFileSync(options.templatePath, 'utf-8');
  } catch (error) {
    throw createFileError(`Report template not readable: ${errorMessage(error)}`, options.templatePath);
  }

  const threshold = options.thresholds.report;
  const settings = toRows(meetsThreshold(tables.settings, threshold), options.topN, settingStatement);
  const colorschemes = toRows(meetsThreshold(tables.colorschemes, threshold), options.topN, entry => entry.key);
  const plugins = toRows(meetsThreshold(tables.plugins, threshold), options.topN, entry => entry.key);
  const keymaps = toRows(meetsThreshold(tables.keymaps, threshold), options.topN, entry => entry.key);
  const leaderKeys = toRows(meetsThreshold(tables.leaderKeys, threshold), options.topN, entry => entry.key);

  const skippedCount = (reason: SkippedFile['reason']): number =>
    options.skipped.filter(file => file.reason === reason).length;

  return new TemplateRenderer().render(template, {
    date: formatDate(options.generatedAt ?? new Date()),
    scanned: options.scanned,
    total: tables.total,
    reportThreshold: formatPercentage(threshold),
    topN: options.topN,
    skipped: options.skipped.length > 0,
    filteredByDate: skippedCount('filtered-by-date'),
    notNeovim: skippedCount('not-neovim'),
    unparseable: skippedCount('unparseable'),
    settings,
    leaderKeys,
    colorschemes,
    plugins,
    keymaps
  });
}

// ---------------------------------------------------------------------------
// Lua artifacts

// Set by the leader key block, or plugin and runtime bookkeeping rather than preferences
const UNLISTED_SETTINGS = new Set([
  'mapleader',
  'maplocalleader',
  'loaded_netrw',
  'loaded_netrwPlugin',
  'base46_cache',
  'have_nerd_font'
]);

function statementLine(statement: string, value: string, percentage: number): string {
  const line = `${statement} -- ${formatPercentage(percentage)}`;
  return isLiteralLua(value) ? `  ${line}` : `  -- ${line}`;
}

function leaderKeyBlock(leader: AggregateEntry | undefined): string[] {
  if (!leader) {
    return [];
  }
  const block = ['  -- Leader key', statementLine(`vim.g.mapleader = ${leader.key}`, leader.key, leader.percentage)];
  if (leader.key === '" "') {
    block.push('  vim.g.maplocalleader = " "');
  }
  return block;
}

/**
 * Consensus module: the most common leader key, then globals and options at
 * or above the consensus threshold with their consensus values
 */
export function renderConsensusLua(tables: RankedTables, threshold: number, generatedAt: Date = new Date()): string {
  const included = meetsThreshold(tables.settings, threshold).filter(entry => !UNLISTED_SETTINGS.has(entry.name));
  const globals = included.filter(entry => entry.scope === 'global');
  const options = included.filter(entry => entry.scope === 'option');

  const settingLine = (entry: SettingEntry): string =>
    statementLine(settingStatement(entry), entry.consensusValue, entry.percentage);

  const blocks = [
    leaderKeyBlock(tables.leaderKeys[0]),
    globals.length > 0 ? ['  -- Globals', ...globals.map(settingLine)] : [],
    options.length > 0 ? ['  -- Options', ...options.map(settingLine)] : []
  ].filter(block => block.length > 0);

  const lines = [
    '-- consensus.lua',
    '-- Community-consensus Neovim configuration',
    `-- Based on analysis of ${tables.total} configurations`,
    `-- Generated: ${formatDate(generatedAt)}`,
    `-- Settings appearing in ${formatPercentage(threshold)}+ of configs`,
    '',
    'local M = {}',
    '',
    'function M.setup()'
  ];

  blocks.forEach((block, index) => {
    lines.push(...(index > 0 ? [''] : []), ...block);
  });

  const listing = (entries: AggregateEntry[]): string[] =>
    entries.map(entry => `  ${quoteLuaString(entry.key)}, -- ${formatPercentage(entry.percentage)}`);

  lines.push(
    'end',
    '',
    'M.plugins = {',
    ...listing(meetsThreshold(tables.plugins, threshold)),
    '}',
    '',
    'M.colorschemes = {',
    ...listing(meetsThreshold(tables.colorschemes, threshold)),
    '}',
    '',
    'return M',
    ''
  );

  return lines.join('\n');
}

/**
 * lazy.nvim spec listing plugins at or above the threshold
 */
export function renderPluginSpec(tables: RankedTables, threshold: number, generatedAt: Date = new Date()): string {
  const lines = [
    '-- Popular plugins for lazy.nvim',
    `-- Based on analysis of ${tables.total} configurations`,
    `-- Generated: ${formatDate(generatedAt)}`,
    '',
    'return {',
    ...meetsThreshold(tables.plugins, threshold).map(
      entry => `  { ${quoteLuaString(entry.key)} }, -- ${formatPercentage(entry.percentage)}`
    ),
    '}',
    ''
  ];
  return lines.join('\n');
}
