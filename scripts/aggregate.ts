/**
 * Fold per-config facts into ranked frequency tables
 *
 * Tallying is a map-reduce: each config is tallied on its own, tallies merge
 * commutatively, and ranking happens once at the end.
 */

import {
  AggregateEntry,
  ConfigFacts,
  RankedTables,
  SettingEntry,
  StructuralFact,
  ValueCount
} from './types.js';

interface ValueTally {
  count: number;
  firstRank: number;            // position of the first config that used the value
}

interface SettingTally {
  count: number;
  values: Map<string, ValueTally>;
}

export interface Tally {
  configs: number;
  settings: Map<string, SettingTally>;
  colorschemes: Map<string, number>;
  plugins: Map<string, number>;
  keymaps: Map<string, number>;
}

export function emptyTally(): Tally {
  return {
    configs: 0,
    settings: new Map(),
    colorschemes: new Map(),
    plugins: new Map(),
    keymaps: new Map()
  };
}

const LEADER_KEY = 'g.mapleader';

export function settingKey(fact: Extract<StructuralFact, { kind: 'setting' }>): string {
  return fact.namespace === 'g' ? `g.${fact.key}` : fact.key;
}

export function keymapKey(fact: Extract<StructuralFact, { kind: 'keymap' }>): string {
  return `${fact.mode} ${fact.lhs}`;
}

/**
 * Tally one config. Every key counts once; a setting takes its last assigned value.
 */
export function tallyConfig(config: ConfigFacts, rank: number): Tally {
  const settings = new Map<string, string>();
  const colorschemes = new Set<string>();
  const plugins = new Set<string>();
  const keymaps = new Set<string>();

  for (const fact of config.facts) {
    switch (fact.kind) {
      case 'setting':
        settings.set(settingKey(fact), fact.value);
        break;
      case 'keymap':
        keymaps.add(keymapKey(fact));
        break;
      case 'plugin':
        plugins.add(fact.name);
        break;
      case 'colorscheme':
        colorschemes.add(fact.name);
        break;
    }
  }

  const tally = emptyTally();
  tally.configs = 1;
  for (const [key, value] of settings) {
    tally.settings.set(key, { count: 1, values: new Map([[value, { count: 1, firstRank: rank }]]) });
  }
  for (const key of colorschemes) tally.colorschemes.set(key, 1);
  for (const key of plugins) tally.plugins.set(key, 1);
  for (const key of keymaps) tally.keymaps.set(key, 1);
  return tally;
}

function mergeCounts(a: Map<string, number>, b: Map<string, number>): Map<string, number> {
  const merged = new Map(a);
  for (const [key, count] of b) {
    merged.set(key, (merged.get(key) ?? 0) + count);
  }
  return merged;
}

function mergeValues(a: Map<string, ValueTally>, b: Map<string, ValueTally>): Map<string, ValueTally> {
  const merged = new Map<string, ValueTally>();
  for (const [value, tally] of a) {
    merged.set(value, { ...tally });
  }
  for (const [value, tally] of b) {
    const existing = merged.get(value);
    merged.set(
      value,
      existing
        ? { count: existing.count + tally.count, firstRank: Math.min(existing.firstRank, tally.firstRank) }
        : { ...tally }
    );
  }
  return merged;
}

/**
 * Combine two tallies. Commutative and associative; neither input is modified.
 */
export function mergeTallies(a: Tally, b: Tally): Tally {
  const settings = new Map<string, SettingTally>();
  for (const [key, tally] of a.settings) {
    settings.set(key, { count: tally.count, values: mergeValues(tally.values, new Map()) });
  }
  for (const [key, tally] of b.settings) {
    const existing = settings.get(key);
    settings.set(key, existing
      ? { count: existing.count + tally.count, values: mergeValues(existing.values, tally.values) }
      : { count: tally.count, values: mergeValues(tally.values, new Map()) });
  }

  return {
    configs: a.configs + b.configs,
    settings,
    colorschemes: mergeCounts(a.colorschemes, b.colorschemes),
    plugins: mergeCounts(a.plugins, b.plugins),
    keymaps: mergeCounts(a.keymaps, b.keymaps)
  };
}

export function percentageOf(count: number, total: number): number {
  return total === 0 ? 0 : (count * 100) / total;
}

/**
 * Descending percentage, then ascending key by code unit
 */
export function compareEntries(a: AggregateEntry, b: AggregateEntry): number {
  if (a.percentage !== b.percentage) {
    return b.percentage - a.percentage;
  }
  if (a.key === b.key) {
    return 0;
  }
  return a.key < b.key ? -1 : 1;
}

function rankCounts(counts: Map<string, number>, total: number): AggregateEntry[] {
  return [...counts]
    .map(([key, count]) => ({ key, count, total, percentage: percentageOf(count, total) }))
    .sort(compareEntries);
}

function rankValues(values: Map<string, ValueTally>): Array<ValueCount & { firstRank: number }> {
  return [...values]
    .map(([value, tally]) => ({ value, count: tally.count, firstRank: tally.firstRank }))
    .sort((a, b) => {
      if (a.count !== b.count) return b.count - a.count;
      if (a.firstRank !== b.firstRank) return a.firstRank - b.firstRank;
      if (a.value === b.value) return 0;
      return a.value < b.value ? -1 : 1;
    });
}

/**
 * Turn a tally into ranked tables. total defaults to the number of tallied configs.
 */
export function rankTallies(tally: Tally, total: number = tally.configs): RankedTables {
  const settings: SettingEntry[] = [...tally.settings]
    .map(([key, setting]) => {
      const values = rankValues(setting.values);
      const global = key.startsWith('g.');
      return {
        key,
        count: setting.count,
        total,
        percentage: percentageOf(setting.count, total),
        scope: global ? 'global' as const : 'option' as const,
        name: global ? key.slice(2) : key,
        values: values.map(({ value, count }) => ({ value, count })),
        consensusValue: values[0]?.value ?? 'nil'
      };
    })
    .sort(compareEntries);

  // Same order as the mapleader value distribution, so the top leader key is its consensus value
  const leader = settings.find(entry => entry.key === LEADER_KEY);
  const leaderKeys: AggregateEntry[] = (leader?.values ?? []).map(({ value, count }) => ({
    key: value,
    count,
    total,
    percentage: percentageOf(count, total)
  }));

  return {
    total,
    settings,
    colorschemes: rankCounts(tally.colorschemes, total),
    plugins: rankCounts(tally.plugins, total),
    keymaps: rankCounts(tally.keymaps, total),
    leaderKeys
  };
}

/**
 * Popularity descending, then id ascending. Consensus ties resolve in this order.
 */
export function orderConfigs(configs: ConfigFacts[]): ConfigFacts[] {
  return [...configs].sort((a, b) => {
    if (a.popularity !== b.popularity) return b.popularity - a.popularity;
    if (a.id === b.id) return 0;
    return a.id < b.id ? -1 : 1;
  });
}

export function aggregate(configs: ConfigFacts[], totalConfigs?: number): RankedTables {
  const tally = orderConfigs(configs)
    .map((config, rank) => tallyConfig(config, rank))
    .reduce(mergeTallies, emptyTally());
  return rankTallies(tally, totalConfigs ?? tally.configs);
}

export function meetsThreshold<T extends AggregateEntry>(entries: T[], threshold: number): T[] {
  return entries.filter(entry => entry.percentage >= threshold);
}

/**
 * Restrict every table to entries at or above the threshold
 */
export function applyThresholds(tables: RankedTables, threshold: number): RankedTables {
  return {
    total: tables.total,
    settings: meetsThreshold(tables.settings, threshold),
    colorschemes: meetsThreshold(tables.colorschemes, threshold),
    plugins: meetsThreshold(tables.plugins, threshold),
    keymaps: meetsThreshold(tables.keymaps, threshold),
    leaderKeys: meetsThreshold(tables.leaderKeys, threshold)
  };
}

export function formatPercentage(percentage: number): string {
  return `${percentage.toFixed(2)}%`;
}
