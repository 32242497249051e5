/**
 * Core data types for the nvim-census system
 */

export type StrategyKind = 'path' | 'popularity' | 'created' | 'pushed' | 'language' | 'topic' | 'custom';

/**
 * One partition of the code search space. The id doubles as the checkpoint key.
 */
export interface QueryStrategy {
  id: string;                   // stable key, defaults to the query text
  query: string;                // GitHub code search query
  kind: StrategyKind;
}

export interface RepositoryRef {
  id: string;                   // "owner/name"
  owner: string;
  name: string;
  url: string;                  // GitHub URL
  stars: number;                // popularity score
  defaultBranch: string;
  pushedAt: string | null;      // ISO date string of last push
  strategy: string;             // id of the strategy that discovered it
}

export interface CachedConfig {
  repo: RepositoryRef;
  path: string;                 // path of the matched file inside the repository
  content: string;              // raw Lua source
  fetchedAt: string;            // ISO timestamp
  contentHash: string;          // sha256 hex of content
}

/**
 * Sidecar stored next to each cached config
 */
export interface ConfigSidecar {
  repo: string;
  url: string;
  stars: number;
  defaultBranch: string;
  pushedAt: string | null;
  path: string;
  strategy: string;
  fetchedAt: string;
  contentHash: string;
}

export type StrategyStatus = 'pending' | 'paginating' | 'exhausted' | 'failed';

export interface StrategyProgress {
  status: StrategyStatus;
  cursor: number;               // next page to request (1-based)
  error?: string;
}

export interface CrawlCheckpoint {
  processed: Set<string>;
  failed: Set<string>;
  strategies: Map<string, StrategyProgress>;
  totalFetched: number;
  savedAt: string | null;
}

/**
 * A code search hit before the repository has been resolved
 */
export interface SearchHit {
  repo: string;                 // "owner/name"
  url: string;
  path: string;
}

export interface SearchPage {
  hits: SearchHit[];
  nextCursor: number | null;    // null once the strategy is exhausted
  totalCount: number;
}

export type OptionNamespace = 'opt' | 'opt_local' | 'opt_global' | 'o' | 'go' | 'bo' | 'wo' | 'g';

export type PluginSpecKind = 'lazy' | 'packer' | 'paq';

export interface SettingFact {
  kind: 'setting';
  namespace: OptionNamespace;
  key: string;
  value: string;                // canonical rendering of the assigned expression
  source: string;
}

export interface KeymapFact {
  kind: 'keymap';
  mode: string;
  lhs: string;
  rhs: string | null;
  source: string;
}

export interface PluginFact {
  kind: 'plugin';
  name: string;                 // "owner/name"
  spec: PluginSpecKind;
  source: string;
}

export interface ColorschemeFact {
  kind: 'colorscheme';
  name: string;
  source: string;
}

export type StructuralFact = SettingFact | KeymapFact | PluginFact | ColorschemeFact;

export type ParseOutcome =
  | { status: 'parsed' }
  | { status: 'unparseable'; error: string };

export interface ExtractionResult {
  facts: StructuralFact[];
  outcome: ParseOutcome;
}

/**
 * Facts of one config as fed to the aggregator
 */
export interface ConfigFacts {
  id: string;
  popularity: number;
  facts: StructuralFact[];
}

export interface AggregateEntry {
  key: string;
  count: number;                // distinct configs containing the key
  total: number;                // configs considered
  percentage: number;           // unrounded, 0-100
}

export interface ValueCount {
  value: string;
  count: number;
}

export interface SettingEntry extends AggregateEntry {
  scope: 'option' | 'global';
  name: string;                 // key without the "g." prefix
  values: ValueCount[];         // ranked value distribution
  consensusValue: string;
}

export interface RankedTables {
  total: number;
  settings: SettingEntry[];
  colorschemes: AggregateEntry[];
  plugins: AggregateEntry[];
  keymaps: AggregateEntry[];
  leaderKeys: AggregateEntry[];  // values of g.mapleader, keyed by the Lua value
}

export interface Thresholds {
  report: number;
  consensus: number;
  pluginSpec: number | null;
}

export type SkipReason = 'filtered-by-date' | 'not-neovim' | 'unparseable';

export interface SkippedFile {
  id: string;
  reason: SkipReason;
  detail?: string;
}
