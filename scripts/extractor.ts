/**
 * Structural fact extraction from a Neovim init.lua
 */

import {
  ExtractionResult,
  OptionNamespace,
  PluginSpecKind,
  StructuralFact
} from './types.js';
import {
  LuaCall,
  LuaExpr,
  LuaField,
  LuaFunction,
  LuaStmt,
  isLuaIdentifier,
  parseLua
} from './lua-syntax.js';
import { DataLoader } from './config.js';
import { ColorschemeModules } from './validation.js';
import { errorMessage } from './error-handler.js';

const OPTION_PATH = /^vim\.(opt|opt_local|opt_global|o|go|bo|wo|g)\.(.+)$/;
const PLUGIN_NAME = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;
const MAX_ALIAS_DEPTH = 8;
const THEME_SETUP = /^require\("([^"\\]+)"\)\.(?:setup|load)$/;

const KEYMAP_CALLEES: Record<string, { modeArg: number }> = {
  'vim.keymap.set': { modeArg: 0 },
  'vim.api.nvim_set_keymap': { modeArg: 0 },
  'vim.api.nvim_buf_set_keymap': { modeArg: 1 }
};

const COMMAND_CALLEES = new Set([
  'vim.cmd',
  'vim.command',
  'vim.api.nvim_command',
  'vim.api.nvim_exec',
  'vim.api.nvim_exec2',
  'vim.api.nvim_cmd'
]);

function isOptionNamespace(value: string): value is OptionNamespace {
  return ['opt', 'opt_local', 'opt_global', 'o', 'go', 'bo', 'wo', 'g'].includes(value);
}

// ---------------------------------------------------------------------------
// Canonical rendering

const CONTROL_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t'
};

/**
 * Double-quoted Lua literal for a string value
 */
export function quoteLuaString(value: string): string {
  let out = '"';
  for (const ch of value) {
    const escape = CONTROL_ESCAPES[ch];
    if (escape) {
      out += escape;
      continue;
    }
    const code = ch.codePointAt(0) ?? 0;
    out += code < 32 || code === 127 ? `\\${String(code).padStart(3, '0')}` : ch;
  }
  return out + '"';
}

function renderField(field: LuaField): string {
  switch (field.kind) {
    case 'positional':
      return renderExpr(field.value);
    case 'named':
      return `${field.key}=${renderExpr(field.value)}`;
    case 'computed':
      if (field.key.kind === 'string' && isLuaIdentifier(field.key.value)) {
        return `${field.key.value}=${renderExpr(field.value)}`;
      }
      return `[${renderExpr(field.key)}]=${renderExpr(field.value)}`;
  }
}

function renderOperand(expr: LuaExpr): string {
  return expr.kind === 'binary' ? `(${renderExpr(expr)})` : renderExpr(expr);
}

/**
 * Canonical text of an expression: literals normalized, tables in source
 * order, everything else re-rendered from the tree
 */
export function renderExpr(expr: LuaExpr): string {
  switch (expr.kind) {
    case 'string':
      return quoteLuaString(expr.value);
    case 'number':
      return expr.raw;
    case 'boolean':
      return expr.value ? 'true' : 'false';
    case 'nil':
      return 'nil';
    case 'vararg':
      return '...';
    case 'name':
      return expr.name;
    case 'field':
      if (!expr.method && !isLuaIdentifier(expr.key)) {
        return `${renderExpr(expr.base)}[${quoteLuaString(expr.key)}]`;
      }
      return `${renderExpr(expr.base)}${expr.method ? ':' : '.'}${expr.key}`;
    case 'index':
      return `${renderExpr(expr.base)}[${renderExpr(expr.index)}]`;
    case 'call':
      return `${renderExpr(expr.callee)}(${expr.args.map(renderExpr).join(',')})`;
    case 'table':
      return `{${expr.fields.map(renderField).join(',')}}`;
    case 'function':
      return '<function>';
    case 'unary':
      return `${expr.op === 'not' ? 'not ' : expr.op}${renderOperand(expr.arg)}`;
    case 'binary':
      return `${renderOperand(expr.left)} ${expr.op} ${renderOperand(expr.right)}`;
    case 'opaque':
      return '<expr>';
  }
}

// ---------------------------------------------------------------------------
// Scope: local aliases and single-call wrapper functions

interface Wrapper {
  params: string[];
  call: LuaCall;
}

/**
 * File-wide view of local bindings. The first binding of a name wins.
 */
export class AliasScope {
  private aliases = new Map<string, LuaExpr>();
  private wrappers = new Map<string, Wrapper>();
  private templates = new Set<LuaCall>();

  constructor(body: LuaStmt[]) {
    this.collect(body);
  }

  private bind(name: string, value: LuaExpr): void {
    if (!this.aliases.has(name)) {
      this.aliases.set(name, value);
    }
  }

  private bindWrapper(name: string, fn: LuaFunction): void {
    const [only] = fn.body;
    if (fn.body.length === 1 && only.kind === 'call' && !this.wrappers.has(name)) {
      this.wrappers.set(name, { params: fn.params, call: only.call });
      this.templates.add(only.call);
    }
  }

  private collect(body: LuaStmt[]): void {
    for (const stmt of body) {
      switch (stmt.kind) {
        case 'local':
          stmt.names.forEach((name, i) => {
            const value = stmt.values[i];
            if (!value) {
              return;
            }
            if (value.kind === 'function') {
              this.bindWrapper(name, value);
            } else {
              this.bind(name, value);
            }
          });
          break;
        case 'function':
          if (stmt.name?.kind === 'name') {
            this.bindWrapper(stmt.name.name, stmt.fn);
          }
          this.collect(stmt.fn.body);
          break;
        case 'block':
          stmt.bodies.forEach(block => this.collect(block));
          break;
        case 'assign':
        case 'call':
        case 'return':
        case 'other':
          break;
      }
    }
  }

  /**
   * Dotted path of an expression with aliases expanded, e.g.
   * `require("lazy").setup`; null when it is not a plain path
   */
  qualify(expr: LuaExpr, depth: number = 0): string | null {
    if (depth > MAX_ALIAS_DEPTH) {
      return null;
    }

    switch (expr.kind) {
      case 'name': {
        const alias = this.aliases.get(expr.name);
        if (alias) {
          const resolved = this.qualify(alias, depth + 1);
          if (resolved) {
            return resolved;
          }
        }
        return expr.name;
      }
      case 'field': {
        const base = this.qualify(expr.base, depth);
        return base === null ? null : `${base}.${expr.key}`;
      }
      case 'call': {
        const callee = this.qualify(expr.callee, depth);
        const first = expr.args[0];
        if (callee === 'require' && first?.kind === 'string') {
          return `require(${quoteLuaString(first.value)})`;
        }
        return null;
      }
      default:
        return null;
    }
  }

  /**
   * Follow a name to the table or literal it was bound to
   */
  resolve(expr: LuaExpr, depth: number = 0): LuaExpr {
    if (expr.kind !== 'name' || depth > MAX_ALIAS_DEPTH) {
      return expr;
    }
    const alias = this.aliases.get(expr.name);
    return alias ? this.resolve(alias, depth + 1) : expr;
  }

  /**
   * True for the call inside a wrapper body; its arguments are parameters,
   * not values
   */
  isWrapperTemplate(call: LuaCall): boolean {
    return this.templates.has(call);
  }

  /**
   * Inline a call to a single-call wrapper: params in the wrapped call are
   * replaced with the caller's arguments
   */
  expandWrapper(call: LuaCall): LuaCall | null {
    if (call.callee.kind !== 'name') {
      return null;
    }
    const wrapper = this.wrappers.get(call.callee.name);
    if (!wrapper) {
      return null;
    }

    const substitute = (expr: LuaExpr): LuaExpr => {
      if (expr.kind !== 'name') {
        return expr;
      }
      const index = wrapper.params.indexOf(expr.name);
      if (index === -1) {
        return expr;
      }
      return call.args[index] ?? { kind: 'nil' };
    };

    return { kind: 'call', callee: wrapper.call.callee, args: wrapper.call.args.map(substitute) };
  }
}

// ---------------------------------------------------------------------------
// Plugin manager recognizers

export interface PluginRecognizer {
  readonly spec: PluginSpecKind;
  /**
   * Plugin names declared by this call, or null when the call is not this
   * manager's entry point
   */
  tryExtractPluginRefs(call: LuaCall, scope: AliasScope): string[] | null;
}

function isPluginName(value: string): boolean {
  return PLUGIN_NAME.test(value) && !value.startsWith('http');
}

function positionalValues(fields: LuaField[]): LuaExpr[] {
  const values: LuaExpr[] = [];
  for (const field of fields) {
    if (field.kind === 'positional') {
      values.push(field.value);
    }
  }
  return values;
}

function namedValue(fields: LuaField[], key: string): LuaExpr | null {
  for (const field of fields) {
    if (field.kind === 'named' && field.key === key) {
      return field.value;
    }
    if (field.kind === 'computed' && field.key.kind === 'string' && field.key.value === key) {
      return field.value;
    }
  }
  return null;
}

/**
 * lazy.nvim: a spec is a name, a plugin table (`{ "owner/name", dependencies = ... }`)
 * or a list of specs
 */
export const lazyRecognizer: PluginRecognizer = {
  spec: 'lazy',
  tryExtractPluginRefs(call, scope) {
    if (scope.qualify(call.callee) !== 'require("lazy").setup') {
      return null;
    }

    const names: string[] = [];
    const visit = (raw: LuaExpr, depth: number): void => {
      const spec = scope.resolve(raw);
      if (depth > 16) {
        return;
      }
      if (spec.kind === 'string') {
        if (isPluginName(spec.value)) {
          names.push(spec.value);
        }
        return;
      }
      if (spec.kind !== 'table') {
        return;
      }

      const nested = namedValue(spec.fields, 'spec');
      if (nested) {
        visit(nested, depth + 1);
      }

      const positional = positionalValues(spec.fields);
      const hasKeys = spec.fields.some(field => field.kind !== 'positional');
      if (positional.length > 1 || (positional.length > 0 && !hasKeys)) {
        positional.forEach(item => visit(item, depth + 1));
        return;
      }

      const head = positional[0] ? scope.resolve(positional[0]) : null;
      if (head?.kind === 'string' && isPluginName(head.value)) {
        names.push(head.value);
      }
      const dependencies = namedValue(spec.fields, 'dependencies');
      if (dependencies) {
        visit(dependencies, depth + 1);
      }
    };

    call.args.forEach(arg => visit(arg, 0));
    return names;
  }
};

function packerSpecNames(raw: LuaExpr, scope: AliasScope, names: string[], depth: number): void {
  const spec = scope.resolve(raw);
  if (depth > 16) {
    return;
  }
  if (spec.kind === 'string') {
    if (isPluginName(spec.value)) {
      names.push(spec.value);
    }
    return;
  }
  if (spec.kind !== 'table') {
    return;
  }

  const positional = positionalValues(spec.fields);
  const head = positional[0] ? scope.resolve(positional[0]) : null;
  if (head?.kind === 'string') {
    if (isPluginName(head.value)) {
      names.push(head.value);
    }
  } else {
    // a list of specs, as accepted by use { {...}, {...} }
    positional.forEach(item => packerSpecNames(item, scope, names, depth + 1));
  }

  const requires = namedValue(spec.fields, 'requires');
  if (requires) {
    const resolved = scope.resolve(requires);
    const singleSpec = resolved.kind === 'table' && resolved.fields.some(field => field.kind !== 'positional');
    if (resolved.kind === 'table' && !singleSpec) {
      positionalValues(resolved.fields).forEach(item => packerSpecNames(item, scope, names, depth + 1));
    } else {
      packerSpecNames(resolved, scope, names, depth + 1);
    }
  }
}

function findCalls(body: LuaStmt[], onCall: (call: LuaCall) => void): void {
  walkBlock(body, {
    onCall,
    onAssign: () => undefined
  });
}

/**
 * packer: `startup(function(use) use "owner/name" end)` or the table form
 * `startup({ function(use) ... end, config = {...} })`
 */
export const packerRecognizer: PluginRecognizer = {
  spec: 'packer',
  tryExtractPluginRefs(call, scope) {
    if (scope.qualify(call.callee) !== 'require("packer").startup') {
      return null;
    }

    const first = call.args[0] ? scope.resolve(call.args[0]) : null;
    let fn: LuaFunction | null = null;
    if (first?.kind === 'function') {
      fn = first;
    } else if (first?.kind === 'table') {
      const head = positionalValues(first.fields)[0];
      if (head?.kind === 'function') {
        fn = head;
      }
    }

    const names: string[] = [];
    const useName = fn?.params[0];
    if (!fn || !useName) {
      return names;
    }

    findCalls(fn.body, inner => {
      if (inner.callee.kind === 'name' && inner.callee.name === useName && inner.args[0]) {
        packerSpecNames(inner.args[0], scope, names, 0);
      }
    });
    return names;
  }
};

/**
 * paq: `require("paq")({ "owner/name", { "owner/other", opt = true } })`
 */
export const paqRecognizer: PluginRecognizer = {
  spec: 'paq',
  tryExtractPluginRefs(call, scope) {
    if (scope.qualify(call.callee) !== 'require("paq")') {
      return null;
    }

    const names: string[] = [];
    const list = call.args[0] ? scope.resolve(call.args[0]) : null;
    if (list?.kind !== 'table') {
      return names;
    }

    for (const item of positionalValues(list.fields)) {
      const spec = scope.resolve(item);
      const head = spec.kind === 'table' ? positionalValues(spec.fields)[0] : spec;
      if (head?.kind === 'string' && isPluginName(head.value)) {
        names.push(head.value);
      }
    }
    return names;
  }
};

export const PLUGIN_RECOGNIZERS: readonly PluginRecognizer[] = [lazyRecognizer, packerRecognizer, paqRecognizer];

// ---------------------------------------------------------------------------
// Tree walk

interface Visitor {
  onCall(call: LuaCall): void;
  onAssign(target: LuaExpr, value: LuaExpr): void;
}

function walkExpr(expr: LuaExpr, visitor: Visitor): void {
  switch (expr.kind) {
    case 'call':
      visitor.onCall(expr);
      walkExpr(expr.callee, visitor);
      expr.args.forEach(arg => walkExpr(arg, visitor));
      break;
    case 'field':
      walkExpr(expr.base, visitor);
      break;
    case 'index':
      walkExpr(expr.base, visitor);
      walkExpr(expr.index, visitor);
      break;
    case 'table':
      for (const field of expr.fields) {
        if (field.kind === 'computed') {
          walkExpr(field.key, visitor);
        }
        walkExpr(field.value, visitor);
      }
      break;
    case 'function':
      walkBlock(expr.body, visitor);
      break;
    case 'unary':
      walkExpr(expr.arg, visitor);
      break;
    case 'binary':
      walkExpr(expr.left, visitor);
      walkExpr(expr.right, visitor);
      break;
    case 'string':
    case 'number':
    case 'boolean':
    case 'nil':
    case 'vararg':
    case 'name':
    case 'opaque':
      break;
  }
}

function walkBlock(body: LuaStmt[], visitor: Visitor): void {
  for (const stmt of body) {
    switch (stmt.kind) {
      case 'local':
        stmt.values.forEach(value => walkExpr(value, visitor));
        break;
      case 'assign':
        stmt.targets.forEach((target, i) => {
          visitor.onAssign(target, stmt.values[i] ?? { kind: 'nil' });
        });
        stmt.values.forEach(value => walkExpr(value, visitor));
        break;
      case 'call':
        walkExpr(stmt.call, visitor);
        break;
      case 'function':
        walkBlock(stmt.fn.body, visitor);
        break;
      case 'return':
        stmt.values.forEach(value => walkExpr(value, visitor));
        break;
      case 'block':
        stmt.conditions.forEach(condition => walkExpr(condition, visitor));
        stmt.bodies.forEach(block => walkBlock(block, visitor));
        break;
      case 'other':
        break;
    }
  }
}

// ---------------------------------------------------------------------------
// Fact collection

const COLORSCHEME = 'colorscheme';

/**
 * Colorscheme named by an Ex command line such as `colo x` or
 * `silent! colorscheme x | set bg=dark`
 */
export function colorschemeFromCommand(command: string): string | null {
  for (const segment of command.split(/[\n|]/)) {
    const words = segment
      .trim()
      .replace(/^:+/, '')
      .replace(/^(?:sil(?:e(?:n(?:t)?)?)?!?\s+)+/, '')
      .split(/\s+/);
    const [word, name] = words;
    if (word && name && word.length >= 4 && COLORSCHEME.startsWith(word)) {
      return name;
    }
  }
  return null;
}

class FactCollector implements Visitor {
  readonly facts: StructuralFact[] = [];

  constructor(
    private readonly scope: AliasScope,
    private readonly source: string,
    private readonly recognizers: readonly PluginRecognizer[],
    private readonly themes: ColorschemeModules
  ) {}

  onAssign(target: LuaExpr, value: LuaExpr): void {
    const path = this.scope.qualify(target);
    const match = path ? OPTION_PATH.exec(path) : null;
    if (!match || !isOptionNamespace(match[1])) {
      return;
    }
    this.facts.push({ kind: 'setting', namespace: match[1], key: match[2], value: renderExpr(value), source: this.source });
  }

  onCall(call: LuaCall): void {
    if (this.scope.isWrapperTemplate(call)) {
      return;
    }
    this.handleCall(call);

    const expanded = this.scope.expandWrapper(call);
    if (expanded) {
      this.handleCall(expanded);
    }
  }

  private handleCall(call: LuaCall): void {
    const callee = this.scope.qualify(call.callee);

    if (callee === 'pcall' && call.args[0]) {
      this.handleCall({ kind: 'call', callee: call.args[0], args: call.args.slice(1) });
      return;
    }

    if (callee && this.handleSettingCall(callee, call)) {
      return;
    }

    if (callee && callee in KEYMAP_CALLEES) {
      this.handleKeymap(call, KEYMAP_CALLEES[callee].modeArg);
      return;
    }

    if (callee === 'vim.cmd.colorscheme') {
      const first = call.args[0];
      if (first?.kind === 'string') {
        this.addColorscheme(first.value);
      }
      return;
    }

    if (callee && COMMAND_CALLEES.has(callee)) {
      this.handleCommand(call);
      return;
    }

    const theme = callee ? this.themeColorscheme(callee) : undefined;
    if (theme) {
      this.addColorscheme(theme);
      return;
    }

    for (const recognizer of this.recognizers) {
      const names = recognizer.tryExtractPluginRefs(call, this.scope);
      if (names) {
        for (const name of names) {
          this.facts.push({ kind: 'plugin', name, spec: recognizer.spec, source: this.source });
        }
        return;
      }
    }
  }

  private handleSettingCall(callee: string, call: LuaCall): boolean {
    let namespace: OptionNamespace;
    if (callee === 'vim.api.nvim_set_option_value' || callee === 'vim.api.nvim_set_option') {
      namespace = 'o';
    } else if (callee === 'vim.api.nvim_set_var') {
      namespace = 'g';
    } else {
      return false;
    }

    const [name, value] = call.args;
    if (name?.kind === 'string') {
      this.facts.push({ kind: 'setting', namespace, key: name.value, value: renderExpr(value ?? { kind: 'nil' }), source: this.source });
    }
    return true;
  }

  private handleKeymap(call: LuaCall, modeArg: number): void {
    const [modeExpr, lhsExpr, rhsExpr] = call.args.slice(modeArg);
    if (!modeExpr || !lhsExpr) {
      return;
    }

    const mode = this.renderMode(modeExpr);
    if (mode === null) {
      return;
    }

    const lhs = lhsExpr.kind === 'string' ? lhsExpr.value : renderExpr(lhsExpr);
    let rhs: string | null;
    if (!rhsExpr || rhsExpr.kind === 'nil') {
      rhs = null;
    } else if (rhsExpr.kind === 'string') {
      rhs = rhsExpr.value;
    } else {
      rhs = renderExpr(rhsExpr);
    }

    this.facts.push({ kind: 'keymap', mode, lhs, rhs, source: this.source });
  }

  private renderMode(expr: LuaExpr): string | null {
    const resolved = this.scope.resolve(expr);
    if (resolved.kind === 'string') {
      return resolved.value;
    }
    if (resolved.kind !== 'table') {
      return null;
    }

    const modes: string[] = [];
    for (const field of resolved.fields) {
      if (field.kind !== 'positional' || field.value.kind !== 'string') {
        return null;
      }
      modes.push(field.value.value);
    }
    return modes.sort().join(',');
  }

  private handleCommand(call: LuaCall): void {
    const first = call.args[0];
    if (first?.kind === 'string') {
      const name = colorschemeFromCommand(first.value);
      if (name) {
        this.addColorscheme(name);
      }
      return;
    }

    if (first?.kind === 'table') {
      const cmd = namedValue(first.fields, 'cmd');
      const args = namedValue(first.fields, 'args');
      if (cmd?.kind !== 'string' || cmd.value.length < 4 || !COLORSCHEME.startsWith(cmd.value)) {
        return;
      }
      const name = args?.kind === 'table' ? positionalValues(args.fields)[0] : undefined;
      if (name?.kind === 'string') {
        this.addColorscheme(name.value);
      }
    }
  }

  // require("tokyonight").setup() and require("catppuccin").load() select a theme
  private themeColorscheme(callee: string): string | undefined {
    const match = THEME_SETUP.exec(callee);
    return match ? this.themes.get(match[1]) : undefined;
  }

  private addColorscheme(name: string): void {
    const trimmed = name.trim();
    if (trimmed) {
      this.facts.push({ kind: 'colorscheme', name: trimmed, source: this.source });
    }
  }
}

let defaultThemes: ColorschemeModules | null = null;

function loadDefaultThemes(): ColorschemeModules {
  if (!defaultThemes) {
    defaultThemes = new DataLoader().loadColorschemeModules();
  }
  return defaultThemes;
}

/**
 * Parse one config and return its facts in source order. Never throws on its
 * input; a syntax error or a failed walk yields an unparseable outcome and no
 * facts.
 */
export function extract(
  text: string,
  source: string = '<inline>',
  recognizers: readonly PluginRecognizer[] = PLUGIN_RECOGNIZERS,
  themes: ColorschemeModules = loadDefaultThemes()
): ExtractionResult {
  const parsed = parseLua(text);
  if (!parsed.ok) {
    return { facts: [], outcome: { status: 'unparseable', error: parsed.error } };
  }

  try {
    const collector = new FactCollector(new AliasScope(parsed.body), source, recognizers, themes);
    walkBlock(parsed.body, collector);
    return { facts: collector.facts, outcome: { status: 'parsed' } };
  } catch (error) {
    return { facts: [], outcome: { status: 'unparseable', error: errorMessage(error) } };
  }
}
