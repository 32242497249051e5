/**
 * Lua syntax tree, lowered from luaparse into a small tagged union that the
 * extractor can match exhaustively
 */

import luaparse from 'luaparse';
import type { Chunk, Expression, Statement, TableKey, TableKeyString, TableValue } from 'luaparse';

export type LuaExpr =
  | { kind: 'string'; value: string }
  | { kind: 'number'; raw: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'nil' }
  | { kind: 'vararg' }
  | { kind: 'name'; name: string }
  | { kind: 'field'; base: LuaExpr; key: string; method: boolean }
  | { kind: 'index'; base: LuaExpr; index: LuaExpr }
  | LuaCall
  | { kind: 'table'; fields: LuaField[] }
  | LuaFunction
  | { kind: 'unary'; op: string; arg: LuaExpr }
  | { kind: 'binary'; op: string; left: LuaExpr; right: LuaExpr }
  | { kind: 'opaque' };

export interface LuaCall {
  kind: 'call';
  callee: LuaExpr;
  args: LuaExpr[];
}

export interface LuaFunction {
  kind: 'function';
  params: string[];
  body: LuaStmt[];
}

export type LuaField =
  | { kind: 'positional'; value: LuaExpr }
  | { kind: 'named'; key: string; value: LuaExpr }
  | { kind: 'computed'; key: LuaExpr; value: LuaExpr };

export type LuaStmt =
  | { kind: 'local'; names: string[]; values: LuaExpr[] }
  | { kind: 'assign'; targets: LuaExpr[]; values: LuaExpr[] }
  | { kind: 'call'; call: LuaCall }
  | { kind: 'function'; name: LuaExpr | null; isLocal: boolean; fn: LuaFunction }
  | { kind: 'return'; values: LuaExpr[] }
  | { kind: 'block'; conditions: LuaExpr[]; bodies: LuaStmt[][] }
  | { kind: 'other' };

export type ParseLuaResult =
  | { ok: true; body: LuaStmt[] }
  | { ok: false; error: string };

const LUA_KEYWORDS = new Set([
  'and', 'break', 'do', 'else', 'elseif', 'end', 'false', 'for', 'function', 'goto', 'if', 'in',
  'local', 'nil', 'not', 'or', 'repeat', 'return', 'then', 'true', 'until', 'while'
]);

export function isLuaIdentifier(value: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(value) && !LUA_KEYWORDS.has(value);
}

const SIMPLE_ESCAPES: Record<string, number> = {
  a: 7, b: 8, f: 12, n: 10, r: 13, t: 9, v: 11, '\\': 92, '"': 34, "'": 39, '\n': 10, '\r': 10
};

/**
 * Decode a string literal from its source text. Escapes yield bytes, which
 * are read back as UTF-8 like the runtime would hand them to Neovim.
 */
export function decodeLuaString(raw: string): string {
  const longBracket = /^\[(=*)\[([\s\S]*)\]\1\]$/.exec(raw);
  if (longBracket) {
    return longBracket[2].replace(/^(\r\n|\n\r|\n|\r)/, '');
  }

  const body = raw.slice(1, -1);
  const bytes: number[] = [];
  const pushText = (text: string): void => {
    for (const byte of Buffer.from(text, 'utf-8')) {
      bytes.push(byte);
    }
  };

  let i = 0;
  while (i < body.length) {
    const ch = body[i];
    if (ch !== '\\') {
      const next = body.indexOf('\\', i);
      const end = next === -1 ? body.length : next;
      pushText(body.slice(i, end));
      i = end;
      continue;
    }

    const esc = body[i + 1] ?? '';
    if (esc in SIMPLE_ESCAPES) {
      bytes.push(SIMPLE_ESCAPES[esc]);
      i += esc === '\r' && body[i + 2] === '\n' ? 3 : 2;
    } else if (esc === 'x') {
      bytes.push(parseInt(body.slice(i + 2, i + 4), 16));
      i += 4;
    } else if (esc === 'z') {
      i += 2;
      while (i < body.length && /\s/.test(body[i])) {
        i++;
      }
    } else if (/[0-9]/.test(esc)) {
      const digits = /^[0-9]{1,3}/.exec(body.slice(i + 1));
      const text = digits ? digits[0] : esc;
      bytes.push(parseInt(text, 10) & 0xff);
      i += 1 + text.length;
    } else if (esc === 'u') {
      const close = body.indexOf('}', i);
      const codePoint = parseInt(body.slice(i + 3, close), 16);
      pushText(String.fromCodePoint(codePoint));
      i = close + 1;
    } else {
      pushText(esc);
      i += 2;
    }
  }

  return Buffer.from(bytes).toString('utf-8');
}

function lowerField(field: TableKey | TableKeyString | TableValue): LuaField {
  switch (field.type) {
    case 'TableValue':
      return { kind: 'positional', value: lowerExpr(field.value) };
    case 'TableKeyString':
      return { kind: 'named', key: field.key.name, value: lowerExpr(field.value) };
    case 'TableKey':
      return { kind: 'computed', key: lowerExpr(field.key), value: lowerExpr(field.value) };
  }
}

function lowerFunction(parameters: Array<{ type: string; name?: string }>, body: Statement[]): LuaFunction {
  return {
    kind: 'function',
    params: parameters.map(param => param.name ?? '...'),
    body: lowerBlock(body)
  };
}

export function lowerExpr(node: Expression): LuaExpr {
  switch (node.type) {
    case 'StringLiteral':
      return { kind: 'string', value: decodeLuaString(node.raw) };
    case 'NumericLiteral':
      return { kind: 'number', raw: node.raw };
    case 'BooleanLiteral':
      return { kind: 'boolean', value: node.value };
    case 'NilLiteral':
      return { kind: 'nil' };
    case 'VarargLiteral':
      return { kind: 'vararg' };
    case 'Identifier':
      return { kind: 'name', name: node.name };
    case 'MemberExpression':
      return { kind: 'field', base: lowerExpr(node.base), key: node.identifier.name, method: node.indexer === ':' };
    case 'IndexExpression': {
      const index = lowerExpr(node.index);
      const base = lowerExpr(node.base);
      if (index.kind === 'string') {
        return { kind: 'field', base, key: index.value, method: false };
      }
      return { kind: 'index', base, index };
    }
    case 'CallExpression':
      return { kind: 'call', callee: lowerExpr(node.base), args: node.arguments.map(lowerExpr) };
    case 'StringCallExpression':
      return { kind: 'call', callee: lowerExpr(node.base), args: [lowerExpr(node.argument)] };
    case 'TableCallExpression':
      return { kind: 'call', callee: lowerExpr(node.base), args: [lowerExpr(node.arguments)] };
    case 'TableConstructorExpression':
      return { kind: 'table', fields: node.fields.map(lowerField) };
    case 'FunctionDeclaration':
      return lowerFunction(node.parameters, node.body);
    case 'UnaryExpression':
      return { kind: 'unary', op: node.operator, arg: lowerExpr(node.argument) };
    case 'BinaryExpression':
    case 'LogicalExpression':
      return { kind: 'binary', op: node.operator, left: lowerExpr(node.left), right: lowerExpr(node.right) };
    default:
      return { kind: 'opaque' };
  }
}

function asCall(expr: LuaExpr): LuaCall | null {
  return expr.kind === 'call' ? expr : null;
}

export function lowerStmt(node: Statement): LuaStmt {
  switch (node.type) {
    case 'LocalStatement':
      return { kind: 'local', names: node.variables.map(v => v.name), values: node.init.map(lowerExpr) };
    case 'AssignmentStatement':
      return { kind: 'assign', targets: node.variables.map(lowerExpr), values: node.init.map(lowerExpr) };
    case 'CallStatement': {
      const call = asCall(lowerExpr(node.expression));
      return call ? { kind: 'call', call } : { kind: 'other' };
    }
    case 'FunctionDeclaration':
      return {
        kind: 'function',
        name: node.identifier ? lowerExpr(node.identifier) : null,
        isLocal: node.isLocal,
        fn: lowerFunction(node.parameters, node.body)
      };
    case 'ReturnStatement':
      return { kind: 'return', values: node.arguments.map(lowerExpr) };
    case 'IfStatement':
      return {
        kind: 'block',
        conditions: node.clauses.flatMap(clause => ('condition' in clause ? [lowerExpr(clause.condition)] : [])),
        bodies: node.clauses.map(clause => lowerBlock(clause.body))
      };
    case 'WhileStatement':
    case 'RepeatStatement':
      return { kind: 'block', conditions: [lowerExpr(node.condition)], bodies: [lowerBlock(node.body)] };
    case 'ForNumericStatement':
      return {
        kind: 'block',
        conditions: [node.start, node.end, ...(node.step ? [node.step] : [])].map(lowerExpr),
        bodies: [lowerBlock(node.body)]
      };
    case 'ForGenericStatement':
      return { kind: 'block', conditions: node.iterators.map(lowerExpr), bodies: [lowerBlock(node.body)] };
    case 'DoStatement':
      return { kind: 'block', conditions: [], bodies: [lowerBlock(node.body)] };
    default:
      return { kind: 'other' };
  }
}

export function lowerBlock(body: Statement[]): LuaStmt[] {
  return body.map(lowerStmt);
}

/**
 * Parse Lua source (LuaJIT dialect). Syntax errors, and trees nested too
 * deeply to lower, come back as a value.
 */
export function parseLua(text: string): ParseLuaResult {
  try {
    const chunk: Chunk = luaparse.parse(text, { comments: false, luaVersion: 'LuaJIT' });
    return { ok: true, body: lowerBlock(chunk.body) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}
