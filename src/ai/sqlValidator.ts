/**
 * SQL Validator — static gate for generated SQL. Never executes anything.
 *
 * Rules (all must pass):
 * 1. Exactly one statement (trailing semicolons are stripped first)
 * 2. Leading keyword is SELECT
 * 3. No mutating/DDL keyword anywhere (token-boundary, case-insensitive)
 * 4. No SQL comments, SELECT INTO, or dangerous server functions
 * 5. Only ASCII characters
 * 6. Every referenced table and column exists in the supplied schema
 */

import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { SchemaDescription, SqlValidationResult } from './types.js';
import type { QueryRejectionReason } from '../utils/errors.js';

const FORBIDDEN_KEYWORDS = [
  'DROP',
  'DELETE',
  'UPDATE',
  'INSERT',
  'ALTER',
  'CREATE',
  'TRUNCATE',
  'EXEC',
  'EXECUTE',
  'GRANT',
  'REVOKE',
] as const;

const FORBIDDEN_KEYWORD_PATTERNS = FORBIDDEN_KEYWORDS.map(
  (kw) => ({ keyword: kw, pattern: new RegExp(`\\b${kw}\\b`, 'i') }),
);

const DANGEROUS_FUNCTIONS = [
  'pg_read_file',
  'pg_read_binary_file',
  'pg_write_file',
  'pg_ls_dir',
  'pg_stat_file',
  'pg_sleep',
  'pg_terminate_backend',
  'pg_cancel_backend',
  'pg_reload_conf',
  'set_config',
  'dblink',
  'dblink_exec',
  'lo_import',
  'lo_export',
  'query_to_xml',
  'query_to_json',
] as const;

const DANGEROUS_FUNCTION_PATTERNS = DANGEROUS_FUNCTIONS.map(
  (fn) => ({ name: fn, pattern: new RegExp(`\\b${fn}\\b`, 'i') }),
);

/** Built-in values written without parentheses. Never resolved against the schema. */
const BUILTIN_VALUES = new Set([
  'current_date',
  'current_time',
  'current_timestamp',
  'localtime',
  'localtimestamp',
  'current_user',
  'session_user',
  'current_schema',
]);

/** Functions whose argument list may contain FROM without naming a table. */
const FROM_ARGUMENT_FUNCTIONS = new Set(['extract', 'substring', 'trim', 'overlay', 'position']);

const __dirname = dirname(fileURLToPath(import.meta.url));

function loadKeywords(): Set<string> {
  const raw = readFileSync(resolve(__dirname, '..', '..', 'data', 'sql-keywords.txt'), 'utf8');
  return new Set(
    raw
      .split('\n')
      .map((line) => line.trim().toLowerCase())
      .filter((line) => line && !line.startsWith('#')),
  );
}

const KEYWORDS = loadKeywords();

// ── Lexer ───────────────────────────────────────────────────────────

type Token =
  | { kind: 'ident'; value: string; quoted: boolean }
  | { kind: 'string' }
  | { kind: 'number' }
  | { kind: 'param' }
  | { kind: 'punct'; value: string };

export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];

    if (/\s/.test(ch)) {
      i++;
    } else if (ch === "'") {
      i++;
      while (i < sql.length) {
        if (sql[i] === "'" && sql[i + 1] === "'") {
          i += 2;
        } else if (sql[i] === "'") {
          break;
        } else {
          i++;
        }
      }
      i++;
      tokens.push({ kind: 'string' });
    } else if (ch === '"') {
      const end = sql.indexOf('"', i + 1);
      const stop = end === -1 ? sql.length : end;
      tokens.push({ kind: 'ident', value: sql.slice(i + 1, stop).toLowerCase(), quoted: true });
      i = stop + 1;
    } else if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][A-Za-z0-9_$]*/.exec(sql.slice(i));
      const word = match ? match[0] : ch;
      tokens.push({ kind: 'ident', value: word.toLowerCase(), quoted: false });
      i += word.length;
    } else if (/[0-9]/.test(ch)) {
      const match = /^[0-9]+(\.[0-9]+)?([eE][+-]?[0-9]+)?/.exec(sql.slice(i));
      i += match ? match[0].length : 1;
      tokens.push({ kind: 'number' });
    } else if (ch === '$' && /[0-9]/.test(sql[i + 1] ?? '')) {
      const match = /^\$[0-9]+/.exec(sql.slice(i));
      i += match ? match[0].length : 1;
      tokens.push({ kind: 'param' });
    } else if (ch === ':' && sql[i + 1] === ':') {
      tokens.push({ kind: 'punct', value: '::' });
      i += 2;
    } else {
      tokens.push({ kind: 'punct', value: ch });
      i++;
    }
  }

  return tokens;
}

// ── Identifier resolution ───────────────────────────────────────────

function isPunct(token: Token | undefined, value: string): boolean {
  return token?.kind === 'punct' && token.value === value;
}

function isWord(token: Token | undefined, value: string): boolean {
  return token?.kind === 'ident' && !token.quoted && token.value === value;
}

function isKeyword(token: Token | undefined): boolean {
  return token?.kind === 'ident' && !token.quoted && KEYWORDS.has(token.value);
}

function isBuiltinValue(token: Token | undefined): boolean {
  return token?.kind === 'ident' && !token.quoted && BUILTIN_VALUES.has(token.value);
}

/** True when the token at `index` can close a select-list expression. */
function endsExpression(tokens: Token[], index: number): boolean {
  const token = tokens[index];
  if (!token) return false;
  if (token.kind === 'string' || token.kind === 'number' || token.kind === 'param') return true;
  if (token.kind === 'punct') return token.value === ')';
  if (isWord(token, 'end') || isBuiltinValue(token)) return true;
  // A type name after a cast
  if (isPunct(tokens[index - 1], '::')) return true;
  return !isKeyword(token);
}

interface QueryScope {
  tables: Map<string, string>; // alias or name → table name
  derivedAliases: Set<string>;
  outputAliases: Set<string>;
  consumed: Set<number>;
  unknownTables: string[];
}

function collectScope(tokens: Token[], tableNames: Set<string>): QueryScope {
  const scope: QueryScope = {
    tables: new Map(),
    derivedAliases: new Set(),
    outputAliases: new Set(),
    consumed: new Set(),
    unknownTables: [],
  };

  // Each open paren records whether FROM inside it introduces tables
  const parenStack: boolean[] = [];
  const fromIntroducesTables = () => parenStack.length === 0 || parenStack[parenStack.length - 1];

  const readAlias = (index: number): { alias: string | null; next: number } => {
    const token = tokens[index];
    if (isWord(token, 'as')) {
      const aliasToken = tokens[index + 1];
      if (aliasToken?.kind === 'ident') {
        scope.consumed.add(index + 1);
        return { alias: aliasToken.value, next: index + 2 };
      }
      return { alias: null, next: index + 1 };
    }
    if (token?.kind === 'ident' && !isKeyword(token)) {
      scope.consumed.add(index);
      return { alias: token.value, next: index + 1 };
    }
    return { alias: null, next: index };
  };

  const readTableList = (start: number): void => {
    let index = start;
    for (;;) {
      const token = tokens[index];

      // Derived table: alias is resolved after its closing paren is reached
      if (isPunct(token, '(')) return;
      if (token?.kind !== 'ident') return;

      let name = token.value;
      scope.consumed.add(index);
      index++;

      if (isPunct(tokens[index], '.') && tokens[index + 1]?.kind === 'ident') {
        const qualified = tokens[index + 1];
        if (qualified.kind === 'ident') name = qualified.value;
        scope.consumed.add(index + 1);
        index += 2;
      }

      if (tableNames.has(name)) {
        scope.tables.set(name, name);
      } else {
        scope.unknownTables.push(name);
      }

      const { alias, next } = readAlias(index);
      if (alias) scope.tables.set(alias, name);
      index = next;

      if (!isPunct(tokens[index], ',')) return;
      index++;
    }
  };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (isPunct(token, '(')) {
      const previous = tokens[i - 1];
      const introducesQuery = isWord(tokens[i + 1], 'select');
      const isFromArgument =
        previous?.kind === 'ident' && FROM_ARGUMENT_FUNCTIONS.has(previous.value);
      parenStack.push(introducesQuery && !isFromArgument);
      continue;
    }

    if (isPunct(token, ')')) {
      const closedQuery = parenStack.pop() ?? false;
      if (closedQuery && isWord(tokens[i + 1], 'as') && tokens[i + 2]?.kind === 'ident') {
        const aliasToken = tokens[i + 2];
        if (aliasToken.kind === 'ident') scope.derivedAliases.add(aliasToken.value);
        scope.consumed.add(i + 2);
      } else if (closedQuery && tokens[i + 1]?.kind === 'ident' && !isKeyword(tokens[i + 1])) {
        const aliasToken = tokens[i + 1];
        if (aliasToken.kind === 'ident') scope.derivedAliases.add(aliasToken.value);
        scope.consumed.add(i + 1);
      }
      continue;
    }

    if ((isWord(token, 'from') || isWord(token, 'join')) && fromIntroducesTables()) {
      readTableList(i + 1);
      continue;
    }

    // Output alias written without AS: `SUM(amount) total,` or `region r FROM`
    if (
      token?.kind === 'ident' &&
      !scope.consumed.has(i) &&
      !isKeyword(token) &&
      !isBuiltinValue(token) &&
      endsExpression(tokens, i - 1) &&
      (isPunct(tokens[i + 1], ',') || isWord(tokens[i + 1], 'from') || i + 1 === tokens.length)
    ) {
      scope.outputAliases.add(token.value);
      scope.consumed.add(i);
      continue;
    }

    if (isWord(token, 'as') && tokens[i + 1]?.kind === 'ident' && !scope.consumed.has(i + 1)) {
      const aliasToken = tokens[i + 1];
      if (aliasToken.kind === 'ident') scope.outputAliases.add(aliasToken.value);
      scope.consumed.add(i + 1);
    }
  }

  return scope;
}

function findUnknownIdentifiers(sql: string, schema: SchemaDescription): string[] {
  const tokens = tokenize(sql);

  const columnsByTable = new Map<string, Set<string>>();
  for (const table of schema.tables) {
    columnsByTable.set(
      table.name.toLowerCase(),
      new Set(table.columns.map((column) => column.name.toLowerCase())),
    );
  }

  const scope = collectScope(tokens, new Set(columnsByTable.keys()));
  const unknown = scope.unknownTables.map((name) => `table "${name}"`);

  const referencedColumns = new Set<string>();
  for (const tableName of new Set(scope.tables.values())) {
    for (const column of columnsByTable.get(tableName) ?? []) referencedColumns.add(column);
  }

  const isKnownColumn = (name: string) =>
    referencedColumns.has(name) || scope.outputAliases.has(name);

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind !== 'ident' || scope.consumed.has(i)) continue;

    // Type names after a cast operator, and function names
    if (isPunct(tokens[i - 1], '::') || isPunct(tokens[i + 1], '(')) continue;

    if (isPunct(tokens[i + 1], '.')) {
      const member = tokens[i + 2];
      const qualifier = token.value;
      i += 2;

      if (isPunct(member, '*') || member?.kind !== 'ident') continue;

      const tableName = scope.tables.get(qualifier);
      if (tableName) {
        if (!columnsByTable.get(tableName)?.has(member.value)) {
          unknown.push(`column "${qualifier}.${member.value}"`);
        }
      } else if (scope.derivedAliases.has(qualifier)) {
        if (!isKnownColumn(member.value)) {
          unknown.push(`column "${qualifier}.${member.value}"`);
        }
      } else {
        unknown.push(`table or alias "${qualifier}"`);
      }
      continue;
    }

    if (isKeyword(token) || isBuiltinValue(token)) continue;

    if (!isKnownColumn(token.value)) {
      unknown.push(`column "${token.value}"`);
    }
  }

  return [...new Set(unknown)];
}

// ── Public API ──────────────────────────────────────────────────────

export function validateSql(sql: string, schema: SchemaDescription): SqlValidationResult {
  const failures: Array<{ reason: QueryRejectionReason; message: string }> = [];
  const fail = (reason: QueryRejectionReason, message: string) => failures.push({ reason, message });

  if (!sql || !sql.trim()) {
    return { valid: false, reason: 'EmptyQuery', errors: ['SQL query is empty'] };
  }

  // Strip trailing semicolons (common in model output)
  const normalised = sql.trim().replace(/[;\s]+$/, '');

  // eslint-disable-next-line no-control-regex
  if (/[^\x20-\x7E\t\n\r]/.test(normalised)) {
    fail('UnsafeConstruct', 'SQL must contain only ASCII characters');
  }

  if (normalised.includes(';')) {
    fail('MultipleStatements', 'Multi-statement SQL is not allowed');
  }

  if (!/^select\b/i.test(normalised)) {
    fail('NotSelect', 'Only SELECT queries are allowed');
  }

  for (const { keyword, pattern } of FORBIDDEN_KEYWORD_PATTERNS) {
    if (pattern.test(normalised)) {
      fail('ForbiddenKeyword', `Forbidden keyword detected: ${keyword}`);
    }
  }

  if (normalised.includes('--') || normalised.includes('/*')) {
    fail('UnsafeConstruct', 'SQL comments are not allowed');
  }

  if (/\bSELECT\b[\s\S]+\bINTO\b/i.test(normalised)) {
    fail('UnsafeConstruct', 'SELECT INTO is not allowed');
  }

  for (const { name, pattern } of DANGEROUS_FUNCTION_PATTERNS) {
    if (pattern.test(normalised)) {
      fail('UnsafeConstruct', `Dangerous function detected: ${name}`);
    }
  }

  // Identifier resolution only makes sense for an otherwise acceptable statement
  if (failures.length === 0) {
    for (const identifier of findUnknownIdentifiers(normalised, schema)) {
      fail('UnknownIdentifier', `Unknown identifier: ${identifier}`);
    }
  }

  if (failures.length > 0) {
    return {
      valid: false,
      reason: failures[0].reason,
      errors: failures.map((failure) => failure.message),
    };
  }

  return { valid: true, sql: normalised };
}
