export type TokenType = 'word' | 'identifier' | 'string' | 'punct' | 'other';

export interface Token {
  type: TokenType;
  /** Upper-cased for words, raw text otherwise. */
  value: string;
  start: number;
  end: number;
}

const WORD_START = /[A-Za-z_]/;
const WORD_PART = /[A-Za-z0-9_$]/;
const PUNCTUATION = new Set(['(', ')', ';', ',']);

/**
 * Splits SQL text into coarse tokens. Comments (`--`, `//`, `/* *\/`) are
 * dropped; string literals, quoted identifiers and `$$` blocks come back as
 * single tokens so that keywords inside them are never mistaken for structure.
 */
export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if ((ch === '-' && next === '-') || (ch === '/' && next === '/')) {
      const newline = sql.indexOf('\n', i + 2);
      i = newline === -1 ? sql.length : newline + 1;
      continue;
    }

    if (ch === '/' && next === '*') {
      const close = sql.indexOf('*/', i + 2);
      i = close === -1 ? sql.length : close + 2;
      continue;
    }

    if (ch === '$' && next === '$') {
      const close = sql.indexOf('$$', i + 2);
      const end = close === -1 ? sql.length : close + 2;
      tokens.push({ type: 'string', value: sql.slice(i, end), start: i, end });
      i = end;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const end = scanQuoted(sql, i, ch);
      tokens.push({
        type: ch === "'" ? 'string' : 'identifier',
        value: sql.slice(i, end),
        start: i,
        end,
      });
      i = end;
      continue;
    }

    if (WORD_START.test(ch)) {
      let end = i + 1;
      while (end < sql.length && WORD_PART.test(sql[end])) {
        end++;
      }
      tokens.push({ type: 'word', value: sql.slice(i, end).toUpperCase(), start: i, end });
      i = end;
      continue;
    }

    tokens.push({
      type: PUNCTUATION.has(ch) ? 'punct' : 'other',
      value: ch,
      start: i,
      end: i + 1,
    });
    i++;
  }

  return tokens;
}

function scanQuoted(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql[i];
    if (quote === "'" && ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

/**
 * Splits text into statements at top-level semicolons. Empty statements
 * (bare `;` or comment-only text) are dropped.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let first: Token | undefined;
  let last: Token | undefined;

  const flush = () => {
    if (first && last) {
      statements.push(sql.slice(first.start, last.end));
    }
    first = undefined;
    last = undefined;
  };

  for (const token of tokenize(sql)) {
    if (token.type === 'punct' && token.value === ';') {
      flush();
      continue;
    }
    first ??= token;
    last = token;
  }
  flush();

  return statements;
}

/**
 * True when `keyword` appears as a word outside any parentheses.
 */
export function hasTopLevelKeyword(sql: string, keyword: string): boolean {
  const target = keyword.toUpperCase();
  let depth = 0;
  for (const token of tokenize(sql)) {
    if (token.type === 'punct') {
      if (token.value === '(') depth++;
      if (token.value === ')') depth = Math.max(0, depth - 1);
      continue;
    }
    if (depth === 0 && token.type === 'word' && token.value === target) {
      return true;
    }
  }
  return false;
}
