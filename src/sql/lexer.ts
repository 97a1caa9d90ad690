/**
 * School SQL Guard - SQL Lexer
 *
 * Splits SQL text into tokens while keeping string literals, quoted
 * identifiers and comments intact, so keyword positions are never read
 * from inside a literal. Every token records its character span and the
 * parenthesis depth it sits at.
 */

import { GuardError } from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export type TokenType =
  | 'word'
  | 'quoted_identifier'
  | 'string'
  | 'number'
  | 'punct'
  | 'operator'
  | 'comment';

export interface Token {
  readonly type: TokenType;
  /** Unquoted content for literals and quoted identifiers, raw text otherwise */
  readonly value: string;
  readonly start: number;
  readonly end: number;
  /** Parenthesis nesting level; '(' and ')' carry the level outside them */
  readonly depth: number;
}

export class SqlLexError extends GuardError {
  public readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`, 'SQL_LEX_ERROR', true);
    this.name = 'SqlLexError';
    this.position = position;
  }
}

// =============================================================================
// Lexer
// =============================================================================

const WORD_START = /[\p{L}_]/u;
const WORD_PART = /[\p{L}\p{N}_$]/u;
const DIGIT = /[0-9]/;
const NUMBER = /[0-9]+(?:\.[0-9]+)?/y;
const MULTI_CHAR_OPERATORS = ['<=', '>=', '<>', '!=', '||', '::'];
const SINGLE_CHAR_OPERATORS = '=<>!+-*/%|&^~?:@$';
const PUNCTUATION = ',;.';

export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let depth = 0;
  let i = 0;

  const push = (type: TokenType, value: string, start: number, end: number): void => {
    tokens.push({ type, value, start, end, depth });
  };

  while (i < sql.length) {
    const char = sql.charAt(i);
    const next = sql.charAt(i + 1);

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    // Line comments: -- and #
    if ((char === '-' && next === '-') || char === '#') {
      const newline = sql.indexOf('\n', i);
      const end = newline === -1 ? sql.length : newline;
      push('comment', sql.slice(i, end), i, end);
      i = end;
      continue;
    }

    if (char === '/' && next === '*') {
      const close = sql.indexOf('*/', i + 2);
      if (close === -1) {
        throw new SqlLexError('Unterminated block comment', i);
      }
      push('comment', sql.slice(i, close + 2), i, close + 2);
      i = close + 2;
      continue;
    }

    if (char === "'") {
      const { value, end } = readQuoted(sql, i, "'");
      // Backslash escapes differ between dialects, so the literal's end is not certain
      if (value.includes('\\')) {
        throw new SqlLexError('Ambiguous backslash escape in string literal', i);
      }
      push('string', value, i, end);
      i = end;
      continue;
    }

    if (char === '"' || char === '`') {
      const { value, end } = readQuoted(sql, i, char);
      push('quoted_identifier', value, i, end);
      i = end;
      continue;
    }

    if (WORD_START.test(char)) {
      let end = i + 1;
      while (end < sql.length && WORD_PART.test(sql.charAt(end))) {
        end++;
      }
      push('word', sql.slice(i, end), i, end);
      i = end;
      continue;
    }

    if (DIGIT.test(char)) {
      NUMBER.lastIndex = i;
      const match = NUMBER.exec(sql);
      const end = match ? i + match[0].length : i + 1;
      push('number', sql.slice(i, end), i, end);
      i = end;
      continue;
    }

    if (char === '(') {
      push('punct', char, i, i + 1);
      depth++;
      i++;
      continue;
    }

    if (char === ')') {
      depth--;
      if (depth < 0) {
        throw new SqlLexError('Unbalanced closing parenthesis', i);
      }
      push('punct', char, i, i + 1);
      i++;
      continue;
    }

    if (PUNCTUATION.includes(char)) {
      push('punct', char, i, i + 1);
      i++;
      continue;
    }

    const pair = char + next;
    if (MULTI_CHAR_OPERATORS.includes(pair)) {
      push('operator', pair, i, i + 2);
      i += 2;
      continue;
    }

    if (SINGLE_CHAR_OPERATORS.includes(char)) {
      push('operator', char, i, i + 1);
      i++;
      continue;
    }

    throw new SqlLexError(`Unexpected character '${char}'`, i);
  }

  if (depth !== 0) {
    throw new SqlLexError('Unbalanced opening parenthesis', sql.length);
  }

  return tokens;
}

/**
 * Read a quoted run starting at `start`; a doubled quote is an escaped quote
 */
function readQuoted(sql: string, start: number, quote: string): { value: string; end: number } {
  let value = '';
  let j = start + 1;

  while (j < sql.length) {
    const c = sql.charAt(j);
    if (c === quote) {
      if (sql.charAt(j + 1) === quote) {
        value += quote;
        j += 2;
        continue;
      }
      return { value, end: j + 1 };
    }
    value += c;
    j++;
  }

  throw new SqlLexError(`Unterminated quoted text (${quote})`, start);
}

// =============================================================================
// Token Helpers
// =============================================================================

export function isKeyword(token: Token | undefined, ...keywords: string[]): boolean {
  return token?.type === 'word' && keywords.includes(token.value.toUpperCase());
}

export function isPunct(token: Token | undefined, value: string): boolean {
  return token?.type === 'punct' && token.value === value;
}

export function isIdentifier(token: Token | undefined): boolean {
  return token?.type === 'word' || token?.type === 'quoted_identifier';
}

/**
 * Split a token list into statements on top-level semicolons, dropping empty ones
 */
export function splitStatements(tokens: readonly Token[]): Token[][] {
  const statements: Token[][] = [];
  let current: Token[] = [];

  for (const token of tokens) {
    if (token.depth === 0 && isPunct(token, ';')) {
      if (current.length > 0) {
        statements.push(current);
      }
      current = [];
      continue;
    }
    current.push(token);
  }

  if (current.length > 0) {
    statements.push(current);
  }

  return statements;
}
