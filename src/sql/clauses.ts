/**
 * School SQL Guard - Clause Helpers
 *
 * Token-level helpers that locate the pieces of a single statement the
 * guard cares about: table references, the top-level WHERE clause, its
 * AND-conjuncts, and the row an INSERT writes.
 */

import { isIdentifier, isKeyword, isPunct, type Token } from './lexer.js';

// =============================================================================
// Types
// =============================================================================

export interface TableReference {
  /** Table name as written, schema prefix removed */
  readonly table: string;
  readonly alias?: string;
  /** Parenthesis depth of the reference; 0 for the outer statement */
  readonly depth: number;
}

export type WhereLocation =
  | {
      readonly kind: 'found';
      /** Index of the WHERE keyword token */
      readonly keywordIndex: number;
      /** Tokens of the clause, WHERE keyword excluded */
      readonly clause: readonly Token[];
      /** Character span of the clause text */
      readonly start: number;
      readonly end: number;
    }
  | {
      readonly kind: 'none';
      /** Character offset where a WHERE clause would go */
      readonly insertAt: number;
    }
  | {
      readonly kind: 'ambiguous';
      readonly reason: string;
    };

export interface Comparison {
  readonly qualifier?: string;
  readonly column: string;
  readonly value: string;
}

export interface Assignment {
  readonly qualifier?: string;
  readonly column: string;
  /** Literal value, or null when the right-hand side is an expression */
  readonly value: string | null;
}

// =============================================================================
// Keyword Sets
// =============================================================================

/** Keywords that end a WHERE clause (or mark where one must be inserted) */
export const CLAUSE_TERMINATORS = [
  'GROUP',
  'ORDER',
  'HAVING',
  'LIMIT',
  'OFFSET',
  'FETCH',
  'FOR',
  'WINDOW',
  'RETURNING',
  'UNION',
  'INTERSECT',
  'EXCEPT',
];

export const SET_OPERATORS = ['UNION', 'INTERSECT', 'EXCEPT'];

/** Words that can follow a table name but are never its alias */
const NON_ALIAS_WORDS = new Set([
  'WHERE',
  'ON',
  'USING',
  'JOIN',
  'INNER',
  'LEFT',
  'RIGHT',
  'FULL',
  'OUTER',
  'CROSS',
  'NATURAL',
  'STRAIGHT_JOIN',
  'SET',
  'VALUES',
  'VALUE',
  'SELECT',
  'DEFAULT',
  'PARTITION',
  ...CLAUSE_TERMINATORS,
]);

const TABLE_KEYWORDS = ['FROM', 'JOIN', 'INTO'];

// =============================================================================
// Table References
// =============================================================================

/**
 * Read `name` or `schema.name`; returns the last segment and the index after it
 */
export function readQualifiedName(
  tokens: readonly Token[],
  index: number
): { name: string; qualifier?: string; next: number } | null {
  const first = tokens[index];
  if (!first || !isIdentifier(first)) {
    return null;
  }

  if (isPunct(tokens[index + 1], '.')) {
    const second = tokens[index + 2];
    if (second && isIdentifier(second)) {
      return { name: second.value, qualifier: first.value, next: index + 3 };
    }
    return null;
  }

  return { name: first.value, next: index + 1 };
}

/**
 * Every table named after FROM, JOIN, INTO (any depth) or a leading UPDATE
 */
export function tableReferences(tokens: readonly Token[]): TableReference[] {
  const references: TableReference[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const isLeadingUpdate = i === 0 && isKeyword(token, 'UPDATE');
    if (!isLeadingUpdate && !isKeyword(token, ...TABLE_KEYWORDS)) {
      continue;
    }

    let index = i + 1;
    // FROM a, b, c (comma lists only follow FROM / UPDATE)
    const allowsList = isLeadingUpdate || isKeyword(token, 'FROM');

    for (;;) {
      const name = readQualifiedName(tokens, index);
      if (!name) {
        break;
      }
      index = name.next;

      let alias: string | undefined;
      const candidate = tokens[index];
      if (isKeyword(candidate, 'AS')) {
        const aliasToken = tokens[index + 1];
        if (aliasToken && isIdentifier(aliasToken)) {
          alias = aliasToken.value;
          index += 2;
        }
      } else if (
        candidate &&
        isIdentifier(candidate) &&
        !(candidate.type === 'word' && NON_ALIAS_WORDS.has(candidate.value.toUpperCase()))
      ) {
        alias = candidate.value;
        index += 1;
      }

      const depth = token?.depth ?? 0;
      references.push(alias === undefined ? { table: name.name, depth } : { table: name.name, alias, depth });

      if (allowsList && isPunct(tokens[index], ',')) {
        index += 1;
        continue;
      }
      break;
    }
  }

  return references;
}

/**
 * Map of lower-cased table names and aliases to the table name as written
 */
export function qualifierMap(references: readonly TableReference[]): Map<string, string> {
  const map = new Map<string, string>();
  for (const ref of references) {
    map.set(ref.table.toLowerCase(), ref.table);
    if (ref.alias !== undefined) {
      map.set(ref.alias.toLowerCase(), ref.table);
    }
  }
  return map;
}

/**
 * Upper-cased first keyword of a statement (SELECT, UPDATE, WITH, ...)
 */
export function leadingKeyword(tokens: readonly Token[]): string | undefined {
  const first = tokens[0];
  return first?.type === 'word' ? first.value.toUpperCase() : undefined;
}

// =============================================================================
// WHERE Clause
// =============================================================================

/**
 * Locate the top-level WHERE clause of a single statement
 */
export function findTopLevelWhere(tokens: readonly Token[]): WhereLocation {
  const whereIndexes: number[] = [];
  let terminatorIndex = -1;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token || token.depth !== 0) {
      continue;
    }
    if (isKeyword(token, ...SET_OPERATORS)) {
      return { kind: 'ambiguous', reason: 'compound statement' };
    }
    if (isKeyword(token, 'WHERE')) {
      whereIndexes.push(i);
    } else if (terminatorIndex === -1 && isKeyword(token, ...CLAUSE_TERMINATORS)) {
      terminatorIndex = i;
    }
  }

  const trailing = tokens[tokens.length - 1];
  const statementEnd = trailing?.end ?? 0;

  if (whereIndexes.length > 1) {
    return { kind: 'ambiguous', reason: 'more than one top-level WHERE' };
  }

  const keywordIndex = whereIndexes[0];
  if (keywordIndex === undefined) {
    const terminator = terminatorIndex === -1 ? undefined : tokens[terminatorIndex];
    return { kind: 'none', insertAt: terminator?.start ?? statementEnd };
  }

  if (terminatorIndex !== -1 && terminatorIndex < keywordIndex) {
    return { kind: 'ambiguous', reason: 'WHERE after a closing clause' };
  }

  const clauseEndIndex = terminatorIndex === -1 ? tokens.length : terminatorIndex;
  const clause = tokens.slice(keywordIndex + 1, clauseEndIndex);
  const first = clause[0];
  const last = clause[clause.length - 1];

  if (!first || !last) {
    return { kind: 'ambiguous', reason: 'empty WHERE clause' };
  }

  return { kind: 'found', keywordIndex, clause, start: first.start, end: last.end };
}

/**
 * Split an expression into its top-level AND operands.
 * Parenthesized AND-only groups are flattened; an OR anywhere at the
 * top level keeps the expression whole.
 */
export function conjuncts(tokens: readonly Token[]): Token[][] {
  const inner = unwrapParens(tokens);
  const parts: Token[][] = [];
  let current: Token[] = [];
  let level = 0;
  let pendingBetween = false;

  for (const token of inner) {
    if (isPunct(token, '(')) level++;
    if (isPunct(token, ')')) level--;

    if (level === 0 && isKeyword(token, 'OR')) {
      return [[...inner]];
    }
    if (level === 0 && isKeyword(token, 'BETWEEN')) {
      pendingBetween = true;
    }
    if (level === 0 && isKeyword(token, 'AND')) {
      if (pendingBetween) {
        pendingBetween = false;
      } else {
        parts.push(current);
        current = [];
        continue;
      }
    }
    current.push(token);
  }
  parts.push(current);

  const result: Token[][] = [];
  for (const part of parts) {
    if (part.length === 0) {
      continue;
    }
    if (wrappedInParens(part)) {
      result.push(...conjuncts(part));
    } else {
      result.push(part);
    }
  }
  return result;
}

function wrappedInParens(tokens: readonly Token[]): boolean {
  const first = tokens[0];
  const last = tokens[tokens.length - 1];
  if (!first || !last || !isPunct(first, '(') || !isPunct(last, ')') || tokens.length < 2) {
    return false;
  }
  // The opening paren must close at the very last token
  return tokens.every((token, i) => i === 0 || i === tokens.length - 1 || token.depth > first.depth);
}

function unwrapParens(tokens: readonly Token[]): readonly Token[] {
  let current = tokens;
  while (wrappedInParens(current)) {
    current = current.slice(1, -1);
  }
  return current;
}

/**
 * Read `[qualifier.]column = literal` (either side order)
 */
export function parseComparison(tokens: readonly Token[]): Comparison | null {
  const equals = tokens.findIndex((token) => token.type === 'operator' && token.value === '=');
  if (equals <= 0) {
    return null;
  }

  const left = tokens.slice(0, equals);
  const right = tokens.slice(equals + 1);

  return comparisonFrom(left, right) ?? comparisonFrom(right, left);
}

function comparisonFrom(columnSide: readonly Token[], valueSide: readonly Token[]): Comparison | null {
  const name = readQualifiedName(columnSide, 0);
  if (!name || name.next !== columnSide.length) {
    return null;
  }

  const literal = valueSide[0];
  if (valueSide.length !== 1 || !literal || (literal.type !== 'string' && literal.type !== 'number')) {
    return null;
  }

  return name.qualifier === undefined
    ? { column: name.name, value: literal.value }
    : { qualifier: name.qualifier, column: name.name, value: literal.value };
}

// =============================================================================
// UPDATE Assignments
// =============================================================================

/**
 * The `column = value` pairs of an UPDATE's SET list. Returns null when
 * there is no top-level SET or an item is not a plain assignment.
 */
export function setAssignments(tokens: readonly Token[]): Assignment[] | null {
  const set = tokens.findIndex((token) => token.depth === 0 && isKeyword(token, 'SET'));
  if (set === -1) {
    return null;
  }

  let end = tokens.findIndex(
    (token, i) => i > set && token.depth === 0 && isKeyword(token, 'WHERE', 'FROM', ...CLAUSE_TERMINATORS)
  );
  if (end === -1) {
    end = tokens.length;
  }

  const items = splitOnCommas(tokens.slice(set + 1, end), 0);
  if (items.length === 0) {
    return null;
  }

  const assignments: Assignment[] = [];
  for (const item of items) {
    const name = readQualifiedName(item, 0);
    const operator = name ? item[name.next] : undefined;
    if (!name || operator?.type !== 'operator' || operator.value !== '=') {
      return null;
    }

    const valueTokens = item.slice(name.next + 1);
    const literal = valueTokens[0];
    const value =
      valueTokens.length === 1 && literal && (literal.type === 'string' || literal.type === 'number')
        ? literal.value
        : null;

    assignments.push(
      name.qualifier === undefined
        ? { column: name.name, value }
        : { qualifier: name.qualifier, column: name.name, value }
    );
  }
  return assignments;
}

// =============================================================================
// INSERT Rows
// =============================================================================

/**
 * Column → literal value for a single-row `INSERT INTO t (cols) VALUES (vals)`.
 * Values that are not plain literals map to null. Returns null for any
 * other INSERT shape.
 */
export function insertedRow(tokens: readonly Token[]): Map<string, string | null> | null {
  const into = tokens.findIndex((token) => token.depth === 0 && isKeyword(token, 'INTO'));
  if (into === -1) {
    return null;
  }

  const name = readQualifiedName(tokens, into + 1);
  if (!name || !isPunct(tokens[name.next], '(')) {
    return null;
  }

  const columns = parenthesizedList(tokens, name.next);
  if (!columns || !isKeyword(tokens[columns.next], 'VALUES', 'VALUE')) {
    return null;
  }

  const values = parenthesizedList(tokens, columns.next + 1);
  if (!values || values.next !== tokens.length || values.items.length !== columns.items.length) {
    return null;
  }

  const row = new Map<string, string | null>();
  columns.items.forEach((columnTokens, i) => {
    const column = columnTokens[0];
    const valueTokens = values.items[i] ?? [];
    const value = valueTokens[0];
    if (column && columnTokens.length === 1 && isIdentifier(column)) {
      const literal =
        valueTokens.length === 1 && value && (value.type === 'string' || value.type === 'number')
          ? value.value
          : null;
      row.set(column.value.toLowerCase(), literal);
    }
  });
  return row;
}

/**
 * Read `( item, item, ... )` starting at the '(' token index
 */
export function parenthesizedList(
  tokens: readonly Token[],
  openIndex: number
): { items: Token[][]; next: number } | null {
  const open = tokens[openIndex];
  if (!open || !isPunct(open, '(')) {
    return null;
  }

  const items: Token[][] = [];
  let current: Token[] = [];

  for (let i = openIndex + 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token) {
      break;
    }
    if (token.depth === open.depth && isPunct(token, ')')) {
      items.push(current);
      return { items, next: i + 1 };
    }
    if (token.depth === open.depth + 1 && isPunct(token, ',')) {
      items.push(current);
      current = [];
      continue;
    }
    current.push(token);
  }

  return null;
}

/**
 * Split tokens on commas at the given depth
 */
export function splitOnCommas(tokens: readonly Token[], depth: number): Token[][] {
  const items: Token[][] = [];
  let current: Token[] = [];
  for (const token of tokens) {
    if (token.depth === depth && isPunct(token, ',')) {
      items.push(current);
      current = [];
      continue;
    }
    current.push(token);
  }
  items.push(current);
  return items.filter((item) => item.length > 0);
}
