/**
 * School SQL Guard - Pattern Extractor
 *
 * Deterministic fallback strategy. Reads canonical keyword positions
 * (SELECT ... FROM, UPDATE ... SET, INSERT INTO, DELETE FROM) from the
 * token stream. Anything outside those shapes is reported as OTHER.
 */

import { OPERATIONS, type Operation } from '../policy/types.js';
import {
  SET_OPERATORS,
  SqlLexError,
  findTopLevelWhere,
  isIdentifier,
  isKeyword,
  isPunct,
  leadingKeyword,
  parenthesizedList,
  qualifierMap,
  readQualifiedName,
  setAssignments,
  splitOnCommas,
  splitStatements,
  tableReferences,
  tokenize,
  type TableReference,
  type Token,
} from '../sql/index.js';
import { assertNever } from '../identity/types.js';
import { ExtractionFailure } from '../utils/types.js';

import { createIntent, unparseableIntent, type IntentExtractor, type QueryIntent, type StrategyName } from './types.js';

/** Words inside a select-list expression that are never column names */
const EXPRESSION_KEYWORDS = new Set([
  'ALL',
  'AND',
  'AS',
  'ASC',
  'BETWEEN',
  'BY',
  'CASE',
  'COLLATE',
  'DESC',
  'DISTINCT',
  'ELSE',
  'END',
  'ESCAPE',
  'EXISTS',
  'FALSE',
  'FILTER',
  'ILIKE',
  'IN',
  'INTERVAL',
  'IS',
  'LIKE',
  'NOT',
  'NULL',
  'OR',
  'ORDER',
  'OVER',
  'PARTITION',
  'THEN',
  'TOP',
  'TRUE',
  'WHEN',
  'WITHIN',
]);

/** Expression keywords that complete an operand */
const OPERAND_KEYWORDS = new Set(['END', 'NULL', 'TRUE', 'FALSE']);

export class PatternExtractor implements IntentExtractor {
  public readonly name: StrategyName = 'pattern';

  public async extract(rawSql: string): Promise<QueryIntent> {
    return this.describe(rawSql);
  }

  /**
   * Synchronous form of extract()
   */
  public describe(rawSql: string): QueryIntent {
    let tokens: Token[];
    try {
      tokens = tokenize(rawSql);
    } catch (error) {
      if (error instanceof SqlLexError) {
        throw new ExtractionFailure(this.name, error.message);
      }
      throw error;
    }

    const other = unparseableIntent(rawSql);

    if (tokens.some((token) => token.type === 'comment')) {
      return other;
    }

    const statements = splitStatements(tokens);
    const statement = statements[0];
    if (statements.length !== 1 || !statement) {
      return other;
    }

    const keyword = leadingKeyword(statement);
    const operation = OPERATIONS.find((op) => op === keyword);
    if (operation === undefined) {
      return other;
    }

    const topLevel = statement.filter((token) => token.depth === 0);
    if (topLevel.some((token) => isKeyword(token, ...SET_OPERATORS))) {
      return other;
    }
    if (operation === 'INSERT' && topLevel.some((token) => isKeyword(token, 'SELECT'))) {
      return other;
    }

    const references = tableReferences(statement);
    if (references.length === 0 || readsOuterTableAgain(references)) {
      return other;
    }

    const where = findTopLevelWhere(statement);
    if (where.kind === 'ambiguous') {
      return other;
    }

    const columns = this.columnsFor(operation, statement, qualifierMap(references));
    if (columns === null) {
      return other;
    }

    return createIntent({
      operation,
      tables: references.map((ref) => ref.table),
      columns,
      hasWhereClause: where.kind === 'found',
      rawText: rawSql,
    });
  }

  private columnsFor(
    operation: Operation,
    statement: readonly Token[],
    qualifiers: ReadonlyMap<string, string>
  ): string[] | null {
    switch (operation) {
      case 'SELECT':
        return selectColumns(statement, qualifiers);
      case 'UPDATE':
        return setColumns(statement, qualifiers);
      case 'INSERT':
        return insertColumns(statement);
      case 'DELETE':
        return [];
      default:
        return assertNever(operation);
    }
  }
}

/**
 * True when a subquery names a table the outer statement also reads.
 * A predicate added to the outer statement would not reach that copy.
 */
function readsOuterTableAgain(references: readonly TableReference[]): boolean {
  const outer = new Set(references.filter((ref) => ref.depth === 0).map((ref) => ref.table.toLowerCase()));
  return references.some((ref) => ref.depth > 0 && outer.has(ref.table.toLowerCase()));
}

// =============================================================================
// Column Lists
// =============================================================================

function selectColumns(statement: readonly Token[], qualifiers: ReadonlyMap<string, string>): string[] | null {
  const from = statement.findIndex((token) => token.depth === 0 && isKeyword(token, 'FROM'));
  if (from === -1) {
    return null;
  }

  const list = statement.slice(1, from);
  // Scalar subqueries in the select list
  if (list.some((token) => isKeyword(token, 'SELECT'))) {
    return null;
  }

  const columns: string[] = [];
  for (const item of splitOnCommas(list, 0)) {
    const references = columnReferences(item, qualifiers);
    if (references === null) {
      return null;
    }
    columns.push(...references);
  }
  return columns;
}

/**
 * Column names used by one select-list item. Function names, aliases
 * and `*` are skipped; qualifiers are resolved to table names.
 */
function columnReferences(item: readonly Token[], qualifiers: ReadonlyMap<string, string>): string[] | null {
  const columns: string[] = [];

  for (let i = 0; i < item.length; i++) {
    const token = item[i];
    if (!token || !isIdentifier(token)) {
      continue;
    }
    if (token.type === 'word' && EXPRESSION_KEYWORDS.has(token.value.toUpperCase())) {
      continue;
    }

    const previous = item[i - 1];
    const next = item[i + 1];

    if (isPunct(next, '(') || isKeyword(previous, 'AS') || endsOperand(previous)) {
      continue;
    }
    if (previous?.type === 'operator' && previous.value === '::') {
      continue;
    }

    if (isPunct(next, '.')) {
      const table = qualifiers.get(token.value.toLowerCase());
      if (table === undefined) {
        return null;
      }
      const target = item[i + 2];
      if (target && isIdentifier(target) && !isPunct(item[i + 3], '(')) {
        columns.push(`${table}.${target.value}`);
      }
      i += 2;
      continue;
    }

    columns.push(token.value);
  }

  return columns;
}

/**
 * True when `token` closes an operand, so an identifier after it is an alias
 */
function endsOperand(token: Token | undefined): boolean {
  if (!token) {
    return false;
  }
  if (token.type === 'word') {
    const word = token.value.toUpperCase();
    return OPERAND_KEYWORDS.has(word) || !EXPRESSION_KEYWORDS.has(word);
  }
  return (
    token.type === 'quoted_identifier' ||
    token.type === 'string' ||
    token.type === 'number' ||
    isPunct(token, ')')
  );
}

function setColumns(statement: readonly Token[], qualifiers: ReadonlyMap<string, string>): string[] | null {
  const assignments = setAssignments(statement);
  if (assignments === null) {
    return null;
  }

  const columns: string[] = [];
  for (const { qualifier, column } of assignments) {
    if (qualifier === undefined) {
      columns.push(column);
      continue;
    }
    const table = qualifiers.get(qualifier.toLowerCase());
    if (table === undefined) {
      return null;
    }
    columns.push(`${table}.${column}`);
  }
  return columns;
}

function insertColumns(statement: readonly Token[]): string[] | null {
  const into = statement.findIndex((token) => token.depth === 0 && isKeyword(token, 'INTO'));
  if (into === -1) {
    return null;
  }

  const name = readQualifiedName(statement, into + 1);
  if (!name) {
    return null;
  }
  // INSERT INTO t VALUES (...) writes every column
  if (!isPunct(statement[name.next], '(')) {
    return [];
  }

  const list = parenthesizedList(statement, name.next);
  if (!list) {
    return null;
  }

  const columns: string[] = [];
  for (const item of list.items) {
    const column = item[0];
    if (item.length !== 1 || !column || !isIdentifier(column)) {
      return null;
    }
    columns.push(column.value);
  }
  return columns;
}
