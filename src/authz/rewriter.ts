/**
 * School SQL Guard - Statement Rewriter
 *
 * Splices a scoping predicate into the top-level WHERE clause of a single
 * statement. Refuses (RewriteError) whenever the clause boundary cannot
 * be located from the token stream.
 */

import {
  conjuncts,
  findTopLevelWhere,
  isKeyword,
  parseComparison,
  splitStatements,
  tokenize,
  type Token,
} from '../sql/index.js';
import { assertNever } from '../identity/types.js';
import { RewriteError, errorMessage } from '../utils/types.js';

/**
 * Inject `predicate` into `rawSql`:
 * - no WHERE: ` WHERE predicate` before GROUP/ORDER/LIMIT/... or the trailing ';'
 * - WHERE c: `(c) AND predicate`
 *
 * Returns `rawSql` unchanged when every conjunct of the predicate is
 * already a top-level conjunct of its WHERE clause.
 */
export function rewrite(rawSql: string, predicate: string): string {
  if (predicate.trim() === '') {
    throw new RewriteError('Scoping predicate is empty');
  }

  const statement = singleStatement(rawSql);
  if (isKeyword(statement[0], 'INSERT')) {
    throw new RewriteError('INSERT statements cannot be scoped with a WHERE clause');
  }

  const predicateParts = conjuncts(lex(predicate, 'predicate'));
  if (predicateParts.length === 0) {
    throw new RewriteError('Scoping predicate is empty');
  }

  const location = findTopLevelWhere(statement);
  switch (location.kind) {
    case 'ambiguous':
      throw new RewriteError(`WHERE clause boundary is ambiguous: ${location.reason}`);

    case 'none': {
      const head = rawSql.slice(0, location.insertAt).trimEnd();
      const tail = rawSql.slice(location.insertAt).trimStart();
      const scoped = `${head} WHERE ${predicate}`;
      if (tail === '') {
        return scoped;
      }
      return tail.startsWith(';') ? `${scoped}${tail}` : `${scoped} ${tail}`;
    }

    case 'found': {
      const existing = new Set(conjuncts(location.clause).map(canonical));
      if (predicateParts.every((part) => existing.has(canonical(part)))) {
        return rawSql;
      }
      const clause = rawSql.slice(location.start, location.end);
      return `${rawSql.slice(0, location.start)}(${clause}) AND ${predicate}${rawSql.slice(location.end)}`;
    }

    default:
      return assertNever(location);
  }
}

function lex(sql: string, what: string): Token[] {
  let tokens: Token[];
  try {
    tokens = tokenize(sql);
  } catch (error) {
    throw new RewriteError(`Cannot tokenize ${what}: ${errorMessage(error)}`);
  }
  if (tokens.some((token) => token.type === 'comment')) {
    throw new RewriteError(`Comments in the ${what} are not supported`);
  }
  return tokens;
}

function singleStatement(rawSql: string): Token[] {
  const statements = splitStatements(lex(rawSql, 'statement'));
  const statement = statements[0];
  if (statements.length !== 1 || !statement) {
    throw new RewriteError(`Expected exactly one statement, found ${statements.length}`);
  }
  return statement;
}

/**
 * Whitespace- and keyword-case-insensitive form of a conjunct.
 * `col = 'v'`, `col='v'` and `'v' = col` share one form.
 */
function canonical(tokens: readonly Token[]): string {
  const comparison = parseComparison(tokens);
  if (comparison !== null) {
    const qualifier = comparison.qualifier?.toLowerCase() ?? '';
    return `cmp:${qualifier}:${comparison.column.toLowerCase()}:${comparison.value}`;
  }
  return tokens
    .map((token) => `${token.type}:${token.type === 'word' ? token.value.toUpperCase() : token.value}`)
    .join(' ');
}
