/**
 * School SQL Guard - Authorization Evaluator
 *
 * Decides Allow / AllowWithRewrite / Deny for an intent. Checks run in a
 * fixed order (protected table, shape, rule, operation, columns, scoping)
 * and, within a check, in table order; the first Deny wins.
 */

import { identityValue, type Identity } from '../identity/types.js';
import { PatternExtractor } from '../extractor/pattern.js';
import type { QueryIntent } from '../extractor/types.js';
import {
  isProtectedTable,
  renderCondition,
  WRITE_OPERATIONS,
  type Operation,
  type PermissionRule,
  type PolicyStore,
} from '../policy/index.js';
import {
  conjuncts,
  findTopLevelWhere,
  insertedRow,
  isIdentifier,
  leadingKeyword,
  parseComparison,
  qualifierMap,
  setAssignments,
  splitStatements,
  tableReferences,
  tokenize,
  type Comparison,
  type TableReference,
  type Token,
} from '../sql/index.js';
import logger from '../utils/logger.js';
import { errorMessage } from '../utils/types.js';

import { allow, allowWithRewrite, deny, DENY_REASONS, type Decision, type DenyReason } from './types.js';

interface RuleEntry {
  readonly table: string;
  readonly rule: PermissionRule;
}

export class AuthorizationEvaluator {
  private readonly store: PolicyStore;
  private readonly lexical = new PatternExtractor();

  constructor(store: PolicyStore) {
    this.store = store;
  }

  public evaluate(identity: Identity, intent: QueryIntent): Decision {
    const refuse = (reason: DenyReason, detail: Record<string, unknown> = {}): Decision => {
      logger.debug('Policy denied statement', { role: identity.role, reason, ...detail });
      return deny(reason);
    };

    // 1. Protected table, from the intent and from the raw text itself
    const protectedTable = intent.tables.find(isProtectedTable);
    if (protectedTable !== undefined) {
      return refuse(DENY_REASONS.protectedTable, { table: protectedTable });
    }

    let tokens: Token[];
    try {
      tokens = tokenize(intent.rawText);
    } catch (error) {
      return refuse(DENY_REASONS.queryShape, { error: errorMessage(error) });
    }
    const mentioned = tokens.find((token) => isIdentifier(token) && isProtectedTable(token.value));
    if (mentioned !== undefined) {
      return refuse(DENY_REASONS.protectedTable, { table: mentioned.value });
    }

    // 2. Shape
    const operation = intent.operation;
    const statements = splitStatements(tokens);
    const statement = statements[0];
    if (operation === 'OTHER' || intent.tables.length === 0 || statements.length !== 1 || !statement) {
      return refuse(DENY_REASONS.queryShape, { operation, tables: intent.tables });
    }
    if (leadingKeyword(statement) !== operation) {
      return refuse(DENY_REASONS.queryShape, { operation, leading: leadingKeyword(statement) });
    }

    const references = tableReferences(statement);
    const tables = mergeTables(intent.tables, references);

    const entries: RuleEntry[] = [];
    const missing: string[] = [];
    for (const table of tables) {
      const rule = this.store.lookup(identity.role, table);
      if (rule === undefined) {
        missing.push(table);
      } else {
        entries.push({ table: rule.table, rule });
      }
    }

    if (missing.length > 1) {
      return refuse(DENY_REASONS.queryShape, { missing });
    }

    // 3. Rule per table
    if (missing.length === 1) {
      return refuse(DENY_REASONS.noRule, { table: missing[0] });
    }

    // 4. Operation
    for (const { table, rule } of entries) {
      if (!rule.allowedOperations.has(operation)) {
        return refuse(DENY_REASONS.operation, { table, operation });
      }
    }

    // 5. Columns, as reported and as read from the text
    const qualifiers = qualifierMap(references);
    for (const column of this.columnsOf(intent)) {
      if (!columnPermitted(column, entries, qualifiers)) {
        return refuse(DENY_REASONS.column, { column });
      }
    }

    // 6. Row scoping
    const scoped = entries.filter((entry) => entry.rule.requiredConditions.length > 0);
    if (scoped.length === 0) {
      return allow();
    }

    const nested = references.find(
      (ref) => ref.depth > 0 && scoped.some((entry) => entry.table.toLowerCase() === ref.table.toLowerCase())
    );
    if (nested !== undefined) {
      return refuse(DENY_REASONS.queryShape, { table: nested.table, scoping: 'table is read inside a subquery' });
    }

    if (operation === 'UPDATE') {
      const reassigned = this.reassignedScope(identity, statement, scoped, qualifiers);
      if (reassigned !== null) {
        return refuse(DENY_REASONS.unscopedWrite, reassigned);
      }
    }

    return operation === 'INSERT'
      ? this.scopeInsert(identity, statement, scoped, refuse)
      : this.scopeWhere(identity, operation, statement, references, scoped, refuse);
  }

  /**
   * Reported columns plus the ones the pattern reader finds in the text
   */
  private columnsOf(intent: QueryIntent): string[] {
    const columns = [...intent.columns];
    const read = this.lexical.describe(intent.rawText);
    if (read.operation === 'OTHER') {
      return columns;
    }

    const seen = new Set(columns.map((column) => column.toLowerCase()));
    for (const column of read.columns) {
      if (!seen.has(column.toLowerCase())) {
        seen.add(column.toLowerCase());
        columns.push(column);
      }
    }
    return columns;
  }

  /**
   * An UPDATE may only set a scoped column to the requester's own value.
   * Returns the offending table and column, or null.
   */
  private reassignedScope(
    identity: Identity,
    statement: readonly Token[],
    scoped: readonly RuleEntry[],
    qualifiers: ReadonlyMap<string, string>
  ): Record<string, unknown> | null {
    const assignments = setAssignments(statement);
    if (assignments === null) {
      return { assignments: 'unreadable SET list' };
    }

    for (const { table, rule } of scoped) {
      for (const condition of rule.requiredConditions) {
        const value = identityValue(identity, condition.placeholder);
        const offending = assignments.find(
          (assignment) =>
            assignment.column.toLowerCase() === condition.column.toLowerCase() &&
            (assignment.qualifier === undefined ||
              (qualifiers.get(assignment.qualifier.toLowerCase()) ?? assignment.qualifier).toLowerCase() ===
                table.toLowerCase()) &&
            (value === undefined || assignment.value !== value)
        );
        if (offending !== undefined) {
          return { table, column: condition.column };
        }
      }
    }
    return null;
  }

  /**
   * INSERT cannot take a WHERE clause: the row itself must carry the
   * requester's identity in every scoped column
   */
  private scopeInsert(
    identity: Identity,
    statement: readonly Token[],
    scoped: readonly RuleEntry[],
    refuse: (reason: DenyReason, detail?: Record<string, unknown>) => Decision
  ): Decision {
    const row = insertedRow(statement);

    for (const { table, rule } of scoped) {
      for (const condition of rule.requiredConditions) {
        const value = identityValue(identity, condition.placeholder);
        if (value === undefined || row?.get(condition.column.toLowerCase()) !== value) {
          return refuse(DENY_REASONS.unscopedWrite, { table, column: condition.column });
        }
      }
    }

    return allow();
  }

  private scopeWhere(
    identity: Identity,
    operation: Operation,
    statement: readonly Token[],
    references: readonly TableReference[],
    scoped: readonly RuleEntry[],
    refuse: (reason: DenyReason, detail?: Record<string, unknown>) => Decision
  ): Decision {
    const where = findTopLevelWhere(statement);
    if (where.kind === 'ambiguous') {
      return refuse(DENY_REASONS.rewriteFailed, { where: where.reason });
    }

    const existing =
      where.kind === 'found'
        ? conjuncts(where.clause)
            .map(parseComparison)
            .filter((comparison): comparison is Comparison => comparison !== null)
        : [];

    const outer = references.filter((ref) => ref.depth === 0);
    const qualify = outer.length > 1;
    const predicates: string[] = [];

    for (const { table, rule } of scoped) {
      const occurrences = outer.filter((ref) => ref.table.toLowerCase() === table.toLowerCase());
      if (occurrences.length === 0) {
        return refuse(DENY_REASONS.queryShape, { table, scoping: 'table is not in the outer statement' });
      }

      for (const occurrence of occurrences) {
        for (const condition of rule.requiredConditions) {
          const value = identityValue(identity, condition.placeholder);
          if (value === undefined) {
            const reason = WRITE_OPERATIONS.has(operation) ? DENY_REASONS.unscopedWrite : DENY_REASONS.queryShape;
            return refuse(reason, { table, placeholder: condition.placeholder });
          }

          const satisfied = existing.some(
            (comparison) =>
              comparison.column.toLowerCase() === condition.column.toLowerCase() &&
              comparison.value === value &&
              qualifierMatches(comparison.qualifier, occurrence, qualify)
          );
          if (satisfied) {
            continue;
          }

          const predicate = renderCondition(
            condition,
            identity,
            qualify ? (occurrence.alias ?? occurrence.table) : undefined
          );
          if (predicate !== null && !predicates.includes(predicate)) {
            predicates.push(predicate);
          }
        }
      }
    }

    return predicates.length === 0 ? allow() : allowWithRewrite(predicates.join(' AND '));
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Intent tables first, then any table the raw text names that the intent left out
 */
function mergeTables(intentTables: readonly string[], references: readonly TableReference[]): string[] {
  const tables = [...intentTables];
  const seen = new Set(intentTables.map((table) => table.toLowerCase()));
  for (const ref of references) {
    const key = ref.table.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      tables.push(ref.table);
    }
  }
  return tables;
}

function allowsColumn(rule: PermissionRule, column: string): boolean {
  if (rule.allowedColumns === 'all') {
    return true;
  }
  const target = column.toLowerCase();
  return rule.allowedColumns.some((allowed) => allowed.toLowerCase() === target);
}

/**
 * A qualified column is checked against its own table's rule; an
 * unqualified one must be allowed by every table in the statement
 */
function columnPermitted(
  column: string,
  entries: readonly RuleEntry[],
  qualifiers: ReadonlyMap<string, string>
): boolean {
  const dot = column.lastIndexOf('.');
  if (dot === -1) {
    return entries.every((entry) => allowsColumn(entry.rule, column));
  }

  const qualifier = column.slice(0, dot);
  const name = column.slice(dot + 1);
  const table = (qualifiers.get(qualifier.toLowerCase()) ?? qualifier).toLowerCase();
  const entry = entries.find((candidate) => candidate.table.toLowerCase() === table);

  return entry !== undefined && allowsColumn(entry.rule, name);
}

function qualifierMatches(qualifier: string | undefined, occurrence: TableReference, multiTable: boolean): boolean {
  if (qualifier === undefined) {
    return !multiTable;
  }
  const target = qualifier.toLowerCase();
  return target === (occurrence.alias ?? occurrence.table).toLowerCase() || target === occurrence.table.toLowerCase();
}
