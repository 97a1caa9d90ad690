/**
 * School SQL Guard - Policy Store
 *
 * Immutable (role, table) → PermissionRule lookup, validated in full when
 * it is built. Any problem in the document is a ConfigError; nothing is
 * silently skipped.
 */

import { PolicyDocumentSchema, formatValidationErrors, type PolicyRuleEntry } from '../config/schema.js';
import { ROLES, type Role } from '../identity/types.js';
import logger from '../utils/logger.js';
import { ConfigError } from '../utils/types.js';

import { parseConditionTemplate } from './templates.js';
import { isProtectedTable, type ConditionTemplate, type PermissionRule } from './types.js';

export class PolicyStore {
  private readonly rules: ReadonlyMap<string, PermissionRule>;
  private readonly rulesByRole: Readonly<Record<Role, readonly PermissionRule[]>>;
  private readonly tables: ReadonlyMap<string, string>;

  private constructor(
    tables: ReadonlyMap<string, string>,
    rulesByRole: Record<Role, readonly PermissionRule[]>
  ) {
    this.tables = tables;
    this.rulesByRole = Object.freeze(rulesByRole);

    const rules = new Map<string, PermissionRule>();
    for (const role of ROLES) {
      for (const rule of rulesByRole[role]) {
        rules.set(ruleKey(role, rule.table), rule);
      }
    }
    this.rules = rules;
  }

  /**
   * Build a store from a parsed policy document (YAML/JSON object)
   */
  public static load(document: unknown): PolicyStore {
    const parsed = PolicyDocumentSchema.safeParse(document);
    if (!parsed.success) {
      const issues = formatValidationErrors(parsed.error);
      throw new ConfigError(`Invalid policy document: ${issues.join('; ')}`, issues);
    }

    const tables = new Map<string, string>();
    for (const table of parsed.data.tables) {
      tables.set(table.toLowerCase(), table);
    }

    const issues: string[] = [];
    const rulesByRole: Record<Role, PermissionRule[]> = { student: [], teacher: [] };

    for (const role of ROLES) {
      const entries = parsed.data.roles[role] ?? [];
      if (entries.length === 0) {
        logger.warn('Role has no permission rules; every query will be denied', { role });
      }

      const seen = new Set<string>();
      entries.forEach((entry, index) => {
        const path = `roles.${role}.${index}`;
        const table = tables.get(entry.table.toLowerCase());

        if (isProtectedTable(entry.table)) {
          issues.push(`${path}: table '${entry.table}' is protected and cannot be granted`);
          return;
        }
        if (table === undefined) {
          issues.push(`${path}: unknown table '${entry.table}'`);
          return;
        }
        if (seen.has(table.toLowerCase())) {
          issues.push(`${path}: duplicate rule for role '${role}' on table '${table}'`);
          return;
        }
        seen.add(table.toLowerCase());

        const conditions = parseConditions(entry, table, path, issues);
        if (conditions) {
          rulesByRole[role].push(buildRule(role, table, entry, conditions));
        }
      });
    }

    if (issues.length > 0) {
      throw new ConfigError(`Invalid policy document: ${issues.join('; ')}`, issues);
    }

    logger.info('Policy loaded', {
      tables: tables.size,
      rules: ROLES.reduce((total, role) => total + rulesByRole[role].length, 0),
    });

    return new PolicyStore(tables, rulesByRole);
  }

  /**
   * Rule for a role on a table (case-insensitive), if any
   */
  public lookup(role: Role, table: string): PermissionRule | undefined {
    return this.rules.get(ruleKey(role, table));
  }

  public rulesFor(role: Role): readonly PermissionRule[] {
    return this.rulesByRole[role];
  }

  public knownTables(): string[] {
    return [...this.tables.values()];
  }

  public isKnownTable(table: string): boolean {
    return this.tables.has(table.toLowerCase());
  }
}

function ruleKey(role: Role, table: string): string {
  return `${role}:${table.toLowerCase()}`;
}

function parseConditions(
  entry: PolicyRuleEntry,
  table: string,
  path: string,
  issues: string[]
): ConditionTemplate[] | null {
  const conditions: ConditionTemplate[] = [];
  let valid = true;

  entry.conditions.forEach((source, index) => {
    try {
      const template = parseConditionTemplate(source);
      if (template.table !== undefined && template.table.toLowerCase() !== table.toLowerCase()) {
        issues.push(`${path}.conditions.${index}: condition '${source}' names another table`);
        valid = false;
        return;
      }
      conditions.push(template);
    } catch (error) {
      if (!(error instanceof ConfigError)) {
        throw error;
      }
      issues.push(`${path}.conditions.${index}: ${error.message}`);
      valid = false;
    }
  });

  return valid ? conditions : null;
}

function buildRule(
  role: Role,
  table: string,
  entry: PolicyRuleEntry,
  conditions: ConditionTemplate[]
): PermissionRule {
  const columns = entry.allowed_columns;
  const rule: PermissionRule = {
    role,
    table,
    allowedOperations: new Set(entry.allowed_operations),
    allowedColumns: columns === 'all' || columns === '*' ? 'all' : Object.freeze([...columns]),
    requiredConditions: Object.freeze(conditions),
  };
  return Object.freeze(rule);
}
