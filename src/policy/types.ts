/**
 * School SQL Guard - Policy Types
 */

import type { IdentityField, Role } from '../identity/types.js';

export const OPERATIONS = ['SELECT', 'INSERT', 'UPDATE', 'DELETE'] as const;

export type Operation = (typeof OPERATIONS)[number];

export const WRITE_OPERATIONS: ReadonlySet<Operation> = new Set<Operation>(['INSERT', 'UPDATE', 'DELETE']);

/**
 * The identity/authentication table. No rule may ever grant access to it,
 * whatever the policy document says.
 */
export const PROTECTED_TABLES: ReadonlySet<string> = new Set(['users']);

export function isProtectedTable(table: string): boolean {
  return PROTECTED_TABLES.has(table.toLowerCase());
}

/**
 * A predicate pattern bound to the requester's identity, e.g.
 * `StudentID = {current_role_id}`
 */
export interface ConditionTemplate {
  /** Template text as written in the policy */
  readonly source: string;
  /** `Column = {placeholder}` part of the source, qualifier dropped */
  readonly body: string;
  /** Table qualifier written in the template, if any */
  readonly table?: string;
  readonly column: string;
  readonly placeholder: IdentityField;
}

export interface PermissionRule {
  readonly role: Role;
  readonly table: string;
  readonly allowedOperations: ReadonlySet<Operation>;
  readonly allowedColumns: readonly string[] | 'all';
  readonly requiredConditions: readonly ConditionTemplate[];
}
