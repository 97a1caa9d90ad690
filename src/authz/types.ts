/**
 * School SQL Guard - Decision Types
 */

export const DENY_REASONS = {
  protectedTable: 'protected table',
  queryShape: 'unrecognized or unauthorized query shape',
  noRule: 'no rule for table',
  operation: 'operation not permitted',
  column: 'column not permitted',
  unscopedWrite: 'unscoped write',
  rewriteFailed: 'rewrite failed',
  identityNotFound: 'identity not found',
  cancelled: 'request cancelled',
  internal: 'internal error',
} as const;

export type DenyReason = (typeof DENY_REASONS)[keyof typeof DENY_REASONS];

export type Decision =
  | { readonly kind: 'allow' }
  | { readonly kind: 'allow_with_rewrite'; readonly predicate: string }
  | { readonly kind: 'deny'; readonly reason: DenyReason };

export function allow(): Decision {
  const decision: Decision = { kind: 'allow' };
  return Object.freeze(decision);
}

export function allowWithRewrite(predicate: string): Decision {
  const decision: Decision = { kind: 'allow_with_rewrite', predicate };
  return Object.freeze(decision);
}

export function deny(reason: DenyReason): Decision {
  const decision: Decision = { kind: 'deny', reason };
  return Object.freeze(decision);
}

export function isPermitted(decision: Decision): boolean {
  return decision.kind !== 'deny';
}
