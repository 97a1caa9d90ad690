/**
 * School SQL Guard - Condition Templates
 *
 * A template is `[Table.]Column = {placeholder}`. Rendering substitutes the
 * requester's identity value as a quoted SQL literal and keeps the
 * template's own spacing.
 */

import { identityValue, isIdentityField, type Identity } from '../identity/types.js';
import { ConfigError } from '../utils/types.js';

import type { ConditionTemplate } from './types.js';

const IDENT = '[\\p{L}_][\\p{L}\\p{N}_]*';
const TEMPLATE_PATTERN = new RegExp(
  `^\\s*(?:(${IDENT})\\s*\\.\\s*)?((${IDENT})\\s*=\\s*\\{\\s*([A-Za-z_]+)\\s*\\})\\s*$`,
  'u'
);
const PLACEHOLDER_PATTERN = /\{\s*[A-Za-z_]+\s*\}/;

export function parseConditionTemplate(source: string): ConditionTemplate {
  const match = TEMPLATE_PATTERN.exec(source);
  const table = match?.[1];
  const body = match?.[2];
  const column = match?.[3];
  const placeholder = match?.[4];

  if (body === undefined || column === undefined || placeholder === undefined) {
    throw new ConfigError(`Malformed condition template '${source}'`, [
      `expected "Column = {placeholder}", got '${source}'`,
    ]);
  }
  if (!isIdentityField(placeholder)) {
    throw new ConfigError(`Unknown placeholder '{${placeholder}}' in condition '${source}'`, [
      `placeholder must be one of {current_user_id}, {current_role_id}`,
    ]);
  }

  const template: ConditionTemplate =
    table === undefined
      ? { source: source.trim(), body, column, placeholder }
      : { source: source.trim(), body, table, column, placeholder };
  return Object.freeze(template);
}

/**
 * Render a single-quoted SQL string literal, doubling embedded quotes
 */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Render a template for an identity, optionally qualifying its column.
 * A qualifier written in the template is replaced by `qualifier`.
 * Returns null when the identity has no value for the placeholder.
 */
export function renderCondition(
  template: ConditionTemplate,
  identity: Identity,
  qualifier?: string
): string | null {
  const value = identityValue(identity, template.placeholder);
  if (value === undefined) {
    return null;
  }

  const text = qualifier === undefined ? template.body : `${qualifier}.${template.body}`;
  const literal = quoteLiteral(value);
  return text.replace(PLACEHOLDER_PATTERN, () => literal);
}
