/**
 * School SQL Guard - Utility Helper Functions
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a unique request ID
 */
export function generateRequestId(): string {
  return uuidv4();
}

/**
 * Recursively freeze an object graph (arrays, plain objects)
 */
export function deepFreeze<T>(value: T, seen: WeakSet<object> = new WeakSet()): T {
  if (value !== null && typeof value === 'object' && !seen.has(value)) {
    seen.add(value);
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child, seen);
    }
  }
  return value;
}

/**
 * Strip a surrounding markdown code fence (```json ... ```) if present
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/);
  return (fenced?.[1] ?? trimmed).trim();
}

/**
 * Get environment variable as string, undefined when unset
 */
export function getEnvString(key: string): string | undefined {
  return process.env[key];
}

/**
 * Get environment variable as integer, undefined when unset or not a number
 */
export function getEnvInt(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Get environment variable as float, undefined when unset or not a number
 */
export function getEnvFloat(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Get environment variable as boolean, undefined when unset
 */
export function getEnvBool(key: string): boolean | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}
