/**
 * Conversion and collection helpers for scripts
 */

import { toDisplayString } from '../runtime/utils.js';

export function length(value: unknown): number {
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length;
  }
  throw new TypeError('length() requires a string or an array');
}

/**
 * Substring test for strings, membership test for arrays
 */
export function includes(container: unknown, item: unknown): boolean {
  if (typeof container === 'string') {
    if (typeof item !== 'string') {
      throw new TypeError('includes() on a string requires a string to search for');
    }
    return container.includes(item);
  }
  if (Array.isArray(container)) {
    return container.includes(item);
  }
  throw new TypeError('includes() requires a string or an array as first argument');
}

export function string(value: unknown): string {
  return toDisplayString(value);
}

export function number(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (!Number.isNaN(parsed)) return parsed;
  }
  throw new TypeError(`number() cannot convert ${JSON.stringify(value)}`);
}
