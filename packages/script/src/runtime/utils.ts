/**
 * Property access that never reaches inherited members
 */

const hasOwnProperty = Object.prototype.hasOwnProperty;

const BLOCKED_PROPERTIES = new Set([
  '__proto__',
  'constructor',
  'prototype',
  '__defineGetter__',
  '__defineSetter__',
  '__lookupGetter__',
  '__lookupSetter__',
]);

/**
 * Look up an own property of `parent`.
 *
 * Strings and arrays expose `length`; every other inherited or blocked name
 * reads as undefined.
 */
export function lookupProperty(parent: unknown, propertyName: string): unknown {
  if (parent == null || BLOCKED_PROPERTIES.has(propertyName)) {
    return undefined;
  }

  if (typeof parent === 'string') {
    return propertyName === 'length' ? parent.length : undefined;
  }

  if (Array.isArray(parent)) {
    if (propertyName === 'length') return parent.length;
    return hasOwnProperty.call(parent, propertyName) ? parent[Number(propertyName)] : undefined;
  }

  if (parent instanceof Map) {
    return parent.get(propertyName);
  }

  if (typeof parent === 'object' && hasOwnProperty.call(parent, propertyName)) {
    return Reflect.get(parent, propertyName);
  }

  return undefined;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text form of a value as scripts see it: strings as is, `null`/`undefined`
 * by name, structures as JSON.
 */
export function toDisplayString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
