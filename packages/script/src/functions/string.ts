/**
 * String functions for scripts
 *
 * All functions are pure and return new values.
 */

function requireString(value: unknown, fn: string, position: string): string {
  if (typeof value !== 'string') {
    throw new TypeError(`${fn}() requires a string as ${position} argument`);
  }
  return value;
}

export function upper(str: unknown): string {
  return requireString(str, 'upper', 'first').toUpperCase();
}

export function lower(str: unknown): string {
  return requireString(str, 'lower', 'first').toLowerCase();
}

export function trim(str: unknown): string {
  return requireString(str, 'trim', 'first').trim();
}

export function split(str: unknown, delimiter: unknown): string[] {
  return requireString(str, 'split', 'first').split(requireString(delimiter, 'split', 'second'));
}

/**
 * Join array elements with delimiter
 * @throws If first argument is not an array
 */
export function join(arr: unknown, delimiter: unknown): string {
  if (!Array.isArray(arr)) {
    throw new TypeError('join() requires an array as first argument');
  }
  const separator = requireString(delimiter, 'join', 'second');
  return arr.map((item) => String(item)).join(separator);
}

export function startsWith(str: unknown, prefix: unknown): boolean {
  return requireString(str, 'startsWith', 'first').startsWith(requireString(prefix, 'startsWith', 'second'));
}

export function endsWith(str: unknown, suffix: unknown): boolean {
  return requireString(str, 'endsWith', 'first').endsWith(requireString(suffix, 'endsWith', 'second'));
}

/**
 * Replace every occurrence of a literal substring
 */
export function replace(str: unknown, search: unknown, replacement: unknown): string {
  const text = requireString(str, 'replace', 'first');
  return text.split(requireString(search, 'replace', 'second')).join(requireString(replacement, 'replace', 'third'));
}

/**
 * Test a string against a regular expression
 */
export function matches(str: unknown, pattern: unknown): boolean {
  const text = requireString(str, 'matches', 'first');
  return new RegExp(requireString(pattern, 'matches', 'second')).test(text);
}
