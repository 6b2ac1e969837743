import type { Scope } from '@caserun/script';
import { ConfigError } from './errors.js';
import { formatValue } from './interpolate.js';

/**
 * Names visible to directives and embedded code for the lifetime of one case.
 * Last write wins.
 */
export class SymbolTable implements Scope {
  private values = new Map<string, unknown>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.values.set(name, value);
    }
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): unknown {
    return this.values.get(name);
  }

  set(name: string, value: unknown): void {
    this.values.set(name, value);
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  /**
   * Resolver for message interpolation. Callables are not rendered.
   */
  resolve(name: string): string | undefined {
    if (!this.values.has(name)) {
      return undefined;
    }
    const value = this.values.get(name);
    return typeof value === 'function' ? undefined : formatValue(value);
  }
}

/**
 * The value of the symbol `token` names, or else the token itself in quotes
 */
export function lookupLiteralOrVariable(symbols: SymbolTable, token: unknown): unknown {
  if (typeof token === 'string' && symbols.has(token)) {
    return symbols.get(token);
  }
  return `"${formatValue(token)}"`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve a `{ variable: name }` or `{ literal: value }` entry
 *
 * @throws {ConfigError} If the entry has another shape or names an unknown symbol
 */
export function resolveVariableOrLiteral(symbols: SymbolTable, entry: unknown): unknown {
  if (!isRecord(entry)) {
    throw new ConfigError(`expected a mapping with "variable" or "literal", got ${formatValue(entry)}`);
  }

  const keys = Object.keys(entry);
  if (keys.length !== 1) {
    throw new ConfigError(
      `expected each element to contain exactly one of "variable", "literal", but got ${formatValue(entry)}`,
    );
  }

  const [key] = keys;
  const item = entry[key];

  if (key === 'literal') {
    return item;
  }
  if (key !== 'variable') {
    throw new ConfigError(`expected "variable" or "literal", got "${key}"`);
  }
  if (typeof item !== 'string' || !symbols.has(item)) {
    throw new ConfigError(`unknown variable: ${formatValue(item)}`);
  }
  return symbols.get(item);
}
