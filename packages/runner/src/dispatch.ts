/**
 * Directive dispatch table
 *
 * Maps directive names to tagged entries. A `value` entry is only visible as
 * a symbol. A `directive` entry is callable from embedded code and, when it
 * has an argument adapter, from a declarative stage entry as well.
 */

import type { ScriptFunction } from '@caserun/script';
import { ConfigError, UnknownDirectiveError } from './errors.js';

/**
 * Turn a declarative argument block into call arguments.
 * `null` means the adapter did all the work and the handler is not called.
 */
export type ArgumentAdapter = (block: unknown) => unknown[] | null;

export type DispatchEntry =
  | { kind: 'value'; value: unknown }
  | { kind: 'directive'; fn: ScriptFunction; adapt: ArgumentAdapter | null };

export class DispatchTable {
  private entries = new Map<string, DispatchEntry>();

  registerValue(name: string, value: unknown): void {
    this.entries.set(name, { kind: 'value', value });
  }

  registerDirective(name: string, fn: ScriptFunction, adapt: ArgumentAdapter | null): void {
    this.entries.set(name, { kind: 'directive', fn, adapt });
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * @throws {UnknownDirectiveError} If nothing is registered under `name`
   */
  resolve(name: string): DispatchEntry {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new UnknownDirectiveError(name);
    }
    return entry;
  }

  /**
   * Run a directive from its declarative argument block
   *
   * @throws {ConfigError} If `name` is unknown, a value, or only callable from code
   */
  invoke(name: string, block: unknown): unknown {
    const entry = this.resolve(name);

    if (entry.kind === 'value') {
      throw new ConfigError(`"${name}" is a value, not a directive`);
    }
    if (entry.adapt === null) {
      throw new ConfigError(`directive only available inside a code directive: ${name}`);
    }

    const args = entry.adapt(block);
    if (args === null) {
      return undefined;
    }
    return entry.fn(...args);
  }

  /** Symbol bindings for every entry: values as is, directives as callables */
  bindings(): Map<string, unknown> {
    const result = new Map<string, unknown>();
    for (const [name, entry] of this.entries) {
      result.set(name, entry.kind === 'value' ? entry.value : entry.fn);
    }
    return result;
  }
}

/**
 * Split a stage entry into its directive name and argument block
 *
 * @throws {ConfigError} Unless `entry` is a mapping with exactly one key
 */
export function parseDirectiveEntry(entry: unknown): [name: string, block: unknown] {
  if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
    throw new ConfigError(`expected a directive mapping, got ${JSON.stringify(entry)}`);
  }

  const pairs = Object.entries(entry);
  if (pairs.length !== 1) {
    throw new ConfigError(
      `expected exactly one directive per entry, got ${pairs.length === 0 ? 'none' : pairs.map(([key]) => key).join(', ')}`,
    );
  }
  return pairs[0];
}
