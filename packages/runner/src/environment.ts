import { formatValue } from './interpolate.js';

export const DEFAULT_CALL_TARGET_KEY = 'target';

/**
 * A resolved call: the full command line and where to run it
 */
export interface CallTarget {
  command: string;
  cwd?: string;
}

export interface CaseSettings {
  /** Key naming the target in a `call` argument block */
  callTargetKey?: string;
}

/**
 * What a test case needs from the suite it runs in
 */
export interface CaseEnvironment {
  /**
   * Turn a named target plus arguments into a command line.
   * Throws when the target cannot be resolved.
   */
  resolveCall(target: string, args: readonly unknown[], params: Readonly<Record<string, unknown>>): CallTarget;
  /** Value for a `{name}` placeholder, or undefined when unknown */
  resolveSymbol(name: string): string | undefined;
  getSettings(): CaseSettings;
}

const SHELL_SAFE = /^[A-Za-z0-9_\-.,:/@%+=]+$/;

/**
 * Quote a word for a POSIX shell
 */
export function shellQuote(word: string): string {
  if (SHELL_SAFE.test(word)) {
    return word;
  }
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

export interface StaticEnvironmentOptions {
  targets?: Record<string, CallTarget>;
  symbols?: Record<string, string>;
  settings?: CaseSettings;
}

/**
 * Environment backed by fixed tables
 *
 * Arguments are shell-quoted and appended to the target's command; params
 * follow as `--name=value`.
 *
 * @example
 * ```ts
 * const environment = createStaticEnvironment({
 *   targets: { greet: { command: 'echo hello', cwd: '/tmp' } },
 * });
 * environment.resolveCall('greet', ['big world'], { lang: 'en' });
 * // => { command: "echo hello 'big world' --lang=en", cwd: '/tmp' }
 * ```
 */
export function createStaticEnvironment(options: StaticEnvironmentOptions = {}): CaseEnvironment {
  const targets = options.targets ?? {};
  const symbols = options.symbols ?? {};
  const settings = options.settings ?? {};

  return {
    resolveCall(target, args, params) {
      if (!Object.prototype.hasOwnProperty.call(targets, target)) {
        throw new Error(`unknown call target "${target}"`);
      }
      const base = targets[target];
      const words = [
        base.command,
        ...args.map((arg) => shellQuote(formatValue(arg))),
        ...Object.entries(params).map(([name, value]) => shellQuote(`--${name}=${formatValue(value)}`)),
      ];
      return { command: words.join(' '), cwd: base.cwd };
    },

    resolveSymbol(name) {
      return Object.prototype.hasOwnProperty.call(symbols, name) ? symbols[name] : undefined;
    },

    getSettings() {
      return settings;
    },
  };
}
