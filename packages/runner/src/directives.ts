/**
 * The directive surface of a test case
 */

import { createAdapters, type AdapterContext } from './adapters.js';
import {
  isAggregator,
  isSeverity,
  type Aggregator,
  type ContainsOptions,
  type Severity,
  type ValueCondition,
} from './checks.js';
import type { DispatchTable } from './dispatch.js';
import { ConfigError } from './errors.js';
import { formatValue } from './interpolate.js';
import type { ProcessResult } from './process.js';

export const LAST_CALL_OUTPUT = '_last_call_output';

/**
 * Operations directives delegate to
 */
export interface DirectiveHost extends AdapterContext {
  readonly index: number;
  readonly label: string;
  callNoError(target: string, args?: readonly unknown[], params?: Readonly<Record<string, unknown>>): string;
  callAllowError(
    target: string,
    args?: readonly unknown[],
    params?: Readonly<Record<string, unknown>>,
  ): ProcessResult;
  shell(template: string, ...args: unknown[]): ProcessResult;
  log(message: unknown, ...args: unknown[]): void;
  extractMatch(pattern: string, variable?: string | null, groups?: readonly string[] | null): void;
  execute(source: string): unknown;
  fail(): void;
  expect(condition: unknown, message: string, ...args: unknown[]): void;
  abort(): never;
  assertThat(condition: unknown, message: string, ...args: unknown[]): void;
  checkSeveral(
    severity: Severity,
    aggregator: Aggregator,
    condition: ValueCondition,
    message: string,
    values: readonly unknown[],
  ): void;
  checkContains(
    severity: Severity,
    aggregator: Aggregator,
    contains: boolean,
    values: readonly unknown[],
    options?: ContainsOptions,
  ): void;
  lastOutputContains(substring: string, caseSensitive?: boolean): boolean;
  assertSuccess(message?: string, ...args: unknown[]): void;
  assertFailure(message?: string, ...args: unknown[]): void;
}

function requireString(directive: string, what: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw new ConfigError(`${directive} requires ${what} to be a string, got ${formatValue(value)}`);
  }
  return value;
}

function optionalString(directive: string, what: string, value: unknown): string | null {
  return value === undefined || value === null ? null : requireString(directive, what, value);
}

function optionalList(directive: string, what: string, value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ConfigError(`${directive} requires ${what} to be a list, got ${formatValue(value)}`);
  }
  return value;
}

function optionalRecord(directive: string, what: string, value: unknown): Record<string, unknown> {
  if (value === undefined || value === null) return {};
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new ConfigError(`${directive} requires ${what} to be a mapping, got ${formatValue(value)}`);
  }
  return Object.fromEntries(Object.entries(value));
}

function isContainsOptions(value: unknown): value is ContainsOptions {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.keys(value).every((key) => key === 'message' || key === 'case_sensitive');
}

/**
 * Split trailing contains options off the values
 */
function splitContainsArgs(directive: string, args: unknown[]): [unknown[], ContainsOptions] {
  const last = args[args.length - 1];
  if (args.length > 0 && isContainsOptions(last)) {
    const message = optionalString(directive, 'message', last.message);
    const caseSensitive = last.case_sensitive;
    if (caseSensitive !== undefined && typeof caseSensitive !== 'boolean') {
      throw new ConfigError(`${directive} requires case_sensitive to be a boolean`);
    }
    return [args.slice(0, -1), { message: message ?? '', case_sensitive: caseSensitive ?? false }];
  }
  return [args, {}];
}

const CONTAINS_DIRECTIVES: Record<string, { aggregator: Aggregator; contains: boolean }> = {
  // all values present
  assert_contains: { aggregator: 'all', contains: true },
  // at least one value present
  assert_contains_any: { aggregator: 'any', contains: true },
  // no value present
  assert_excludes: { aggregator: 'all', contains: false },
  assert_not_contains: { aggregator: 'all', contains: false },
  // at least one value absent
  assert_excludes_any: { aggregator: 'any', contains: false },
};

/**
 * Register every directive of `host` on `table`
 */
export function registerDirectives(table: DispatchTable, host: DirectiveHost): void {
  const adapt = createAdapters(host);

  // Meta information
  table.registerValue('testcase_num', host.index);
  table.registerValue('testcase_id', host.label);
  table.registerValue(LAST_CALL_OUTPUT, '');

  // Processes
  table.registerDirective(
    'call',
    (target, args, params) =>
      host.callNoError(
        requireString('call', 'target', target),
        optionalList('call', 'args', args),
        optionalRecord('call', 'params', params),
      ),
    adapt.call('call'),
  );
  table.registerDirective(
    'call_may_fail',
    (target, args, params) =>
      host.callAllowError(
        requireString('call_may_fail', 'target', target),
        optionalList('call_may_fail', 'args', args),
        optionalRecord('call_may_fail', 'params', params),
      ),
    adapt.call('call_may_fail'),
  );
  table.registerDirective(
    'shell',
    (command, ...args) => host.shell(requireString('shell', 'a command', command), ...args),
    adapt.formatArgs('shell'),
  );

  // Helpers
  table.registerDirective('uuid', () => host.uuid(), adapt.uuid);
  table.registerDirective('env', (name) => host.env(requireString('env', 'a variable name', name)), adapt.env);
  table.registerDirective('log', (message, ...args) => host.log(message, ...args), adapt.formatArgs('log'));
  table.registerDirective(
    'extract_match',
    (pattern, variable, groups) =>
      host.extractMatch(
        requireString('extract_match', 'pattern', pattern),
        optionalString('extract_match', 'variable', variable),
        groups === undefined || groups === null
          ? null
          : optionalList('extract_match', 'groups', groups).map((group) =>
              requireString('extract_match', 'each group', group),
            ),
      ),
    adapt.extractMatch,
  );

  // Code
  table.registerDirective('code', (source) => host.execute(requireString('code', 'its source', source)), adapt.code);

  // Only callable from code
  table.registerDirective('fail', () => host.fail(), null);
  table.registerDirective(
    'expect',
    (condition, message, ...args) => host.expect(condition, formatValue(message ?? 'expectation failed'), ...args),
    null,
  );
  table.registerDirective('abort', () => host.abort(), null);
  table.registerDirective(
    'assert_that',
    (condition, message, ...args) => host.assertThat(condition, formatValue(message ?? 'assertion failed'), ...args),
    null,
  );
  table.registerDirective(
    'check_several',
    (severity, aggregator, condition, message, values) => {
      if (!isSeverity(severity) || !isAggregator(aggregator)) {
        throw new ConfigError('check_several requires severity "expect" or "assert" and aggregator "all" or "any"');
      }
      if (typeof condition !== 'function') {
        throw new ConfigError('check_several requires a callable condition');
      }
      host.checkSeveral(
        severity,
        aggregator,
        (value) => Boolean(condition(value)),
        optionalString('check_several', 'message', message) ?? '',
        optionalList('check_several', 'values', values),
      );
    },
    null,
  );
  table.registerDirective(
    'last_output_contains',
    (substring, caseSensitive) =>
      host.lastOutputContains(requireString('last_output_contains', 'a substring', substring), caseSensitive === true),
    null,
  );

  // Checks on the last call
  for (const [name, { aggregator, contains }] of Object.entries(CONTAINS_DIRECTIVES)) {
    table.registerDirective(
      name,
      (...args) => {
        const [values, options] = splitContainsArgs(name, args);
        host.checkContains('assert', aggregator, contains, values, options);
      },
      adapt.contains(name),
    );
  }
  table.registerDirective(
    'assert_success',
    (message, ...args) => host.assertSuccess(optionalString('assert_success', 'message', message) ?? undefined, ...args),
    adapt.formatArgs('assert_success'),
  );
  table.registerDirective(
    'assert_failure',
    (message, ...args) => host.assertFailure(optionalString('assert_failure', 'message', message) ?? undefined, ...args),
    adapt.formatArgs('assert_failure'),
  );
}
