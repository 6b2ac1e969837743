/**
 * Aggregate checks over several values
 */

/** `expect` records and continues; `assert` records and aborts the stage */
export type Severity = 'expect' | 'assert';

export type Aggregator = 'all' | 'any';

export type ValueCondition = (value: unknown) => boolean;

/**
 * Options accepted by the contains family, in argument blocks and from code
 */
export interface ContainsOptions {
  message?: string;
  case_sensitive?: boolean;
}

export const SEVERITY_LABELS: Record<Severity, string> = {
  expect: 'expected',
  assert: 'required',
};

export const AGGREGATOR_LABELS: Record<Aggregator, string> = {
  all: 'all of',
  any: 'any of',
};

export function aggregate(aggregator: Aggregator, results: readonly boolean[]): boolean {
  return aggregator === 'all' ? results.every(Boolean) : results.some(Boolean);
}

export function isSeverity(value: unknown): value is Severity {
  return value === 'expect' || value === 'assert';
}

export function isAggregator(value: unknown): value is Aggregator {
  return value === 'all' || value === 'any';
}

/** Template whose `{}` slot takes the JSON of the checked values */
export function defaultCheckMessage(severity: Severity, aggregator: Aggregator): string {
  return `${SEVERITY_LABELS[severity]} condition to hold for ${AGGREGATOR_LABELS[aggregator]} the following values in the preceding output: {}`;
}

/**
 * @example
 * ```ts
 * formatMessage(defaultContainsMessage('assert', 'any', true), [JSON.stringify(['ok', 'done'])])
 * // => 'required presence of any of the following values in the preceding output: ["ok","done"]'
 * ```
 */
export function defaultContainsMessage(severity: Severity, aggregator: Aggregator, contains: boolean): string {
  const presence = contains ? 'presence' : 'absence';
  return `${SEVERITY_LABELS[severity]} ${presence} of ${AGGREGATOR_LABELS[aggregator]} the following values in the preceding output: {}`;
}
