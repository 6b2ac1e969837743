/**
 * Execution of a single test case
 *
 * A case runs three stages in order: SETUP, TEST, TEARDOWN. Each stage is a
 * list of single-key directive entries dispatched through the case's
 * directive table. Failed assertions abort the rest of their stage; failed
 * expectations are recorded and execution continues. Infrastructure problems
 * are recorded as errors. TEARDOWN runs after every outcome of SETUP and TEST
 * except an interrupt, which is recorded and then rethrown from `run()`.
 */

import { randomUUID } from 'node:crypto';
import { createLogger, type Logger } from '@caserun/logger';
import { runScript } from '@caserun/script';
import {
  aggregate,
  defaultCheckMessage,
  defaultContainsMessage,
  type Aggregator,
  type ContainsOptions,
  type Severity,
  type ValueCondition,
} from './checks.js';
import { DispatchTable, parseDirectiveEntry } from './dispatch.js';
import { LAST_CALL_OUTPUT, registerDirectives, type DirectiveHost } from './directives.js';
import { DEFAULT_CALL_TARGET_KEY, type CallTarget, type CaseEnvironment } from './environment.js';
import {
  CallError,
  CaseError,
  ConfigError,
  errorMessage,
  InterruptError,
  StageAbort,
} from './errors.js';
import { formatMessage, formatValue, type SymbolResolver } from './interpolate.js';
import { createShellLauncher, type ProcessLauncher, type ProcessResult } from './process.js';
import { SymbolTable } from './symbols.js';
import { Transcript } from './transcript.js';

export type StageName = 'SETUP' | 'TEST' | 'TEARDOWN';

export type CaseStatus = 'pending' | 'passed' | 'failed' | 'errored';

/**
 * A parsed case definition. Each stage is a list of single-key mappings from
 * directive name to argument block.
 */
export interface CaseDefinition {
  index: number;
  label: string;
  setup?: readonly unknown[];
  test?: readonly unknown[];
  teardown?: readonly unknown[];
}

export interface TestCaseOptions {
  environment: CaseEnvironment;
  logger?: Logger;
  launcher?: ProcessLauncher;
  /** Variables read by `env`; defaults to `process.env` */
  processEnv?: Readonly<Record<string, string | undefined>>;
  /** Source of `uuid` values */
  generateId?: () => string;
}

/**
 * A recorded problem. The message is formatted when the problem is recorded.
 */
export interface Problem {
  category: string;
  message: string;
}

export type StageOutcome =
  | { kind: 'completed' }
  | { kind: 'aborted' }
  | { kind: 'errored'; category: string };

const CHECK_STATE_NOTE = '(check state: clean-up did not finish)';

export class TestCase implements DirectiveHost {
  readonly index: number;
  readonly label: string;
  readonly symbols = new SymbolTable();
  readonly callTargetKey: string;

  private definition: CaseDefinition;
  private environment: CaseEnvironment;
  private logger: Logger;
  private launcher: ProcessLauncher;
  private processEnv: Readonly<Record<string, string | undefined>>;
  private generateId: () => string;
  private dispatch = new DispatchTable();
  private transcript = new Transcript();
  private failures: Problem[] = [];
  private errors: Problem[] = [];
  private resolvers: SymbolResolver[];

  private _lastExitCode = 0;
  private _lastOutput = '';
  private _startTime: Date | null = null;
  private _endTime: Date | null = null;
  private finished = false;

  constructor(definition: CaseDefinition, options: TestCaseOptions) {
    this.definition = definition;
    this.index = definition.index;
    this.label = definition.label;
    this.environment = options.environment;
    this.logger = (options.logger ?? createLogger()).child({ case: definition.index, label: definition.label });
    this.launcher = options.launcher ?? createShellLauncher();
    this.processEnv = options.processEnv ?? process.env;
    this.generateId = options.generateId ?? randomUUID;
    this.callTargetKey = this.environment.getSettings().callTargetKey ?? DEFAULT_CALL_TARGET_KEY;
    this.resolvers = [(name) => this.environment.resolveSymbol(name), (name) => this.symbols.resolve(name)];

    registerDirectives(this.dispatch, this);
    for (const [name, value] of this.dispatch.bindings()) {
      this.symbols.set(name, value);
    }
  }

  // Accessors

  get status(): CaseStatus {
    if (!this.finished) return 'pending';
    if (this.failures.length > 0) return 'failed';
    if (this.errors.length > 0) return 'errored';
    return 'passed';
  }

  get startTime(): Date | null {
    return this._startTime;
  }

  get endTime(): Date | null {
    return this._endTime;
  }

  get durationMs(): number | null {
    if (!this._startTime || !this._endTime) return null;
    return this._endTime.getTime() - this._startTime.getTime();
  }

  get lastExitCode(): number {
    return this._lastExitCode;
  }

  get lastOutput(): string {
    return this._lastOutput;
  }

  getFailures(): Problem[] {
    return this.failures.map((problem) => ({ ...problem }));
  }

  getErrors(): Problem[] {
    return this.errors.map((problem) => ({ ...problem }));
  }

  getTranscript(indent: number = 0, prefix: string = ''): string {
    return this.transcript.render(indent, prefix);
  }

  // Stage state machine

  /**
   * Run all stages and report the result
   *
   * @returns The number of recorded failures and errors
   * @throws {InterruptError} If a command was interrupted
   */
  run(): number {
    if (this._startTime) {
      throw new CaseError(`test case ${this.index} has already been run`);
    }
    this._startTime = new Date();

    try {
      for (const [stage, entries] of [
        ['SETUP', this.definition.setup],
        ['TEST', this.definition.test],
      ] as const) {
        const outcome = this.runStage(stage, entries ?? []);
        if (outcome.kind !== 'completed') break;
      }
      this.runStage('TEARDOWN', this.definition.teardown ?? []);
    } finally {
      this._endTime = new Date();
      this.finished = true;
    }

    this.report();
    return this.failures.length + this.errors.length;
  }

  /**
   * Run one stage, containing everything but interrupts
   */
  runStage(stage: StageName, entries: readonly unknown[]): StageOutcome {
    this.transcript.line(`\n### Test case ${stage}`);

    try {
      for (const entry of entries) {
        this.runEntry(stage, entry);
      }
      return { kind: 'completed' };
    } catch (error) {
      return this.handleStageFault(stage, error);
    }
  }

  private runEntry(stage: StageName, entry: unknown): void {
    const [name, block] = parseDirectiveEntry(entry);
    this.logger.debug('directive_started', { stage, directive: name });
    this.dispatch.invoke(name, block);
  }

  private handleStageFault(stage: StageName, error: unknown): StageOutcome {
    if (error instanceof StageAbort) {
      if (stage !== 'TEARDOWN') {
        return { kind: 'aborted' };
      }
      const category = 'unexpected TEST FAILURE in stage TEARDOWN';
      this.recordError(category, 'test failure in stage TEARDOWN');
      this.transcript.line(category);
      this.logger.error('stage_fault', { stage, category, message: error.message });
      return { kind: 'errored', category };
    }

    if (error instanceof CallError) {
      const category = `CALL ERROR in stage ${stage}`;
      this.recordError(category, '{}', error.message);
      this.transcript.line(`${category}: ${error.message}`);
      this.logger.error('stage_fault', { stage, category, message: error.message });
      return { kind: 'errored', category };
    }

    if (error instanceof InterruptError) {
      const category = `KEYBOARD INTERRUPT in stage ${stage}`;
      this.recordError(category, '{}', error.message);
      this.transcript.line(category);
      this.logger.error('stage_fault', { stage, category, message: error.message });
      throw error;
    }

    const category = `UNHANDLED EXCEPTION in stage ${stage}`;
    const short = describeError(error);
    const stack = error instanceof Error ? stackFrames(error) : '';
    this.recordError(category, '{}', stack ? `${short}\n${stack}` : short);
    this.transcript.line(`# EXCEPTION!! ${short}`);
    this.logger.error('stage_fault', { stage, category, message: short, stack });
    return { kind: 'errored', category };
  }

  private report(): void {
    const prefix = `---- Test case ${this.index}: "${this.label}"`;
    const summary = {
      index: this.index,
      label: this.label,
      failures: this.failures.length,
      errors: this.errors.length,
      durationMs: this.durationMs,
    };

    if (this.status === 'passed') {
      this.logger.info('case_passed', { ...summary, message: `${prefix} PASSED ------------------------------` });
      return;
    }

    const failed = this.status === 'failed';
    this.logger.warn(failed ? 'case_failed' : 'case_errored', {
      ...summary,
      message: `${prefix} ${failed ? 'FAILED' : 'ERRORED'} --------------------`,
    });
    for (const { category, message } of this.getFailures()) {
      this.logger.warn('case_problem', { category, message: `    ${category}: ${message}` });
    }
    for (const { category, message } of this.getErrors()) {
      this.logger.warn('case_problem', { category, message: `    ${category}: ${CHECK_STATE_NOTE} ${message}` });
    }
    this.logger.warn('case_output', { message: `    Output:\n${this.getTranscript(4, '| ')}\n` });
  }

  // Problem records

  private recordFailure(category: string, template: string, ...args: unknown[]): void {
    this.failures.push({ category, message: this.format(template, args) });
  }

  private recordError(category: string, template: string, ...args: unknown[]): void {
    this.errors.push({ category, message: this.format(template, args) });
  }

  private format(template: string, args: readonly unknown[]): string {
    return formatMessage(template, args, this.resolvers);
  }

  // Assertions and expectations

  expect(condition: unknown, message: string, ...args: unknown[]): void {
    if (!condition) {
      this.recordFailure('FAILED EXPECTATION', message, ...args);
      this.log(`# FAILED EXPECTATION: ${message}`, ...args);
    }
  }

  fail(): void {
    this.expect(false, 'failure');
  }

  assertThat(condition: unknown, message: string, ...args: unknown[]): void {
    if (!condition) {
      this.recordFailure('FAILED ASSERTION', message, ...args);
      this.log(`# FAILED ASSERTION: ${message}`, ...args);
      throw new StageAbort(this.format(message, args));
    }
  }

  abort(): never {
    this.assertThat(false, 'abort called');
    throw new StageAbort('abort called');
  }

  lastOutputContains(substring: string, caseSensitive: boolean = false): boolean {
    if (caseSensitive) {
      return this._lastOutput.includes(substring);
    }
    return this._lastOutput.toLowerCase().includes(substring.toLowerCase());
  }

  /**
   * Apply `condition` to each value, combine the results with `aggregator`
   * and check the outcome with `severity`. An empty `message` gets a
   * generated one.
   */
  checkSeveral(
    severity: Severity,
    aggregator: Aggregator,
    condition: ValueCondition,
    message: string,
    values: readonly unknown[],
  ): void {
    if (message !== '') {
      this.checkValues(severity, aggregator, condition, values, message, []);
    } else {
      this.checkValues(severity, aggregator, condition, values, defaultCheckMessage(severity, aggregator), [
        JSON.stringify(values),
      ]);
    }
  }

  checkContains(
    severity: Severity,
    aggregator: Aggregator,
    contains: boolean,
    values: readonly unknown[],
    options: ContainsOptions = {},
  ): void {
    const caseSensitive = options.case_sensitive ?? false;
    const condition = (value: unknown) => this.lastOutputContains(formatValue(value), caseSensitive) === contains;
    if (options.message) {
      this.checkValues(severity, aggregator, condition, values, options.message, []);
    } else {
      this.checkValues(severity, aggregator, condition, values, defaultContainsMessage(severity, aggregator, contains), [
        JSON.stringify(values),
      ]);
    }
  }

  /** Values travel as arguments so they are never interpolated */
  private checkValues(
    severity: Severity,
    aggregator: Aggregator,
    condition: ValueCondition,
    values: readonly unknown[],
    message: string,
    args: readonly unknown[],
  ): void {
    const passed = aggregate(
      aggregator,
      values.map((value) => condition(value)),
    );
    if (severity === 'assert') {
      this.assertThat(passed, message, ...args);
    } else {
      this.expect(passed, message, ...args);
    }
  }

  assertSuccess(message?: string, ...args: unknown[]): void {
    this.assertThat(this._lastExitCode === 0, message || 'expected last call to succeed', ...args);
  }

  assertFailure(message?: string, ...args: unknown[]): void {
    this.assertThat(this._lastExitCode !== 0, message || 'expected last call to fail', ...args);
  }

  // Processes

  private resetLastCall(): void {
    this._lastExitCode = 0;
    this._lastOutput = '';
    this.symbols.set(LAST_CALL_OUTPUT, '');
  }

  /**
   * Run `command` and capture its exit code and merged output
   *
   * A non-zero exit is recorded, not raised.
   *
   * @throws {CallError} If the command could not be launched
   */
  invokeExternal(command: string, cwd?: string): ProcessResult {
    this.resetLastCall();
    this.transcript.append(`\n# Calling: ${command}\n`);

    const result = this.launcher.run(command, { cwd });
    if (result.exitCode !== 0) {
      this.transcript.append('# ... call did not succeed\n');
    }

    this._lastExitCode = result.exitCode;
    this._lastOutput = result.output;
    this.symbols.set(LAST_CALL_OUTPUT, result.output);
    this.transcript.output(result.output);
    return result;
  }

  callAllowError(
    target: string,
    args: readonly unknown[] = [],
    params: Readonly<Record<string, unknown>> = {},
  ): ProcessResult {
    this.resetLastCall();

    let call: CallTarget;
    try {
      call = this.environment.resolveCall(target, args, params);
    } catch (error) {
      throw new CallError(`could not resolve call: ${errorMessage(error)}`);
    }
    return this.invokeExternal(call.command, call.cwd);
  }

  callNoError(
    target: string,
    args: readonly unknown[] = [],
    params: Readonly<Record<string, unknown>> = {},
  ): string {
    const { exitCode, output } = this.callAllowError(target, args, params);
    const invocation = [
      target,
      ...args.map(formatValue),
      ...Object.entries(params).map(([name, value]) => `${name}=${formatValue(value)}`),
    ];
    this.assertThat(exitCode === 0, 'call failed: "{}"', invocation.join(' '));
    return output;
  }

  shell(template: string, ...args: unknown[]): ProcessResult {
    return this.invokeExternal(this.format(template + ' {}'.repeat(args.length), args));
  }

  // Other directives

  log(message: unknown, ...args: unknown[]): void {
    this.transcript.line(this.format(formatValue(message), args));
  }

  uuid(): string {
    return this.generateId();
  }

  env(name: string): string {
    const value = this.processEnv[name];
    if (value === undefined) {
      throw new ConfigError(`environment variable ${name} is not set`);
    }
    return value;
  }

  /**
   * Bind capture groups of the first match of `pattern` in the last output
   *
   * `variable` receives the first group; `groups` name the groups in order.
   * Every named symbol is bound, to `null` when there is no such capture.
   */
  extractMatch(pattern: string, variable?: string | null, groups?: readonly string[] | null): void {
    if (!pattern) {
      throw new ConfigError('extract_match requires pattern to match');
    }
    if (!variable && (!groups || groups.length === 0)) {
      throw new ConfigError('extract_match requires variable or groups');
    }
    if (variable && groups && groups.length > 0) {
      throw new ConfigError('extract_match cannot accept both variable and groups');
    }

    let regex: RegExp;
    try {
      regex = new RegExp(pattern);
    } catch (error) {
      throw new ConfigError(`extract_match pattern is invalid: ${errorMessage(error)}`);
    }

    const names = variable ? [variable] : (groups ?? []);
    for (const name of names) {
      this.symbols.set(name, null);
    }

    const match = regex.exec(this._lastOutput);
    if (!match) {
      return;
    }
    const captures = match.slice(1);
    names.forEach((name, i) => {
      if (i < captures.length) {
        this.symbols.set(name, captures[i] ?? null);
      }
    });
  }

  /**
   * Run a script with the symbol table as its only bindings
   */
  execute(source: string): unknown {
    return runScript(source, this.symbols);
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return `non-error thrown: ${formatValue(error)}`;
}

/** The stack without its leading message line */
function stackFrames(error: Error): string {
  if (!error.stack) return '';
  const lines = error.stack.split('\n');
  const firstFrame = lines.findIndex((line) => line.trimStart().startsWith('at '));
  return firstFrame === -1 ? '' : lines.slice(firstFrame).join('\n');
}
