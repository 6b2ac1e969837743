/**
 * @caserun/runner
 *
 * Execution engine for declarative test cases: directive dispatch, symbol
 * interpolation, process invocation, assertions and the
 * SETUP / TEST / TEARDOWN state machine.
 */

export { TestCase } from './test-case.js';
export type {
  CaseDefinition,
  CaseStatus,
  Problem,
  StageName,
  StageOutcome,
  TestCaseOptions,
} from './test-case.js';

export {
  CallError,
  CaseError,
  ConfigError,
  InterruptError,
  StageAbort,
  UnknownDirectiveError,
} from './errors.js';

export { DispatchTable, parseDirectiveEntry } from './dispatch.js';
export type { ArgumentAdapter, DispatchEntry } from './dispatch.js';
export { registerDirectives, LAST_CALL_OUTPUT } from './directives.js';
export type { DirectiveHost } from './directives.js';

export { SymbolTable, lookupLiteralOrVariable, resolveVariableOrLiteral } from './symbols.js';
export { formatMessage, formatValue, interpolateSymbols, reindent } from './interpolate.js';
export type { SymbolResolver } from './interpolate.js';

export { createStaticEnvironment, DEFAULT_CALL_TARGET_KEY, shellQuote } from './environment.js';
export type {
  CallTarget,
  CaseEnvironment,
  CaseSettings,
  StaticEnvironmentOptions,
} from './environment.js';

export { createShellLauncher, DEFAULT_MAX_OUTPUT_BYTES, DEFAULT_SHELL } from './process.js';
export type { LaunchOptions, ProcessLauncher, ProcessResult, ShellLauncherOptions } from './process.js';

export type { Aggregator, ContainsOptions, Severity, ValueCondition } from './checks.js';

export { createServices, loadConfig } from './config.js';
export type { RunnerConfig, RunnerServices } from './config.js';
