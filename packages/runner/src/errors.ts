/**
 * Error types for case execution
 */

/**
 * Base class for errors raised by the case engine
 */
export class CaseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Malformed case definition: bad directive entry or argument block.
 * Surfaces as an unhandled fault of the stage it occurs in.
 */
export class ConfigError extends CaseError {}

export class UnknownDirectiveError extends ConfigError {
  readonly directive: string;

  constructor(directive: string) {
    super(`unknown directive: ${directive}`);
    this.directive = directive;
  }
}

/**
 * A call target could not be resolved or its command could not be launched.
 * A command that runs and exits non-zero is not a CallError.
 */
export class CallError extends CaseError {}

/**
 * The running command was interrupted. Propagates out of `TestCase.run()`.
 */
export class InterruptError extends CaseError {
  constructor(message: string = 'keyboard interrupt detected') {
    super(message);
  }
}

/**
 * Unwinds the current stage after a failed assertion.
 *
 * Carries no report of its own: the failure was recorded when the assertion
 * failed. Only the stage driver catches it.
 */
export class StageAbort extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StageAbort';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
