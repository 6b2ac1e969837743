/**
 * Error types for scripts
 *
 * All errors include the script source and optional position information.
 */

import type { SourcePosition } from './lexer/token.js';

/**
 * Base class for script errors
 */
export abstract class ScriptError extends Error {
  /** The script that caused the error */
  readonly source: string;
  /** Position where the error occurred (if available) */
  readonly position: SourcePosition | null;

  constructor(message: string, source: string, position: SourcePosition | null = null) {
    const fullMessage = position
      ? `${message} at line ${position.line}, column ${position.column}`
      : message;
    super(fullMessage);
    this.name = this.constructor.name;
    this.source = source;
    this.position = position;
  }
}

/**
 * Thrown when script syntax is invalid or uses a forbidden construct
 */
export class ScriptSyntaxError extends ScriptError {}

/**
 * Thrown when a name is neither bound in the scope nor a built-in
 */
export class ScriptReferenceError extends ScriptError {}

/**
 * Thrown for type errors during evaluation (e.g. calling a non-function)
 */
export class ScriptTypeError extends ScriptError {}

/**
 * Thrown when limits are exceeded (script length, literal size)
 */
export class ScriptRangeError extends ScriptError {}
