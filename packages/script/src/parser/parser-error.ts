import type { SourcePosition } from '../lexer/token.js';

/**
 * Error thrown during parsing
 */
export class ParserError extends Error {
  /** The script that failed to parse */
  readonly source: string;
  readonly position: SourcePosition | null;
  /** The message without position information */
  readonly reason: string;

  constructor(message: string, source: string, position: SourcePosition | null) {
    const fullMessage = position
      ? `${message} at line ${position.line}, column ${position.column}`
      : message;
    super(fullMessage);
    this.name = 'ParserError';
    this.source = source;
    this.position = position;
    this.reason = message;
  }
}
