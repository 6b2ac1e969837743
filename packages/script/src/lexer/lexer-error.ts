import type { SourcePosition } from './token.js';

/**
 * Error thrown during lexical analysis
 */
export class LexerError extends Error {
  /** The script that failed to tokenize */
  readonly source: string;
  readonly position: SourcePosition;
  /** The message without position information */
  readonly reason: string;

  constructor(message: string, source: string, position: SourcePosition) {
    super(`${message} at line ${position.line}, column ${position.column}`);
    this.name = 'LexerError';
    this.source = source;
    this.position = position;
    this.reason = message;
  }
}
