import type { TokenType } from './token-types.js';

/**
 * Source position for error reporting
 */
export interface SourcePosition {
  /** 1-based line number */
  line: number;
  /** 0-based column number */
  column: number;
  /** 0-based character offset from start of input */
  offset: number;
}

export interface SourceLocation {
  start: SourcePosition;
  end: SourcePosition;
}

export interface Token {
  type: TokenType;
  /** The raw string value from the source (decoded for strings) */
  value: string;
  loc: SourceLocation;
}
