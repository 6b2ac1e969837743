export { Lexer } from './lexer.js';
export { LexerError } from './lexer-error.js';
export { TokenType } from './token-types.js';
export type { SourceLocation, SourcePosition, Token } from './token.js';
