/**
 * Token types for the script lexer
 */

export const TokenType = {
  // Literals
  STRING: 'STRING', // 'hello' or "world"
  NUMBER: 'NUMBER', // 42, 3.14
  BOOLEAN: 'BOOLEAN', // true, false
  NULL: 'NULL', // null

  IDENTIFIER: 'IDENTIFIER', // output, testcase_num

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %

  // Comparison operators
  EQ: 'EQ', // ===
  NEQ: 'NEQ', // !==
  GT: 'GT', // >
  GTE: 'GTE', // >=
  LT: 'LT', // <
  LTE: 'LTE', // <=

  // Logical operators
  AND: 'AND', // &&
  OR: 'OR', // ||
  NOT: 'NOT', // !

  ASSIGN: 'ASSIGN', // =

  // Punctuation
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  COMMA: 'COMMA', // ,
  COLON: 'COLON', // :
  DOT: 'DOT', // .
  QUESTION: 'QUESTION', // ?
  SPREAD: 'SPREAD', // ...

  // Statement separators
  SEMICOLON: 'SEMICOLON', // ;
  NEWLINE: 'NEWLINE', // line break outside of brackets

  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];
