export type {
  ArrayExpression,
  AssignmentStatement,
  BinaryExpression,
  BinaryOperator,
  CallExpression,
  ConditionalExpression,
  Expression,
  ExpressionStatement,
  Identifier,
  Literal,
  LogicalExpression,
  MemberExpression,
  Node,
  ObjectExpression,
  Program,
  Property,
  SpreadElement,
  Statement,
  UnaryExpression,
} from './ast.js';
export { Parser } from './parser.js';
export { ParserError } from './parser-error.js';
