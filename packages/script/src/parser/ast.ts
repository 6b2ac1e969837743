import type { SourceLocation } from '../lexer/token.js';

interface BaseNode {
  /** Source location for error reporting */
  loc: SourceLocation | null;
}

export interface Literal extends BaseNode {
  type: 'Literal';
  value: string | number | boolean | null;
}

export interface Identifier extends BaseNode {
  type: 'Identifier';
  name: string;
}

/**
 * Property access: obj.prop or obj[expr]
 */
export interface MemberExpression extends BaseNode {
  type: 'MemberExpression';
  object: Expression;
  property: Expression;
  /** true for bracket notation obj[expr], false for dot notation obj.prop */
  computed: boolean;
}

export interface ArrayExpression extends BaseNode {
  type: 'ArrayExpression';
  elements: (Expression | SpreadElement)[];
}

export interface ObjectExpression extends BaseNode {
  type: 'ObjectExpression';
  properties: (Property | SpreadElement)[];
}

/**
 * Object property: { key: value } or { key } (shorthand)
 */
export interface Property extends BaseNode {
  type: 'Property';
  key: Identifier | Literal;
  value: Expression;
  shorthand: boolean;
}

export interface SpreadElement extends BaseNode {
  type: 'SpreadElement';
  argument: Expression;
}

export type BinaryOperator = '+' | '-' | '*' | '/' | '%' | '===' | '!==' | '>' | '>=' | '<' | '<=';

export interface BinaryExpression extends BaseNode {
  type: 'BinaryExpression';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface LogicalExpression extends BaseNode {
  type: 'LogicalExpression';
  operator: '&&' | '||';
  left: Expression;
  right: Expression;
}

export interface UnaryExpression extends BaseNode {
  type: 'UnaryExpression';
  operator: '!' | '-';
  argument: Expression;
}

/**
 * Ternary conditional: test ? consequent : alternate
 */
export interface ConditionalExpression extends BaseNode {
  type: 'ConditionalExpression';
  test: Expression;
  consequent: Expression;
  alternate: Expression;
}

/**
 * Function call: fn(arg1, arg2). Only plain names can be called.
 */
export interface CallExpression extends BaseNode {
  type: 'CallExpression';
  callee: Identifier;
  arguments: (Expression | SpreadElement)[];
}

export type Expression =
  | Literal
  | Identifier
  | MemberExpression
  | ArrayExpression
  | ObjectExpression
  | BinaryExpression
  | LogicalExpression
  | UnaryExpression
  | ConditionalExpression
  | CallExpression;

/**
 * Binding of a value to a name in the scope: name = expr
 */
export interface AssignmentStatement extends BaseNode {
  type: 'AssignmentStatement';
  target: Identifier;
  value: Expression;
}

export interface ExpressionStatement extends BaseNode {
  type: 'ExpressionStatement';
  expression: Expression;
}

export type Statement = AssignmentStatement | ExpressionStatement;

export interface Program extends BaseNode {
  type: 'Program';
  body: Statement[];
}

export type Node = Program | Statement | Expression | Property | SpreadElement;
