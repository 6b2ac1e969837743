/**
 * @caserun/script
 *
 * Sandboxed scripting for the `code` directive. A script is a list of
 * assignments and expressions evaluated against a scope; there is no access
 * to globals, prototypes, modules or the host process.
 */

import { ScriptRangeError, ScriptSyntaxError } from './errors.js';
import { builtinFunctions, type FunctionRegistry } from './functions/index.js';
import { Interpreter } from './interpreter/interpreter.js';
import { LexerError } from './lexer/lexer-error.js';
import type { Expression, Program, SpreadElement } from './parser/ast.js';
import { Parser } from './parser/parser.js';
import { ParserError } from './parser/parser-error.js';
import type { Scope } from './scope.js';

export {
  ScriptError,
  ScriptRangeError,
  ScriptReferenceError,
  ScriptSyntaxError,
  ScriptTypeError,
} from './errors.js';
export { createScope, type Scope } from './scope.js';
export { builtinFunctions, type FunctionRegistry, type ScriptFunction } from './functions/index.js';
export type { Program, Statement, Expression } from './parser/ast.js';

/**
 * Default limits for scripts
 */
export const DEFAULT_LIMITS = {
  /** Maximum script length in characters */
  maxScriptLength: 10_000,
  /** Maximum string literal length in characters */
  maxStringLength: 10_000,
  /** Maximum elements in array/object literals */
  maxLiteralSize: 1_000,
} as const;

export type ScriptLimits = { [K in keyof typeof DEFAULT_LIMITS]: number };

export interface ScriptOptions {
  /** Functions added to (or overriding) the built-ins */
  functions?: FunctionRegistry;
  /** Override default limits (set to Infinity to disable) */
  limits?: Partial<ScriptLimits>;
}

/**
 * Parsed script that can be run against any number of scopes
 */
export interface CompiledScript {
  readonly source: string;
  run(scope: Scope): unknown;
}

function validateExpressionLimits(
  node: Expression | SpreadElement,
  source: string,
  limits: ScriptLimits,
): void {
  switch (node.type) {
    case 'Literal':
      if (typeof node.value === 'string' && node.value.length > limits.maxStringLength) {
        throw new ScriptRangeError(
          `String literal exceeds maximum length of ${limits.maxStringLength} characters`,
          source,
          node.loc?.start ?? null,
        );
      }
      break;

    case 'SpreadElement':
      validateExpressionLimits(node.argument, source, limits);
      break;

    case 'ArrayExpression':
      if (node.elements.length > limits.maxLiteralSize) {
        throw new ScriptRangeError(
          `Array literal exceeds maximum size of ${limits.maxLiteralSize} elements`,
          source,
          node.loc?.start ?? null,
        );
      }
      for (const element of node.elements) {
        validateExpressionLimits(element, source, limits);
      }
      break;

    case 'ObjectExpression':
      if (node.properties.length > limits.maxLiteralSize) {
        throw new ScriptRangeError(
          `Object literal exceeds maximum size of ${limits.maxLiteralSize} properties`,
          source,
          node.loc?.start ?? null,
        );
      }
      for (const prop of node.properties) {
        validateExpressionLimits(prop.type === 'SpreadElement' ? prop : prop.value, source, limits);
      }
      break;

    case 'BinaryExpression':
    case 'LogicalExpression':
      validateExpressionLimits(node.left, source, limits);
      validateExpressionLimits(node.right, source, limits);
      break;

    case 'UnaryExpression':
      validateExpressionLimits(node.argument, source, limits);
      break;

    case 'ConditionalExpression':
      validateExpressionLimits(node.test, source, limits);
      validateExpressionLimits(node.consequent, source, limits);
      validateExpressionLimits(node.alternate, source, limits);
      break;

    case 'MemberExpression':
      validateExpressionLimits(node.object, source, limits);
      if (node.computed) {
        validateExpressionLimits(node.property, source, limits);
      }
      break;

    case 'CallExpression':
      for (const arg of node.arguments) {
        validateExpressionLimits(arg, source, limits);
      }
      break;

    case 'Identifier':
      break;
  }
}

function validateAstLimits(program: Program, source: string, limits: ScriptLimits): void {
  for (const statement of program.body) {
    validateExpressionLimits(
      statement.type === 'AssignmentStatement' ? statement.value : statement.expression,
      source,
      limits,
    );
  }
}

/**
 * Parse a script into its statement list
 *
 * @throws {ScriptSyntaxError} If the script has invalid syntax
 * @throws {ScriptRangeError} If the script exceeds a limit
 */
export function parseScript(source: string, options: ScriptOptions = {}): Program {
  const limits: ScriptLimits = { ...DEFAULT_LIMITS, ...options.limits };

  if (source.length > limits.maxScriptLength) {
    throw new ScriptRangeError(
      `Script exceeds maximum length of ${limits.maxScriptLength} characters`,
      source,
    );
  }

  let program: Program;
  try {
    program = new Parser().parse(source);
  } catch (error) {
    if (error instanceof LexerError || error instanceof ParserError) {
      throw new ScriptSyntaxError(error.reason, source, error.position);
    }
    throw error;
  }

  validateAstLimits(program, source, limits);
  return program;
}

/**
 * Compile a script once for repeated runs
 *
 * @example
 * ```ts
 * const script = compileScript('total = total + 1');
 * const scope = createScope({ total: 0 });
 * script.run(scope);
 * scope.get('total') // => 1
 * ```
 */
export function compileScript(source: string, options: ScriptOptions = {}): CompiledScript {
  const program = parseScript(source, options);
  const interpreter = new Interpreter({ ...builtinFunctions, ...options.functions }, source);

  return {
    source,
    run(scope: Scope): unknown {
      return interpreter.execute(program, scope);
    },
  };
}

/**
 * Run a script against a scope and return the value of its last statement
 *
 * Assignments write through to the scope. Functions bound in the scope can be
 * called by name; whatever they throw propagates to the caller unchanged.
 *
 * @throws {ScriptSyntaxError} If the script has invalid syntax
 * @throws {ScriptReferenceError} If a name is not bound
 * @throws {ScriptTypeError} If a value has the wrong type for an operation
 */
export function runScript(source: string, scope: Scope, options: ScriptOptions = {}): unknown {
  return compileScript(source, options).run(scope);
}
