import { ScriptReferenceError, ScriptTypeError } from '../errors.js';
import { isScriptFunction, type FunctionRegistry } from '../functions/index.js';
import type { SourcePosition } from '../lexer/token.js';
import type {
  ArrayExpression,
  BinaryExpression,
  CallExpression,
  Expression,
  Identifier,
  MemberExpression,
  Node,
  ObjectExpression,
  Program,
  SpreadElement,
  Statement,
} from '../parser/ast.js';
import { isPlainObject, lookupProperty, toDisplayString } from '../runtime/utils.js';
import type { Scope } from '../scope.js';

type ComparisonOperator = '>' | '>=' | '<' | '<=';

function compare(operator: ComparisonOperator, left: number | string, right: number | string): boolean {
  switch (operator) {
    case '>':
      return left > right;
    case '>=':
      return left >= right;
    case '<':
      return left < right;
    case '<=':
      return left <= right;
  }
}

/**
 * Interpreter for script AST
 *
 * Names resolve against the scope first and the built-in functions second;
 * nothing else is reachable. Assignments write to the scope. Errors raised by
 * functions bound in the scope propagate unchanged.
 */
export class Interpreter {
  private functions: FunctionRegistry;
  private source: string;

  constructor(functions: FunctionRegistry = {}, source: string = '<ast>') {
    this.functions = functions;
    this.source = source;
  }

  /**
   * Run every statement in order and return the value of the last one
   */
  execute(program: Program, scope: Scope): unknown {
    let result: unknown = undefined;
    for (const statement of program.body) {
      result = this.executeStatement(statement, scope);
    }
    return result;
  }

  private executeStatement(statement: Statement, scope: Scope): unknown {
    if (statement.type === 'AssignmentStatement') {
      const value = this.evaluate(statement.value, scope);
      scope.set(statement.target.name, value);
      return value;
    }
    return this.evaluate(statement.expression, scope);
  }

  evaluate(node: Expression, scope: Scope): unknown {
    switch (node.type) {
      case 'Literal':
        return node.value;
      case 'Identifier':
        return this.evaluateIdentifier(node, scope);
      case 'MemberExpression':
        return this.evaluateMemberExpression(node, scope);
      case 'ArrayExpression':
        return this.evaluateArrayExpression(node, scope);
      case 'ObjectExpression':
        return this.evaluateObjectExpression(node, scope);
      case 'BinaryExpression':
        return this.evaluateBinaryExpression(node, scope);
      case 'LogicalExpression': {
        const left = this.evaluate(node.left, scope);
        if (node.operator === '&&') {
          return left ? this.evaluate(node.right, scope) : left;
        }
        return left ? left : this.evaluate(node.right, scope);
      }
      case 'UnaryExpression': {
        const argument = this.evaluate(node.argument, scope);
        if (node.operator === '!') return !argument;
        if (typeof argument !== 'number') {
          throw this.typeError("Unary '-' requires a number", node);
        }
        return -argument;
      }
      case 'ConditionalExpression':
        return this.evaluate(node.test, scope)
          ? this.evaluate(node.consequent, scope)
          : this.evaluate(node.alternate, scope);
      case 'CallExpression':
        return this.evaluateCallExpression(node, scope);
    }
  }

  private position(node: Node): SourcePosition | null {
    return node.loc?.start ?? null;
  }

  private typeError(message: string, node: Node): ScriptTypeError {
    return new ScriptTypeError(message, this.source, this.position(node));
  }

  private evaluateIdentifier(node: Identifier, scope: Scope): unknown {
    if (scope.has(node.name)) {
      return scope.get(node.name);
    }
    if (Object.prototype.hasOwnProperty.call(this.functions, node.name)) {
      return this.functions[node.name];
    }
    throw new ScriptReferenceError(`${node.name} is not defined`, this.source, this.position(node));
  }

  private evaluateMemberExpression(node: MemberExpression, scope: Scope): unknown {
    const object = this.evaluate(node.object, scope);

    if (object == null) {
      return undefined;
    }

    if (!node.computed) {
      if (node.property.type !== 'Identifier') {
        throw this.typeError('Expected property name', node);
      }
      return lookupProperty(object, node.property.name);
    }

    const property = this.evaluate(node.property, scope);
    if (typeof property === 'number') {
      if (Array.isArray(object) || typeof object === 'string') {
        return Number.isInteger(property) ? object[property] : undefined;
      }
      return lookupProperty(object, String(property));
    }
    if (typeof property === 'string') {
      return lookupProperty(object, property);
    }
    return undefined;
  }

  private spreadInto(target: unknown[], element: SpreadElement, scope: Scope): void {
    const spread = this.evaluate(element.argument, scope);
    if (!Array.isArray(spread)) {
      throw this.typeError('Spread argument must be an array', element);
    }
    target.push(...spread);
  }

  private evaluateList(elements: (Expression | SpreadElement)[], scope: Scope): unknown[] {
    const result: unknown[] = [];
    for (const element of elements) {
      if (element.type === 'SpreadElement') {
        this.spreadInto(result, element, scope);
      } else {
        result.push(this.evaluate(element, scope));
      }
    }
    return result;
  }

  private evaluateArrayExpression(node: ArrayExpression, scope: Scope): unknown[] {
    return this.evaluateList(node.elements, scope);
  }

  private evaluateObjectExpression(node: ObjectExpression, scope: Scope): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const prop of node.properties) {
      if (prop.type === 'SpreadElement') {
        const spread = this.evaluate(prop.argument, scope);
        if (!isPlainObject(spread)) {
          throw this.typeError('Spread argument must be an object', prop);
        }
        for (const [key, value] of Object.entries(spread)) {
          if (key !== '__proto__') result[key] = value;
        }
        continue;
      }

      const key = prop.key.type === 'Identifier' ? prop.key.name : String(prop.key.value);
      if (key === '__proto__') {
        throw this.typeError("Property name '__proto__' is not allowed", prop);
      }
      result[key] = this.evaluate(prop.value, scope);
    }

    return result;
  }

  private evaluateBinaryExpression(node: BinaryExpression, scope: Scope): unknown {
    const left = this.evaluate(node.left, scope);
    const right = this.evaluate(node.right, scope);

    switch (node.operator) {
      case '===':
        return left === right;
      case '!==':
        return left !== right;
      case '+':
        if (typeof left === 'number' && typeof right === 'number') {
          return left + right;
        }
        if (typeof left === 'string' || typeof right === 'string') {
          return toDisplayString(left) + toDisplayString(right);
        }
        throw this.typeError("Operator '+' requires numbers or a string", node);
    }

    if (node.operator === '>' || node.operator === '>=' || node.operator === '<' || node.operator === '<=') {
      if (typeof left === 'number' && typeof right === 'number') {
        return compare(node.operator, left, right);
      }
      if (typeof left === 'string' && typeof right === 'string') {
        return compare(node.operator, left, right);
      }
      throw this.typeError(`Operator '${node.operator}' requires two numbers or two strings`, node);
    }

    if (typeof left !== 'number' || typeof right !== 'number') {
      throw this.typeError(`Operator '${node.operator}' requires numbers`, node);
    }

    switch (node.operator) {
      case '-':
        return left - right;
      case '*':
        return left * right;
      case '/':
        return left / right;
      case '%':
        return left % right;
    }
  }

  private evaluateCallExpression(node: CallExpression, scope: Scope): unknown {
    const name = node.callee.name;
    const fromScope = scope.has(name);
    const func = fromScope ? scope.get(name) : this.functions[name];

    if (func === undefined && !fromScope && !Object.prototype.hasOwnProperty.call(this.functions, name)) {
      throw new ScriptReferenceError(`${name} is not defined`, this.source, this.position(node));
    }
    if (!isScriptFunction(func)) {
      throw this.typeError(`${name} is not a function`, node);
    }

    const args = this.evaluateList(node.arguments, scope);

    if (fromScope) {
      return func(...args);
    }

    try {
      return func(...args);
    } catch (error) {
      if (error instanceof TypeError) {
        throw this.typeError(error.message, node);
      }
      throw error;
    }
  }
}
