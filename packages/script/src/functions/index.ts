/**
 * Built-in function registry for scripts
 */

import * as stringFunctions from './string.js';
import * as valueFunctions from './value.js';

export type ScriptFunction = (...args: unknown[]) => unknown;
export type FunctionRegistry = Record<string, ScriptFunction>;

export const builtinFunctions: FunctionRegistry = {
  length: valueFunctions.length,
  includes: valueFunctions.includes,
  string: valueFunctions.string,
  number: valueFunctions.number,

  upper: stringFunctions.upper,
  lower: stringFunctions.lower,
  trim: stringFunctions.trim,
  split: stringFunctions.split,
  join: stringFunctions.join,
  startsWith: stringFunctions.startsWith,
  endsWith: stringFunctions.endsWith,
  replace: stringFunctions.replace,
  matches: stringFunctions.matches,
};

export function isScriptFunction(value: unknown): value is ScriptFunction {
  return typeof value === 'function';
}
