/**
 * Argument adapters: declarative argument blocks to call arguments
 */

import { z } from 'zod';
import type { ArgumentAdapter } from './dispatch.js';
import type { ContainsOptions } from './checks.js';
import { ConfigError } from './errors.js';
import { lookupLiteralOrVariable, resolveVariableOrLiteral, type SymbolTable } from './symbols.js';

/**
 * What adapters read from and write to
 */
export interface AdapterContext {
  readonly symbols: SymbolTable;
  readonly callTargetKey: string;
  uuid(): string;
  env(name: string): string;
}

/**
 * Validate `block` against `schema`, reporting issues as a ConfigError
 */
export function parseBlock<S extends z.ZodTypeAny>(directive: string, schema: S, block: unknown): z.infer<S> {
  const result = schema.safeParse(block);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigError(`invalid arguments for "${directive}": ${issues}`);
  }
  return result.data;
}

const callOptionsSchema = z
  .object({
    args: z.array(z.unknown()).optional(),
    params: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

const formatArgsSchema = z.union([z.string(), z.array(z.unknown())]).nullish();

const uuidSchema = z.string().min(1);

const envSchema = z
  .object({
    variable: z.string().min(1),
    name: z.string().min(1),
  })
  .strict();

const extractMatchSchema = z
  .object({
    pattern: z.string().min(1),
    variable: z.string().min(1).optional(),
    groups: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict()
  .refine((block) => (block.variable === undefined) !== (block.groups === undefined), {
    message: 'exactly one of "variable" or "groups" is required',
  });

const containsOptionsSchema = z
  .object({
    message: z.string().optional(),
    case_sensitive: z.boolean().optional(),
  })
  .strict();

const codeSchema = z.string();

function isOptionsEntry(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !('variable' in value) &&
    !('literal' in value)
  );
}

/**
 * Adapters for every declarative directive
 */
export function createAdapters(context: AdapterContext) {
  const { symbols } = context;

  /**
   * `{ <target key>: name, args?: [...], params?: {...} }` to
   * `[target, args, params]`
   */
  function call(directive: string): ArgumentAdapter {
    return (block) => {
      const fields = parseBlock(directive, z.record(z.string(), z.unknown()), block);
      const key = context.callTargetKey;
      const target = fields[key];
      if (typeof target !== 'string' || target === '') {
        throw new ConfigError(`when calling artifacts, the argument block must contain "${key}: TARGET"`);
      }

      const rest = Object.fromEntries(Object.entries(fields).filter(([name]) => name !== key));
      const options = parseBlock(directive, callOptionsSchema, rest);
      const args = (options.args ?? []).map((entry) => resolveVariableOrLiteral(symbols, entry));
      const params: Record<string, unknown> = {};
      for (const [name, entry] of Object.entries(options.params ?? {})) {
        params[name] = resolveVariableOrLiteral(symbols, entry);
      }
      return [target, args, params];
    };
  }

  /**
   * Format string followed by symbol names or literals.
   * A bare string is a format string without arguments.
   */
  function formatArgs(directive: string): ArgumentAdapter {
    return (block) => {
      const parts = parseBlock(directive, formatArgsSchema, block);
      if (parts === null || parts === undefined || parts.length === 0) {
        return [];
      }
      if (typeof parts === 'string') {
        return [parts];
      }
      const [template, ...names] = parts;
      if (typeof template !== 'string') {
        throw new ConfigError('the first element of a format list must be a string');
      }
      return [template, ...names.map((name) => lookupLiteralOrVariable(symbols, name))];
    };
  }

  /** Bind a fresh UUID to the named symbol */
  const uuid: ArgumentAdapter = (block) => {
    const name = parseBlock('uuid', uuidSchema, block);
    symbols.set(name, context.uuid());
    return null;
  };

  /** Bind an environment variable: `{ variable: symbol, name: ENV_VAR }` */
  const env: ArgumentAdapter = (block) => {
    const { variable, name } = parseBlock('env', envSchema, block);
    symbols.set(variable, context.env(name));
    return null;
  };

  const extractMatch: ArgumentAdapter = (block) => {
    const { pattern, variable, groups } = parseBlock('extract_match', extractMatchSchema, block);
    return [pattern, variable ?? null, groups ?? null];
  };

  /**
   * Variable-or-literal entries, optionally preceded by an options mapping.
   * Options travel as the trailing argument.
   */
  function contains(directive: string): ArgumentAdapter {
    return (block) => {
      const parts = parseBlock(directive, z.array(z.unknown()), block);
      let options: ContainsOptions = {};
      let entries = parts;
      if (parts.length > 0 && isOptionsEntry(parts[0])) {
        options = parseBlock(directive, containsOptionsSchema, parts[0]);
        entries = parts.slice(1);
      }
      const values = entries.map((entry) => resolveVariableOrLiteral(symbols, entry));
      return [...values, { message: options.message ?? '', case_sensitive: options.case_sensitive ?? false }];
    };
  }

  const code: ArgumentAdapter = (block) => [parseBlock('code', codeSchema, block)];

  return { call, formatArgs, uuid, env, extractMatch, contains, code };
}
