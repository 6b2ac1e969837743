/**
 * Runner configuration loading
 *
 * Settings come from the process environment, falling back to the closest
 * .env file at or above the working directory.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { createLogger, type Environment, type LogFormat, type Logger, type LogLevel } from '@caserun/logger';
import { z } from 'zod';
import { DEFAULT_CALL_TARGET_KEY, type CaseSettings } from './environment.js';
import { ConfigError } from './errors.js';
import { createShellLauncher, DEFAULT_MAX_OUTPUT_BYTES, DEFAULT_SHELL, type ProcessLauncher } from './process.js';

export interface RunnerConfig {
  environment: Environment;
  logLevel?: LogLevel;
  logFormat: LogFormat;
  shell: string;
  callTargetKey: string;
  callTimeoutMs?: number;
  maxOutputBytes: number;
}

const positiveInteger = z.coerce.number().int().positive();

const configSchema = z.object({
  NODE_ENV: z.enum(['test', 'development', 'production']).default('development'),
  CASERUN_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional(),
  CASERUN_LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),
  CASERUN_SHELL: z.string().min(1).default(DEFAULT_SHELL),
  CASERUN_CALL_TARGET_KEY: z.string().min(1).default(DEFAULT_CALL_TARGET_KEY),
  CASERUN_CALL_TIMEOUT_MS: positiveInteger.optional(),
  CASERUN_MAX_OUTPUT_BYTES: positiveInteger.default(DEFAULT_MAX_OUTPUT_BYTES),
});

const CONFIG_KEYS = Object.keys(configSchema.shape);

const ENV_LINE = /^\s*([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*?)\s*$/;
const QUOTED = /^(["'])(.*)\1$/;

/**
 * `KEY=value` pairs of a .env file. Comments and other lines are ignored;
 * one pair of matching quotes around a value is dropped.
 */
export function parseDotenv(content: string): Record<string, string> {
  const pairs: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const match = ENV_LINE.exec(line);
    if (match) {
      const [, key, raw] = match;
      pairs[key] = QUOTED.exec(raw)?.[2] ?? raw;
    }
  }
  return pairs;
}

/** Path of the closest .env file in `startDir` or above it */
export function nearestDotenv(startDir: string): string | null {
  for (let dir = path.resolve(startDir); ; dir = path.dirname(dir)) {
    const candidate = path.join(dir, '.env');
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
    if (dir === path.dirname(dir)) {
      return null;
    }
  }
}

/**
 * Load runner configuration
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * Empty values count as unset.
 *
 * @throws {ConfigError} If a variable has an invalid value
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: Readonly<Record<string, string | undefined>> = process.env,
): RunnerConfig {
  const merged: Record<string, string> = {};
  const dotenv = nearestDotenv(cwd);
  const envFile = dotenv ? parseDotenv(fs.readFileSync(dotenv, 'utf-8')) : {};

  for (const key of CONFIG_KEYS) {
    const value = env[key] || envFile[key];
    if (value) {
      merged[key] = value;
    }
  }

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new ConfigError(`invalid ${issue.path.join('.')}: ${issue.message}`);
  }

  const values = result.data;
  return {
    environment: values.NODE_ENV,
    logLevel: values.CASERUN_LOG_LEVEL,
    logFormat: values.CASERUN_LOG_FORMAT,
    shell: values.CASERUN_SHELL,
    callTargetKey: values.CASERUN_CALL_TARGET_KEY,
    callTimeoutMs: values.CASERUN_CALL_TIMEOUT_MS,
    maxOutputBytes: values.CASERUN_MAX_OUTPUT_BYTES,
  };
}

export interface RunnerServices {
  logger: Logger;
  launcher: ProcessLauncher;
  settings: CaseSettings;
}

/**
 * Build the collaborators a test case takes from configuration
 */
export function createServices(config: RunnerConfig): RunnerServices {
  return {
    logger: createLogger({
      environment: config.environment,
      minLevel: config.logLevel,
      format: config.logFormat,
    }),
    launcher: createShellLauncher({
      shell: config.shell,
      timeoutMs: config.callTimeoutMs,
      maxOutputBytes: config.maxOutputBytes,
    }),
    settings: { callTargetKey: config.callTargetKey },
  };
}
