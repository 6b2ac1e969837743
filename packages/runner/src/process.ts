/**
 * External process execution
 *
 * Commands run synchronously in a subshell with stderr merged into stdout.
 */

import { spawnSync, type SpawnSyncOptionsWithStringEncoding, type SpawnSyncReturns } from 'node:child_process';
import { constants } from 'node:os';
import { CallError, InterruptError } from './errors.js';

export const DEFAULT_SHELL = '/bin/sh';
export const DEFAULT_MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export interface ProcessResult {
  exitCode: number;
  output: string;
}

export interface LaunchOptions {
  cwd?: string;
}

export interface ProcessLauncher {
  /**
   * Run `command` to completion.
   *
   * @throws {CallError} If the command could not be run at all
   * @throws {InterruptError} If the command was interrupted
   */
  run(command: string, options?: LaunchOptions): ProcessResult;
}

type SpawnFn = (
  file: string,
  args: readonly string[],
  options: SpawnSyncOptionsWithStringEncoding,
) => SpawnSyncReturns<string>;

export interface ShellLauncherOptions {
  shell?: string;
  /** Kill the command after this many milliseconds */
  timeoutMs?: number;
  maxOutputBytes?: number;
  spawn?: SpawnFn;
}

/**
 * Exit code reported for a command killed by `signal`, as a shell reports it
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + constants.signals[signal];
}

export function createShellLauncher(options: ShellLauncherOptions = {}): ProcessLauncher {
  const shell = options.shell ?? DEFAULT_SHELL;
  const spawn: SpawnFn = options.spawn ?? spawnSync;

  return {
    run(command, { cwd } = {}) {
      const result = spawn(shell, ['-c', `exec 2>&1\n${command}`], {
        cwd,
        encoding: 'utf8',
        maxBuffer: options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES,
        timeout: options.timeoutMs,
      });

      if (result.error) {
        throw new CallError(`could not run command: ${result.error.message}`);
      }
      if (result.signal === 'SIGINT') {
        throw new InterruptError();
      }

      const exitCode = result.status ?? (result.signal ? signalExitCode(result.signal) : 1);
      return { exitCode, output: result.stdout };
    },
  };
}
