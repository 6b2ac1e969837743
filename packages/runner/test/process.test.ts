import type { SpawnSyncReturns } from 'node:child_process';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { CallError, InterruptError } from '../src/errors.js';
import { createShellLauncher, signalExitCode } from '../src/process.js';

function spawnResult(overrides: Partial<SpawnSyncReturns<string>>): SpawnSyncReturns<string> {
  return {
    pid: 1234,
    output: [null, '', ''],
    stdout: '',
    stderr: '',
    status: 0,
    signal: null,
    ...overrides,
  };
}

describe('createShellLauncher', () => {
  it('merges stderr into stdout and reports the exit code', () => {
    const launcher = createShellLauncher();
    const result = launcher.run("printf 'out\\n'; printf 'err\\n' >&2; exit 3");
    expect(result).toEqual({ exitCode: 3, output: 'out\nerr\n' });
  });

  it('runs in the given directory', () => {
    const launcher = createShellLauncher();
    const dir = os.tmpdir();
    const result = launcher.run('pwd -P', { cwd: dir });
    expect(result.exitCode).toBe(0);
    expect(path.basename(result.output.trim())).toBe(path.basename(dir));
  });

  it('raises a CallError when the command cannot start', () => {
    const launcher = createShellLauncher();
    expect(() => launcher.run('true', { cwd: path.join(os.tmpdir(), 'caserun-missing-dir', 'nested') })).toThrow(
      CallError,
    );
  });

  it('passes shell, timeout and buffer settings to spawn', () => {
    const spawn = vi.fn(() => spawnResult({ stdout: 'ok' }));
    const launcher = createShellLauncher({ shell: '/bin/bash', timeoutMs: 500, maxOutputBytes: 64, spawn });

    expect(launcher.run('echo ok', { cwd: '/srv' })).toEqual({ exitCode: 0, output: 'ok' });
    expect(spawn).toHaveBeenCalledWith('/bin/bash', ['-c', 'exec 2>&1\necho ok'], {
      cwd: '/srv',
      encoding: 'utf8',
      maxBuffer: 64,
      timeout: 500,
    });
  });

  it('maps a killing signal to a shell-style exit code', () => {
    const spawn = vi.fn(() => spawnResult({ status: null, signal: 'SIGTERM', stdout: 'partial' }));
    const launcher = createShellLauncher({ spawn });

    expect(launcher.run('sleep 10')).toEqual({ exitCode: 143, output: 'partial' });
    expect(signalExitCode('SIGKILL')).toBe(137);
  });

  it('raises an InterruptError on SIGINT', () => {
    const spawn = vi.fn(() => spawnResult({ status: null, signal: 'SIGINT' }));
    expect(() => createShellLauncher({ spawn }).run('sleep 10')).toThrow(InterruptError);
  });

  it('wraps spawn errors', () => {
    const spawn = vi.fn(() => spawnResult({ status: null, error: new Error('spawnSync /bin/sh ETIMEDOUT') }));
    expect(() => createShellLauncher({ spawn }).run('sleep 10')).toThrow(
      'could not run command: spawnSync /bin/sh ETIMEDOUT',
    );
  });
});
