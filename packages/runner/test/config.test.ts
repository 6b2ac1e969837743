import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createServices, loadConfig, nearestDotenv, parseDotenv } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('parseDotenv', () => {
  it('reads keys, strips quotes and skips comments', () => {
    const content = ['# settings', 'CASERUN_SHELL="/bin/bash"', "NODE_ENV='test'", 'not a pair', '', 'EMPTY='].join(
      '\n',
    );
    expect(parseDotenv(content)).toEqual({ CASERUN_SHELL: '/bin/bash', NODE_ENV: 'test', EMPTY: '' });
  });
});

describe('loadConfig', () => {
  let root: string;
  let nested: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'caserun-config-'));
    nested = path.join(root, 'suite', 'cases');
    fs.mkdirSync(nested, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('uses defaults without a .env file or variables', () => {
    expect(nearestDotenv(nested)).toBeNull();
    expect(loadConfig(nested, {})).toEqual({
      environment: 'development',
      logLevel: undefined,
      logFormat: 'json',
      shell: '/bin/sh',
      callTargetKey: 'target',
      callTimeoutMs: undefined,
      maxOutputBytes: 16 * 1024 * 1024,
    });
  });

  it('finds the nearest .env file above the start directory', () => {
    fs.writeFileSync(path.join(root, '.env'), 'CASERUN_CALL_TARGET_KEY=artifact\nCASERUN_CALL_TIMEOUT_MS=2500\n');
    expect(nearestDotenv(nested)).toBe(path.join(root, '.env'));
    const config = loadConfig(nested, {});
    expect(config.callTargetKey).toBe('artifact');
    expect(config.callTimeoutMs).toBe(2500);
  });

  it('prefers process variables and ignores empty ones', () => {
    fs.writeFileSync(path.join(root, '.env'), 'CASERUN_LOG_LEVEL=warn\nCASERUN_SHELL=/bin/bash\n');
    const config = loadConfig(nested, { CASERUN_LOG_LEVEL: 'debug', CASERUN_SHELL: '' });
    expect(config.logLevel).toBe('debug');
    expect(config.shell).toBe('/bin/bash');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig(nested, { CASERUN_LOG_FORMAT: 'xml' })).toThrow(ConfigError);
    expect(() => loadConfig(nested, { CASERUN_MAX_OUTPUT_BYTES: '-1' })).toThrow(/^invalid CASERUN_MAX_OUTPUT_BYTES: /);
  });
});

describe('createServices', () => {
  it('passes the call target key through as a setting', () => {
    const services = createServices(loadConfig(os.tmpdir(), { CASERUN_CALL_TARGET_KEY: 'artifact', NODE_ENV: 'test' }));
    expect(services.settings).toEqual({ callTargetKey: 'artifact' });
    expect(typeof services.launcher.run).toBe('function');
  });
});
