import { createLogger, createMemorySink, type MemorySink } from '@caserun/logger';
import { vi } from 'vitest';
import { createStaticEnvironment, type StaticEnvironmentOptions } from '../src/environment.js';
import type { LaunchOptions, ProcessResult } from '../src/process.js';
import { TestCase, type CaseDefinition, type TestCaseOptions } from '../src/test-case.js';

export type Responder = (command: string, options?: LaunchOptions) => ProcessResult;

/**
 * In-process stand-in for the shell launcher
 */
export function createFakeLauncher(respond: Responder = () => ({ exitCode: 0, output: '' })) {
  return { run: vi.fn<Responder>(respond) };
}

export type FakeLauncher = ReturnType<typeof createFakeLauncher>;

/** Responds by command line; unknown commands exit 127 */
export function respondWith(table: Record<string, ProcessResult>): Responder {
  return (command) => table[command] ?? { exitCode: 127, output: `sh: ${command}: not found\n` };
}

export const DEFAULT_TARGETS: StaticEnvironmentOptions['targets'] = {
  ok: { command: 'run-ok' },
  broken: { command: 'run-broken' },
  build: { command: 'make build', cwd: '/work/project' },
};

export interface CaseFixture {
  testCase: TestCase;
  launcher: FakeLauncher;
  sink: MemorySink;
}

export interface FixtureOptions extends Partial<Omit<TestCaseOptions, 'environment' | 'launcher' | 'logger'>> {
  environment?: StaticEnvironmentOptions;
  respond?: Responder;
}

export function createCase(definition: Partial<CaseDefinition>, options: FixtureOptions = {}): CaseFixture {
  const { environment, respond, ...rest } = options;
  const sink = createMemorySink();
  const launcher = createFakeLauncher(respond);
  const testCase = new TestCase(
    { index: 1, label: 'sample', ...definition },
    {
      environment: createStaticEnvironment({ targets: DEFAULT_TARGETS, ...environment }),
      logger: createLogger({ sink, environment: 'test' }),
      launcher,
      generateId: () => 'uuid-0001',
      processEnv: {},
      ...rest,
    },
  );
  return { testCase, launcher, sink };
}

/** Messages of the entries logged under `eventType`, in order */
export function messagesOf(sink: MemorySink, eventType: string): (string | undefined)[] {
  return sink.entries.filter((entry) => entry.event_type === eventType).map((entry) => entry.message);
}
