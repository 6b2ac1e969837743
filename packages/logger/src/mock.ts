/** Mock logger for testing */

import { vi } from 'vitest';
import type { Logger } from './types.js';

export interface MockLogger extends Logger {
  child: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  fatal: ReturnType<typeof vi.fn>;
}

/**
 * Creates a mock logger with Vitest spy functions.
 *
 * `child()` returns the same mock, so calls made through child loggers can be
 * asserted on the root.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@caserun/logger/mock';
 *
 * const logger = createMockLogger();
 * new TestCase(definition, { environment, logger }).run();
 *
 * expect(logger.info).toHaveBeenCalledWith('case_passed', expect.anything());
 * ```
 */
export function createMockLogger(): MockLogger {
  const mockLogger: MockLogger = {
    child: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  };

  mockLogger.child.mockImplementation(() => mockLogger);

  return mockLogger;
}
