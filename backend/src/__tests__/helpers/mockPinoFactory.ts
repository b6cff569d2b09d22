/**
 * In-memory Pino logger for tests
 *
 * Services take an optional `logger`; passing `testLogger` lets a test
 * assert on what was logged.
 *
 * @example
 * ```typescript
 * const { testLogger, hasLogWithMessage } = createTestLogger();
 * const gate = new MembershipGate({ transport, requiredGroupId, logger: testLogger });
 *
 * await gate.isAuthorized(2002);
 * expect(hasLogWithMessage('Gate check failed, treating as not authorized')).toBe(true);
 * ```
 */

import pino, { Logger, Level } from 'pino';
import { Writable } from 'stream';

export type CapturedLog = Record<string, unknown> & {
  level: number;
  msg: string;
};

export interface TestLoggerResult {
  testLogger: Logger;
  logs: CapturedLog[];
  getLogsByLevel: (level: Level) => CapturedLog[];
  hasLogWithMessage: (message: string) => boolean;
}

function isCapturedLog(value: unknown): value is CapturedLog {
  return (
    typeof value === 'object' &&
    value !== null &&
    'level' in value &&
    typeof value.level === 'number' &&
    'msg' in value &&
    typeof value.msg === 'string'
  );
}

export function createTestLogger(level: Level = 'trace'): TestLoggerResult {
  const logs: CapturedLog[] = [];

  const sink = new Writable({
    write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      try {
        const entry: unknown = JSON.parse(chunk.toString());
        if (isCapturedLog(entry)) logs.push(entry);
        callback();
      } catch (err) {
        callback(err instanceof Error ? err : new Error(String(err)));
      }
    },
  });

  const testLogger = pino({ level, base: { env: 'test' } }, sink);

  return {
    testLogger,
    logs,
    getLogsByLevel: (wanted) => logs.filter((log) => log.level === pino.levels.values[wanted]),
    hasLogWithMessage: (message) => logs.some((log) => log.msg.includes(message)),
  };
}
