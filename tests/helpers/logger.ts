import { vi, type Mock } from 'vitest';
import type { LoggerLike } from '../../src/types.js';

type LogMethod = (obj: unknown, msg?: string) => void;

export type LoggerMock = {
  debug: Mock<LogMethod>;
  info: Mock<LogMethod>;
  warn: Mock<LogMethod>;
  error: Mock<LogMethod>;
};

export function createLogger(): LoggerMock {
  const log = {
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>()
  };
  return log satisfies LoggerLike;
}

export function messagesOf(method: Mock<LogMethod>): Array<string | undefined> {
  return method.mock.calls.map(([, message]) => message);
}
