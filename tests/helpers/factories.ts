/**
 * Test factories for creating test data.
 */

import { vi } from 'vitest';
import type { Detection, DeliveryRequest, Logger } from '../../src/types/index.js';
import type { Storage } from '../../src/storage/index.js';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export type MockLogger = Logger & {
  calls: Record<LogLevel, unknown[][]>;
  reset: () => void;
};

/**
 * Create a mock logger that captures all log calls.
 */
export function createMockLogger(): MockLogger {
  const calls: Record<LogLevel, unknown[][]> = {
    trace: [],
    debug: [],
    info: [],
    warn: [],
    error: [],
  };

  const logger = {
    trace: vi.fn((...args: unknown[]) => calls.trace.push(args)),
    debug: vi.fn((...args: unknown[]) => calls.debug.push(args)),
    info: vi.fn((...args: unknown[]) => calls.info.push(args)),
    warn: vi.fn((...args: unknown[]) => calls.warn.push(args)),
    error: vi.fn((...args: unknown[]) => calls.error.push(args)),
    child: () => logger,
    calls,
    reset: () => {
      calls.trace = [];
      calls.debug = [];
      calls.info = [];
      calls.warn = [];
      calls.error = [];
      vi.clearAllMocks();
    },
  };

  return logger as MockLogger;
}

/**
 * Messages logged at a level, in order.
 */
export function loggedMessages(logger: MockLogger, level: LogLevel): string[] {
  return logger.calls[level].map((args) => {
    const last = args[args.length - 1];
    return typeof last === 'string' ? last : '';
  });
}

export const TEST_TAG_ID = '900263003496836';

/**
 * Create a detection with sensible defaults.
 */
export function createDetection(overrides: Partial<Detection> = {}): Detection {
  return {
    tagId: TEST_TAG_ID,
    timestamp: 0,
    artifactPaths: [],
    ...overrides,
  };
}

export function createUploadRequest(
  artifactPath = '/photos/test.jpg',
  destination = 'remote:rfid_photos'
): DeliveryRequest {
  return { kind: 'upload', destination, payload: { artifactPath } };
}

export function createNotificationRequest(
  text = 'Pet detected',
  destination = '1001'
): DeliveryRequest {
  return { kind: 'notification', destination, payload: { tagId: TEST_TAG_ID, text } };
}

/**
 * In-memory Storage backed by a Map. Values are cloned on the way in
 * and out, like a round trip through JSON.
 */
export function createMemoryStorage(): Storage & { data: Map<string, unknown> } {
  const data = new Map<string, unknown>();
  return {
    data,
    load: vi.fn((key: string) => Promise.resolve(data.has(key) ? structuredClone(data.get(key)) : null)),
    save: vi.fn((key: string, value: unknown) => {
      data.set(key, structuredClone(value));
      return Promise.resolve();
    }),
    delete: vi.fn((key: string) => Promise.resolve(data.delete(key))),
    exists: vi.fn((key: string) => Promise.resolve(data.has(key))),
  };
}
