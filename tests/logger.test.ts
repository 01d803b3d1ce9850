import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';
import { createLogger, logger } from '../src/utils/logger';

describe('Logger', () => {
  const originalEnv = process.env;
  let consoleLogSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    process.env = { ...originalEnv };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('Console output', () => {
    it('SHOULD write level and message outside the test environment', () => {
      process.env.NODE_ENV = 'production';

      logger.warn('warn message');

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy.mock.calls[0][0]).toMatch(
        /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[WARN\] warn message$/
      );
    });

    it('SHOULD stay silent in the test environment', () => {
      process.env.NODE_ENV = 'test';

      logger.info('test message');

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe('Log levels', () => {
    beforeEach(() => {
      process.env.NODE_ENV = 'production';
    });

    it('SHOULD tag each level', () => {
      logger.info('a');
      logger.error('b');
      logger.debug('c');

      expect(consoleLogSpy.mock.calls.map(call => String(call[0]).replace(/^\[[^\]]+\] /, ''))).toEqual([
        '[INFO] a',
        '[ERROR] b',
        '[DEBUG] c',
      ]);
    });
  });

  describe('Logger with project context', () => {
    it('SHOULD keep metadata out of console output', () => {
      process.env.NODE_ENV = 'production';
      const projectLogger = createLogger({ root: '/tmp/project' });

      projectLogger.info('scanning', { files: 3 });

      expect(String(consoleLogSpy.mock.calls[0][0])).toMatch(/\[INFO\] scanning$/);
    });
  });
});
