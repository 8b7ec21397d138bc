import { describe, expect, test } from 'vitest';
import { buildLogTargets, parseLogLevel } from '../utils/logger.js';

describe('logger', () => {
  test('rotates the log file and keeps the console to warnings', () => {
    expect(buildLogTargets('logs/loadtest.log')).toEqual([
      { target: 'pino/file', level: 'warn', options: { destination: 1 } },
      {
        target: 'pino-roll',
        level: 'trace',
        options: { file: 'logs/loadtest.log', size: '10m', limit: { count: 5 }, mkdir: true }
      }
    ]);
  });

  test('parses log levels case-insensitively', () => {
    expect(parseLogLevel(' WARN ')).toBe('warn');
    expect(parseLogLevel('loud')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
