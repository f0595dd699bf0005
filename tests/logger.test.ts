import { describe, it, expect } from 'vitest';
import { createLogger, resolveLogLevel } from '../src/logger.js';

describe('logger', () => {
  it('writes prefixed lines at or above the level', () => {
    const lines: string[] = [];
    const log = createLogger('warn', (line) => lines.push(line));

    log.info('ignored');
    log.warn('Mail is slow', { attempt: 2 });
    log.error('gave up');

    expect(lines).toEqual([
      '[apple-mail-mcp] WARN Mail is slow {"attempt":2}',
      '[apple-mail-mcp] ERROR gave up',
    ]);
  });

  it('resolves levels from the environment value', () => {
    expect(resolveLogLevel(' DEBUG ')).toBe('debug');
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('verbose')).toBe('info');
    expect(resolveLogLevel('constructor')).toBe('info');
  });
});
