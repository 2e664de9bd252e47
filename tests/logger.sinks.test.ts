import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { logger, type LogEntry } from '../src/infra/logger';

describe('logger sinks', () => {
  const initialLevel = logger.getLevel();
  let lines: string[];
  let entries: LogEntry[];

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_700_000_000_000);
    lines = [];
    entries = [];
    logger.setSink((entry, formatted) => {
      entries.push(entry);
      lines.push(formatted);
    });
    logger.setLevel('info');
  });

  afterEach(() => {
    logger.resetSinkToConsole();
    logger.setLevel(initialLevel);
    vi.useRealTimers();
  });

  it('formats entries with an ISO timestamp and level', () => {
    logger.info('hello');
    expect(lines).toEqual(['[2023-11-14T22:13:20.000Z] INFO: hello']);
    expect(entries[0]).toEqual({ level: 'info', ts: 1_700_000_000_000, iso: '2023-11-14T22:13:20.000Z', message: 'hello' });
  });

  it('filters below the configured level', () => {
    logger.debug('hidden');
    logger.warn('shown');
    expect(entries.map((entry) => entry.level)).toEqual(['warn']);
    expect(logger.isEnabled('debug')).toBe(false);

    logger.setLevel('debug');
    logger.debug('now visible');
    expect(entries.map((entry) => entry.message)).toEqual(['shown', 'now visible']);
  });

  it('appends the error stack head to error messages', () => {
    logger.error('request failed', new Error('boom'));
    const [first, second] = (entries[0]?.message ?? '').split('\n');
    expect(first).toBe('request failed');
    expect(second).toBe('Error: boom');
  });

  it('keeps logging when one sink throws', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const flushed: string[] = [];
    logger.setSinks([
      {
        kind: 'custom',
        write: () => {
          throw new Error('disk full');
        },
      },
      {
        kind: 'memory',
        write: (_entry, formatted) => {
          lines.push(formatted);
        },
        flush: () => {
          flushed.push('memory');
        },
      },
    ]);

    expect(() => logger.warn('still here')).not.toThrow();
    expect(lines).toEqual(['[2023-11-14T22:13:20.000Z] WARN: still here']);
    expect(consoleError).toHaveBeenCalledWith('[Logger] custom sink failed: disk full');
    await logger.flush();
    expect(flushed).toEqual(['memory']);
  });
});
