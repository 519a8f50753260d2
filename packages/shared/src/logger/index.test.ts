import { describe, expect, it } from 'vitest';
import { createLogger, createSilentLogger, type LogEntry } from './index.ts';

const FIXED_NOW = () => '2026-01-01T00:00:00.000Z';

describe('createLogger', () => {
  it('writes structured entry with level and merged context', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({
      baseContext: { module: 'data-pipeline' },
      now: FIXED_NOW,
      writer: (entry) => entries.push(entry),
    });

    logger.info('staging finished', { stagedMessages: 12 });

    expect(entries).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        level: 'info',
        message: 'staging finished',
        context: {
          module: 'data-pipeline',
          stagedMessages: 12,
        },
      },
    ]);
  });

  it('supports withContext for child loggers', () => {
    const entries: LogEntry[] = [];
    const root = createLogger({
      baseContext: { app: 'warehouse' },
      now: FIXED_NOW,
      writer: (entry) => entries.push(entry),
    });

    root.withContext({ runId: 'run-1' }).warning('detection skipped', { recordIndex: 2 });

    expect(entries).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        level: 'warning',
        message: 'detection skipped',
        context: {
          app: 'warehouse',
          runId: 'run-1',
          recordIndex: 2,
        },
      },
    ]);
  });

  it('exposes all level helpers', () => {
    const levels: string[] = [];
    const logger = createLogger({
      now: FIXED_NOW,
      writer: (entry) => levels.push(entry.level),
    });

    logger.debug('d');
    logger.info('i');
    logger.warning('w');
    logger.error('e');
    logger.fatal('f');

    expect(levels).toEqual(['debug', 'info', 'warning', 'error', 'fatal']);
  });

  it('drops entries below minLevel, including in child loggers', () => {
    const levels: string[] = [];
    const logger = createLogger({
      now: FIXED_NOW,
      minLevel: 'warning',
      writer: (entry) => levels.push(entry.level),
    });

    logger.debug('d');
    logger.info('i');
    logger.withContext({ stage: 'facts' }).info('child info');
    logger.warning('w');
    logger.withContext({ stage: 'facts' }).error('child error');

    expect(levels).toEqual(['warning', 'error']);
  });

  it('silent logger never writes', () => {
    const logger = createSilentLogger();
    expect(() => logger.fatal('ignored')).not.toThrow();
  });
});
