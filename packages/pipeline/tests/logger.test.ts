import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { destination } from 'pino';
import { createLogger, silentLogger } from '../src/logger.js';

const sink = vi.hoisted(() => {
  const lines: string[] = [];
  return { lines, stream: { write: (msg: string) => void lines.push(msg) } };
});

vi.mock('pino', async importOriginal => {
  const actual = await importOriginal<typeof import('pino')>();
  return { ...actual, destination: vi.fn(() => sink.stream) };
});

describe('createLogger', () => {
  const savedLevel = process.env.MORNINGRUN_LOG_LEVEL;

  beforeEach(() => {
    sink.lines.length = 0;
    delete process.env.MORNINGRUN_LOG_LEVEL;
  });

  afterEach(() => {
    if (savedLevel === undefined) {
      delete process.env.MORNINGRUN_LOG_LEVEL;
    } else {
      process.env.MORNINGRUN_LOG_LEVEL = savedLevel;
    }
  });

  it('returns the shared silent logger for the silent level', () => {
    expect(createLogger({ level: 'silent' })).toBe(silentLogger);
  });

  it('defaults to info', () => {
    expect(createLogger({ destination: sink.stream }).level).toBe('info');
  });

  it('takes the level from MORNINGRUN_LOG_LEVEL', () => {
    process.env.MORNINGRUN_LOG_LEVEL = 'warn';

    expect(createLogger({ destination: sink.stream }).level).toBe('warn');
  });

  it('prefers an explicit level over the environment', () => {
    process.env.MORNINGRUN_LOG_LEVEL = 'warn';

    expect(createLogger({ level: 'debug', destination: sink.stream }).level).toBe('debug');
  });

  it('writes JSON lines to stderr when pretty output is off', () => {
    const logger = createLogger({ level: 'info', pretty: false });
    logger.info({ stage: 'build' }, 'stage started');
    logger.debug('not written');

    expect(destination).toHaveBeenCalledWith(2);
    expect(sink.lines).toHaveLength(1);
    expect(JSON.parse(sink.lines[0])).toMatchObject({
      level: 30,
      name: 'morningrun',
      stage: 'build',
      msg: 'stage started',
    });
  });
});
