/**
 * Unit tests for the structured logger
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createLogger, isLogLevel, serializeError, type LogSink } from '../logger.js';

describe('createLogger', () => {
  let lines: string[];
  let sink: LogSink;

  const entries = (): unknown[] => lines.map((line) => JSON.parse(line));

  beforeEach(() => {
    lines = [];
    sink = { write: (chunk) => lines.push(chunk) };
  });

  it('should write one JSON object per line', () => {
    const logger = createLogger('tempo-mcp-server', { sink });

    logger.info('Worklog created', { worklogId: 12 });

    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith('\n')).toBe(true);
    expect(entries()[0]).toEqual({
      '@timestamp': expect.any(String),
      level: 'info',
      service: 'tempo-mcp-server',
      message: 'Worklog created',
      worklogId: 12,
    });
  });

  it('should drop entries below the configured level', () => {
    const logger = createLogger('svc', { sink, level: 'warn' });

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(entries()).toEqual([
      expect.objectContaining({ level: 'warn', message: 'warn' }),
      expect.objectContaining({ level: 'error', message: 'error' }),
    ]);
  });

  it('should default to the info level', () => {
    const logger = createLogger('svc', { sink });

    logger.debug('hidden');

    expect(logger.level).toBe('info');
    expect(lines).toHaveLength(0);
  });

  it('should bind context on child loggers', () => {
    const logger = createLogger('svc', { sink, context: { component: 'client' } });
    const child = logger.child({ session: 'abc' });

    child.warn('Retrying', { attempt: 2 });

    expect(entries()[0]).toMatchObject({
      component: 'client',
      session: 'abc',
      attempt: 2,
      message: 'Retrying',
    });
    expect(child.level).toBe('info');
  });
});

describe('serializeError', () => {
  it('should keep message, type and stack of errors', () => {
    const error = new RangeError('out of range');

    expect(serializeError(error)).toEqual({ message: 'out of range', type: 'RangeError', stack: error.stack });
  });

  it('should stringify other values', () => {
    expect(serializeError(42)).toEqual({ message: '42' });
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
