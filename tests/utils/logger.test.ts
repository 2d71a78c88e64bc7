/**
 * Tests for the structured logger with secret redaction
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { configureLogger, logger } from '../../src/utils/logger.js';

describe('Logger', () => {
  let lines: Array<Record<string, unknown>>;

  beforeEach(() => {
    lines = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      const text = typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString();
      for (const line of text.split('\n').filter(Boolean)) {
        lines.push(JSON.parse(line));
      }
      return true;
    });
    configureLogger({ level: 'info', prettyPrint: false, destination: 'stderr' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    configureLogger({ level: 'silent' });
  });

  it('should write JSON lines tagged with the component', () => {
    logger.create('Test').info('Recipe saved', { recipe: 'api-search' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 'info',
      msg: 'Recipe saved',
      component: 'Test',
      recipe: 'api-search',
      service: 'recipe-replay-engine',
    });
  });

  it('should drop messages below the configured level', () => {
    const log = logger.create('Test');
    log.debug('hidden');
    log.warn('shown');
    expect(lines.map((line) => line.msg)).toEqual(['shown']);
  });

  it('should pick up reconfiguration in loggers created earlier', () => {
    const log = logger.create('Test');
    configureLogger({ level: 'debug', prettyPrint: false, destination: 'stderr' });
    log.debug('visible now');
    expect(lines.map((line) => line.msg)).toEqual(['visible now']);
  });

  it('should redact credential-bearing fields', () => {
    logger.create('Test').info('Request sent', {
      headers: { authorization: 'Bearer test-secret', accept: 'application/json' },
      body: { password: 'test-secret' },
    });

    expect(lines[0].headers).toEqual({ authorization: '[REDACTED]', accept: 'application/json' });
    expect(lines[0].body).toEqual({ password: '[REDACTED]' });
  });

  it('should serialize errors under err', () => {
    logger.create('Test').error('Replay failed', { recipe: 'api-search', error: new Error('upstream closed') });

    expect(lines[0]).toMatchObject({ level: 'error', recipe: 'api-search', err: { name: 'Error', message: 'upstream closed' } });
    expect(lines[0].error).toBeUndefined();
  });

  it('should carry child context on every line', () => {
    const child = logger.create('Test').child({ taskId: 'task-1' });
    child.info('one');
    child.info('two');
    expect(lines.map((line) => [line.msg, line.taskId, line.component])).toEqual([
      ['one', 'task-1', 'Test'],
      ['two', 'task-1', 'Test'],
    ]);
  });

  it('should add the elapsed time to timed messages', () => {
    vi.spyOn(Date, 'now').mockReturnValue(1500);
    logger.create('Test').timed('Replay finished', 1000);
    expect(lines[0].durationMs).toBe(500);
  });
});
