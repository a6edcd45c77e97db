/**
 * Tests for the JSON-lines logger
 */

import { afterEach, describe, it, expect } from 'vitest';
import { configure, resetConfig } from '../config';
import { Logger, type LogEntry } from './logger';

function capture(debugMode?: boolean) {
  const lines: string[] = [];
  const logger = new Logger({ component: 'Test', debugMode, sink: (line) => lines.push(line) });
  const entries = (): LogEntry[] => lines.map((line): LogEntry => JSON.parse(line));
  return { logger, lines, entries };
}

describe('Logger', () => {
  afterEach(() => {
    resetConfig({});
  });

  it('should write one JSON line per entry', () => {
    const { logger, entries } = capture();
    logger.info('started', { size: 3 });
    logger.warn('odd');

    const [first, second] = entries();
    expect(first).toMatchObject({ level: 'info', component: 'Test', event: 'started', data: { size: 3 } });
    expect(Number.isNaN(Date.parse(first.timestamp))).toBe(false);
    expect(second).toMatchObject({ level: 'warn', event: 'odd' });
    expect('data' in second).toBe(false);
  });

  it('should drop debug entries unless debug mode is on', () => {
    const { logger, lines } = capture();
    logger.debug('hidden');
    expect(lines).toHaveLength(0);

    configure({ debug: true });
    logger.debug('shown');
    expect(lines).toHaveLength(1);
  });

  it('should let an explicit debugMode override the config', () => {
    configure({ debug: true });
    const quiet = capture(false);
    quiet.logger.debug('hidden');
    expect(quiet.lines).toHaveLength(0);

    resetConfig({});
    const loud = capture(true);
    loud.logger.debug('shown', { n: 1 });
    expect(loud.entries()[0]).toMatchObject({ level: 'debug', event: 'shown', data: { n: 1 } });
  });

  it('should always write errors', () => {
    const { logger, entries } = capture(false);
    logger.error('failed', { reason: 'test' });
    expect(entries()[0].level).toBe('error');
  });
});
