import { afterEach, describe, it, expect, vi } from 'vitest';
import type { LogEntry } from '@vsplit/types';
import { logger, setLogLevel, setLogSink, getLogLevel } from '../utils/index.js';

const silence = (method: 'log' | 'warn' | 'error' | 'debug') => vi.spyOn(console, method).mockImplementation(() => {});

describe('logger', () => {
  afterEach(() => {
    setLogSink(null);
    setLogLevel('ERROR');
    vi.restoreAllMocks();
  });

  it('sends every entry to the sink', () => {
    const entries: LogEntry[] = [];
    setLogSink(entry => {
      entries.push(entry);
    });

    logger.warn('probe', 'Could not determine bit rate', { file: 'a.mp4' });
    logger.debug('planner', 'below console level');

    expect(entries).toEqual([
      { level: 'WARN', category: 'probe', message: 'Could not determine bit rate', meta: { file: 'a.mp4' }, createdAt: expect.any(String) },
      { level: 'DEBUG', category: 'planner', message: 'below console level', meta: undefined, createdAt: expect.any(String) },
    ]);
  });

  it('filters console output by level', () => {
    const log = silence('log');
    const warn = silence('warn');
    setLogLevel('WARN');

    logger.info('planner', 'hidden');
    logger.warn('planner', 'careful');

    expect(getLogLevel()).toBe('WARN');
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^\[.+\] WARN {4}\[planner\] careful$/));
  });

  it('labels success lines', () => {
    const log = silence('log');
    setLogLevel('INFO');

    logger.success('encoder', 'Segment 1/3 done');

    expect(log).toHaveBeenCalledWith(expect.stringMatching(/\] SUCCESS \[encoder\] Segment 1\/3 done$/));
  });

  it('reports a throwing sink', () => {
    const error = silence('error');
    setLogSink(() => {
      throw new Error('boom');
    });

    logger.info('system', 'hello');

    expect(error).toHaveBeenCalledWith(expect.stringMatching(/\[system\] Log sink failed: boom$/));
  });

  it('reports a rejecting sink', async () => {
    const error = silence('error');
    setLogSink(async () => {
      throw new Error('later');
    });

    logger.info('system', 'hello');
    await new Promise(resolve => setTimeout(resolve, 0));

    expect(error).toHaveBeenCalledWith(expect.stringMatching(/Log sink failed: later$/));
  });
});
