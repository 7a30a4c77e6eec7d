import { describe, it, expect } from '@jest/globals';
import { configureLogging, createPainter, formatDebug, formatNormal, formatTimestamp, LoggingOptions } from '../logger';
import { MemoryWriter, fixedClock } from '../../testing/fakes';

function profile(overrides: Partial<LoggingOptions> = {}) {
  const sink = new MemoryWriter();
  const logging = configureLogging({
    debug: false,
    suppressedLoggers: ['http', 'https'],
    color: false,
    sink,
    clock: fixedClock,
    ...overrides
  });
  return { sink, logging };
}

describe('configureLogging', () => {
  describe('normal profile', () => {
    it('uses the informational threshold', () => {
      const { logging } = profile();
      expect(logging.mode).toBe('normal');
      expect(logging.level).toBe('info');
    });

    it('writes compact timestamped lines', () => {
      const { logging, sink } = profile();

      logging.getLogger('git').info('Fetching commits');

      expect(sink.text).toBe('[2026-10-19 08:05:03] Fetching commits\n');
    });

    it('drops debug messages', () => {
      const { logging, sink } = profile();

      logging.getLogger('git').debug('hidden');

      expect(sink.text).toBe('');
    });

    it('holds suppressed transport loggers at warn', () => {
      const { logging, sink } = profile();
      const http = logging.getLogger('http');

      http.info('GET /repos');
      http.warn('slow response');

      expect(http.level).toBe('warn');
      expect(logging.levelFor('https')).toBe('warn');
      expect(logging.levelFor('git')).toBe('info');
      expect(sink.lines).toEqual(['[2026-10-19 08:05:03] slow response']);
    });
  });

  describe('debug profile', () => {
    it('uses the debug threshold everywhere', () => {
      const { logging } = profile({ debug: true });
      expect(logging.mode).toBe('debug');
      expect(logging.level).toBe('debug');
      expect(logging.levelFor('http')).toBe('debug');
    });

    it('includes logger name and level in each line', () => {
      const { logging, sink } = profile({ debug: true });

      logging.getLogger('git').debug('Reading refs');
      logging.getLogger('http').error('Connection refused');

      expect(sink.lines).toEqual([
        '[2026-10-19 08:05:03 - git - DEBUG] - Reading refs',
        '[2026-10-19 08:05:03 - http - ERROR] - Connection refused'
      ]);
    });
  });

  it('returns a frozen profile', () => {
    const { logging } = profile();
    expect(Object.isFrozen(logging)).toBe(true);
    expect(Object.isFrozen(logging.suppressedLoggers)).toBe(true);
  });

  it('gives the same profile for the same options', () => {
    const first = profile({ debug: true });
    const second = profile({ debug: true });

    first.logging.getLogger('git').warn('same');
    second.logging.getLogger('git').warn('same');

    expect(first.logging.level).toBe(second.logging.level);
    expect(first.sink.text).toBe(second.sink.text);
  });

  it('does not keep a reference to the caller suppression list', () => {
    const suppressed = ['http'];
    const { logging } = profile({ suppressedLoggers: suppressed });

    suppressed.push('git');

    expect(logging.levelFor('git')).toBe('info');
  });
});

describe('formatting', () => {
  const record = { time: fixedClock(), name: 'jira', level: 'warn' as const, message: 'retrying later' };

  it('pads timestamp fields', () => {
    expect(formatTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('2026-01-02 03:04:05');
  });

  it('formats normal records', () => {
    expect(formatNormal(record)).toBe('[2026-10-19 08:05:03] retrying later');
  });

  it('formats debug records', () => {
    expect(formatDebug(record)).toBe('[2026-10-19 08:05:03 - jira - WARN] - retrying later');
  });
});

describe('createPainter', () => {
  it('leaves text plain when color is off', () => {
    const paint = createPainter(false);
    expect(paint.level).toBe(0);
    expect(paint.red('Unknown backend jira')).toBe('Unknown backend jira');
  });
});
