import { describe, expect, it } from 'vitest';
import { Logger, sanitizeLogValue } from '../src/index.js';

const FIXED = new Date('2026-01-02T03:04:05.000Z');

function capture() {
  const lines: string[] = [];
  return { lines, sink: { write: (chunk: string) => lines.push(chunk) } };
}

describe('Logger', () => {
  it('writes text lines with extra fields', () => {
    const { lines, sink } = capture();
    const logger = new Logger({ sink, now: () => FIXED });

    logger.warn('Skipping malformed line', { lineNumber: 3, line: 'bad' });

    expect(lines).toEqual([
      '[2026-01-02T03:04:05.000Z] WARN Skipping malformed line lineNumber=3 line=bad\n',
    ]);
  });

  it('filters below the configured level', () => {
    const { lines, sink } = capture();
    const logger = new Logger({ level: 'warn', sink, now: () => FIXED });

    logger.debug('hidden');
    logger.info('hidden');
    logger.error('shown');

    expect(lines).toEqual(['[2026-01-02T03:04:05.000Z] ERROR shown\n']);
  });

  it('writes one JSON object per line in json format', () => {
    const { lines, sink } = capture();
    const logger = new Logger({ format: 'json', sink, now: () => FIXED });

    logger.info('Processing file: a.lp', { file: 'a.lp' });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      ts: '2026-01-02T03:04:05.000Z',
      level: 'info',
      msg: 'Processing file: a.lp',
      file: 'a.lp',
    });
  });

  it('binds fields through child loggers', () => {
    const { lines, sink } = capture();
    const logger = new Logger({ sink, now: () => FIXED }).child({ file: 'x.lp' });

    logger.info('done', { records: 2 });

    expect(lines).toEqual(['[2026-01-02T03:04:05.000Z] INFO done file=x.lp records=2\n']);
  });
});

describe('sanitizeLogValue', () => {
  it('redacts secret-looking keys', () => {
    expect(sanitizeLogValue({ token: 'test-secret', nested: { password: 'p', user: 'u' } })).toEqual({
      token: '[REDACTED]',
      nested: { password: '[REDACTED]', user: 'u' },
    });
  });

  it('flattens errors', () => {
    const value = sanitizeLogValue(new Error('boom'));
    expect(value).toMatchObject({ name: 'Error', message: 'boom' });
  });
});
