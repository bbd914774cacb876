import { describe, expect, it } from 'vitest';
import { parseLine, splitTimestamp } from '../src/index.js';
import type { Diagnostic, LineParseResult, LineRecord } from '../src/index.js';

function expectRecord(result: LineParseResult): LineRecord {
  if (result.kind !== 'record') {
    throw new Error(`expected a record, got ${result.kind}`);
  }
  return result.record;
}

describe('parseLine', () => {
  it('parses measurement, tags, fields and timestamp', () => {
    const record = expectRecord(
      parseLine('temperature,host=serverA value=23.5 1465839830100400200')
    );

    expect(record.measurement).toBe('temperature');
    expect(record.tags).toEqual({ host: 'serverA' });
    expect(record.fields).toEqual({ value: '23.5' });
    expect(record.timestamp).toBe('1465839830100400200');
  });

  it('accepts a line without tags or timestamp', () => {
    const record = expectRecord(parseLine('cpu value=0.64'));

    expect(record.measurement).toBe('cpu');
    expect(record.tags).toEqual({});
    expect(record.fields).toEqual({ value: '0.64' });
    expect(record.timestamp).toBeUndefined();
  });

  it('parses several tags and fields', () => {
    const record = expectRecord(
      parseLine('disk,host=a,path=/var free=10,used=90,total=100 1700000000')
    );

    expect(record.tags).toEqual({ host: 'a', path: '/var' });
    expect(record.fields).toEqual({ free: '10', used: '90', total: '100' });
    expect(record.timestamp).toBe('1700000000');
  });

  it('trims surrounding whitespace and carriage returns', () => {
    const record = expectRecord(parseLine('  mem used=5 42\r'));
    expect(record.measurement).toBe('mem');
    expect(record.timestamp).toBe('42');
  });

  it('honours escaped separators in every position', () => {
    const record = expectRecord(
      parseLine('cpu\\ load\\,total,data\\ center=eu\\,west label=a\\ b\\=c 100')
    );

    expect(record.measurement).toBe('cpu load,total');
    expect(record.tags).toEqual({ 'data center': 'eu,west' });
    expect(record.fields).toEqual({ label: 'a b=c' });
    expect(record.timestamp).toBe('100');
  });

  it('does not take digits after an escaped space as a timestamp', () => {
    const record = expectRecord(parseLine('m f=a\\ 123'));
    expect(record.fields).toEqual({ f: 'a 123' });
    expect(record.timestamp).toBeUndefined();
  });

  it('does not take a digit-only field value as a timestamp', () => {
    const record = expectRecord(parseLine('m count=123'));
    expect(record.fields).toEqual({ count: '123' });
    expect(record.timestamp).toBeUndefined();
  });

  it('allows extra whitespace before the timestamp', () => {
    const record = expectRecord(parseLine('m f=1   99'));
    expect(record.fields).toEqual({ f: '1' });
    expect(record.timestamp).toBe('99');
  });

  it('skips blank and comment lines without diagnostics', () => {
    const diagnostics: Diagnostic[] = [];
    const onDiagnostic = (d: Diagnostic) => diagnostics.push(d);

    expect(parseLine('', { onDiagnostic })).toEqual({ kind: 'skip', reason: 'blank' });
    expect(parseLine('   \t', { onDiagnostic })).toEqual({ kind: 'skip', reason: 'blank' });
    expect(parseLine('  # cpu value=1', { onDiagnostic })).toEqual({
      kind: 'skip',
      reason: 'comment',
    });
    expect(diagnostics).toHaveLength(0);
  });

  it('rejects a line without a field separator', () => {
    const diagnostics: Diagnostic[] = [];
    const result = parseLine('bad_line_no_space', {
      lineNumber: 3,
      onDiagnostic: (d) => diagnostics.push(d),
    });

    const expected: Diagnostic = {
      code: 'MALFORMED_LINE',
      message: 'missing field separator',
      line: 'bad_line_no_space',
      lineNumber: 3,
    };
    expect(result).toEqual({ kind: 'malformed', diagnostic: expected });
    expect(diagnostics).toEqual([expected]);
  });

  it('rejects a line whose only space is escaped', () => {
    const result = parseLine('cpu\\ value=1');
    expect(result.kind).toBe('malformed');
    if (result.kind !== 'malformed') return;
    expect(result.diagnostic.message).toBe('missing field separator');
  });

  it('rejects an empty measurement', () => {
    const result = parseLine(',host=a value=1');
    expect(result.kind).toBe('malformed');
    if (result.kind !== 'malformed') return;
    expect(result.diagnostic.message).toBe('missing measurement or fields');
  });

  it('rejects a line whose field set is empty after dropping fragments', () => {
    const diagnostics: Diagnostic[] = [];
    const result = parseLine('cpu,host=a novalue 10', {
      onDiagnostic: (d) => diagnostics.push(d),
    });

    expect(result.kind).toBe('malformed');
    expect(diagnostics.map((d) => d.code)).toEqual(['MALFORMED_KEY_VALUE', 'MALFORMED_LINE']);
    expect(diagnostics[0]?.fragment).toBe('novalue');
    expect(diagnostics[1]?.message).toBe('missing measurement or fields');
  });

  it('keeps the record when only some fragments are malformed', () => {
    const diagnostics: Diagnostic[] = [];
    const record = expectRecord(
      parseLine('cpu,host=a,oops usage=1,bad', { onDiagnostic: (d) => diagnostics.push(d) })
    );

    expect(record.tags).toEqual({ host: 'a' });
    expect(record.fields).toEqual({ usage: '1' });
    expect(diagnostics.map((d) => d.fragment)).toEqual(['oops', 'bad']);
  });

  it('lets a repeated key overwrite the earlier one', () => {
    const record = expectRecord(parseLine('m,t=1,t=2 f=a,f=b'));
    expect(record.tags).toEqual({ t: '2' });
    expect(record.fields).toEqual({ f: 'b' });
  });

  it('is deterministic for the same input', () => {
    const line = 'net,iface=eth0,host=h1 rx=10,tx=20 1700000000000';
    expect(parseLine(line)).toEqual(parseLine(line));
  });
});

describe('splitTimestamp', () => {
  it('splits a trailing digit run preceded by whitespace', () => {
    expect(splitTimestamp('a=1,b=2 1234')).toEqual({ fieldText: 'a=1,b=2', timestamp: '1234' });
  });

  it('returns the whole segment when there is no timestamp', () => {
    expect(splitTimestamp('a=1')).toEqual({ fieldText: 'a=1' });
    expect(splitTimestamp('a=1 12x')).toEqual({ fieldText: 'a=1 12x' });
    expect(splitTimestamp('1234')).toEqual({ fieldText: '1234' });
  });

  it('accepts a tab as the separator', () => {
    expect(splitTimestamp('a=1\t55')).toEqual({ fieldText: 'a=1', timestamp: '55' });
  });
});
