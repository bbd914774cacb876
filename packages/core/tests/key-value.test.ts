import { describe, expect, it } from 'vitest';
import { parseKeyValuePairs } from '../src/index.js';
import type { Diagnostic } from '../src/index.js';

describe('parseKeyValuePairs', () => {
  it('parses comma-separated pairs', () => {
    expect(parseKeyValuePairs('a=1,b=2')).toEqual({ a: '1', b: '2' });
  });

  it('recovers the same map after serializing it back', () => {
    const first = parseKeyValuePairs('a=1,b=2');
    const serialized = Object.entries(first)
      .map(([key, value]) => `${key}=${value}`)
      .join(',');
    expect(parseKeyValuePairs(serialized)).toEqual({ a: '1', b: '2' });
  });

  it('splits on the first unescaped equals only', () => {
    expect(parseKeyValuePairs('expr=a=b')).toEqual({ expr: 'a=b' });
    expect(parseKeyValuePairs('k\\=1=v')).toEqual({ 'k=1': 'v' });
  });

  it('unescapes keys and values', () => {
    expect(parseKeyValuePairs('region=us\\ west,dc=a\\,b')).toEqual({
      region: 'us west',
      dc: 'a,b',
    });
  });

  it('ignores empty fragments', () => {
    expect(parseKeyValuePairs(',a=1,,b=2,')).toEqual({ a: '1', b: '2' });
    expect(parseKeyValuePairs('')).toEqual({});
  });

  it('keeps the last value of a repeated key', () => {
    expect(parseKeyValuePairs('a=1,a=2')).toEqual({ a: '2' });
  });

  it('drops fragments without an equals sign and reports them', () => {
    const diagnostics: Diagnostic[] = [];
    const pairs = parseKeyValuePairs('a=1,broken,b=2', {
      onDiagnostic: (d) => diagnostics.push(d),
      line: 'm a=1,broken,b=2',
      lineNumber: 4,
    });

    expect(pairs).toEqual({ a: '1', b: '2' });
    expect(diagnostics).toEqual([
      {
        code: 'MALFORMED_KEY_VALUE',
        message: "Malformed key-value pair (no unescaped '='): broken",
        line: 'm a=1,broken,b=2',
        lineNumber: 4,
        fragment: 'broken',
      },
    ]);
  });

  it('treats an escaped equals as part of the text', () => {
    const diagnostics: Diagnostic[] = [];
    expect(parseKeyValuePairs('k\\=v', { onDiagnostic: (d) => diagnostics.push(d) })).toEqual({});
    expect(diagnostics[0]?.fragment).toBe('k\\=v');
    expect(diagnostics[0]?.line).toBe('k\\=v');
  });

  it('stores prototype-like keys as data', () => {
    const pairs = parseKeyValuePairs('__proto__=x,constructor=y');
    expect(Object.keys(pairs)).toEqual(['__proto__', 'constructor']);
    expect(pairs['__proto__']).toBe('x');
  });
});
