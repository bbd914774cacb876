/**
 * Line Parser
 * Turns one line-protocol line into a LineRecord:
 *
 *   measurement[,tag=value...] field=value[,field=value...] [timestamp]
 */

import type {
  Diagnostic,
  DiagnosticSink,
  LineRecord,
  SkipReason,
} from '../types/index.js';
import { indexOfUnescaped, isEscapedAt, unescapeMeasurement } from './escape.js';
import { parseKeyValuePairs } from './key-value.js';

export type LineParseResult =
  | { kind: 'record'; record: LineRecord }
  | { kind: 'skip'; reason: SkipReason }
  | { kind: 'malformed'; diagnostic: Diagnostic };

export interface LineParseOptions {
  /** 1-based line number, copied into diagnostics */
  lineNumber?: number;
  /** Receives malformed-line and malformed-fragment diagnostics */
  onDiagnostic?: DiagnosticSink;
}

const WHITESPACE = /\s/;

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Split the trailing `<whitespace><digits>` off the field segment.
 * The whitespace must not be escaped.
 */
export function splitTimestamp(segment: string): { fieldText: string; timestamp?: string } {
  let start = segment.length;
  while (start > 0 && isDigit(segment.charAt(start - 1))) {
    start--;
  }

  const sep = start - 1;
  if (
    start === segment.length ||
    sep < 0 ||
    !WHITESPACE.test(segment.charAt(sep)) ||
    isEscapedAt(segment, sep)
  ) {
    return { fieldText: segment };
  }

  return {
    fieldText: segment.slice(0, sep).trimEnd(),
    timestamp: segment.slice(start),
  };
}

function malformed(
  reason: string,
  line: string,
  options: LineParseOptions
): LineParseResult {
  const diagnostic: Diagnostic = {
    code: 'MALFORMED_LINE',
    message: reason,
    line,
    lineNumber: options.lineNumber,
  };
  options.onDiagnostic?.(diagnostic);
  return { kind: 'malformed', diagnostic };
}

/**
 * Parse a single line.
 *
 * Blank and `#` comment lines are skipped without a diagnostic. Structural
 * problems produce a `malformed` result; nothing is thrown.
 */
export function parseLine(raw: string, options: LineParseOptions = {}): LineParseResult {
  const line = raw.trim();

  if (line === '') {
    return { kind: 'skip', reason: 'blank' };
  }
  if (line.startsWith('#')) {
    return { kind: 'skip', reason: 'comment' };
  }

  const separator = indexOfUnescaped(line, ' ');
  if (separator === -1) {
    return malformed('missing field separator', line, options);
  }

  const head = line.slice(0, separator);
  const tail = line.slice(separator + 1);

  const tagComma = indexOfUnescaped(head, ',');
  const rawMeasurement = tagComma === -1 ? head : head.slice(0, tagComma);
  const tagText = tagComma === -1 ? '' : head.slice(tagComma + 1);

  const { fieldText, timestamp } = splitTimestamp(tail);

  const pairOptions = {
    onDiagnostic: options.onDiagnostic,
    line,
    lineNumber: options.lineNumber,
  };
  const tags = parseKeyValuePairs(tagText, pairOptions);
  const fields = parseKeyValuePairs(fieldText, pairOptions);

  const measurement = unescapeMeasurement(rawMeasurement);
  if (measurement === '' || Object.keys(fields).length === 0) {
    return malformed('missing measurement or fields', line, options);
  }

  const record: LineRecord = { measurement, tags, fields };
  if (timestamp !== undefined) {
    record.timestamp = timestamp;
  }

  return { kind: 'record', record };
}
