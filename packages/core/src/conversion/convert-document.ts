/**
 * Document conversion: line protocol text in, CSV text out.
 *
 * Two phases. Every line is parsed first so the column schema is known
 * before the header is written; rows are emitted afterwards.
 */

import type {
  ColumnSchema,
  ConversionStats,
  Diagnostic,
  DiagnosticSink,
  LineRecord,
} from '../types/index.js';
import { ConversionError } from '../errors/index.js';
import { parseLine } from '../parser/index.js';
import { emitCsv } from './csv-emitter.js';
import { buildColumnSchema } from './schema-unifier.js';
import { collectKeys } from '../utils/index.js';

export interface ConvertOptions {
  /** Called for each diagnostic as it is produced */
  onDiagnostic?: DiagnosticSink;
  /** Reject documents larger than this many UTF-8 bytes */
  maxInputBytes?: number;
}

export type ConversionResult =
  | {
      kind: 'csv';
      csv: string;
      schema: ColumnSchema;
      stats: ConversionStats;
      diagnostics: Diagnostic[];
    }
  | {
      kind: 'no-data';
      stats: ConversionStats;
      diagnostics: Diagnostic[];
    };

/**
 * Convert a whole document.
 *
 * Malformed lines and fragments are dropped and reported as diagnostics.
 * A document without a single valid record yields `no-data`.
 *
 * @throws ConversionError (INPUT_TOO_LARGE) when `maxInputBytes` is exceeded
 */
export function convertDocument(
  document: string,
  options: ConvertOptions = {}
): ConversionResult {
  if (options.maxInputBytes !== undefined) {
    const size = Buffer.byteLength(document, 'utf8');
    if (size > options.maxInputBytes) {
      throw new ConversionError({
        code: 'INPUT_TOO_LARGE',
        message: `Document is ${size} bytes, limit is ${options.maxInputBytes}`,
        suggestion: 'Split the input into smaller files or raise maxInputBytes.',
        context: { size, maxInputBytes: options.maxInputBytes },
      });
    }
  }

  const diagnostics: Diagnostic[] = [];
  const report: DiagnosticSink = (diagnostic) => {
    diagnostics.push(diagnostic);
    options.onDiagnostic?.(diagnostic);
  };

  const lines = document.split('\n');
  // a final newline terminates the last line, it does not start a new one
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  const stats: ConversionStats = {
    totalLines: lines.length,
    blankLines: 0,
    commentLines: 0,
    recordCount: 0,
    skippedLines: 0,
    droppedFragments: 0,
  };

  // Phase 1: parse and collect the key union
  const records: LineRecord[] = [];
  const tagKeys = new Set<string>();
  const fieldKeys = new Set<string>();

  lines.forEach((line, index) => {
    const result = parseLine(line, { lineNumber: index + 1, onDiagnostic: report });

    switch (result.kind) {
      case 'record':
        records.push(result.record);
        collectKeys(tagKeys, result.record.tags);
        collectKeys(fieldKeys, result.record.fields);
        break;
      case 'skip':
        if (result.reason === 'blank') stats.blankLines++;
        else stats.commentLines++;
        break;
      case 'malformed':
        stats.skippedLines++;
        break;
    }
  });

  stats.recordCount = records.length;
  stats.droppedFragments = diagnostics.filter((d) => d.code === 'MALFORMED_KEY_VALUE').length;

  if (records.length === 0) {
    return { kind: 'no-data', stats, diagnostics };
  }

  // Phase 2: fixed header, then rows
  const schema = buildColumnSchema(tagKeys, fieldKeys);
  const csv = emitCsv(schema, records);

  return { kind: 'csv', csv, schema, stats, diagnostics };
}

/**
 * CSV text for `document`, or null when there is nothing to write
 */
export function lineProtocolToCsv(document: string, options: ConvertOptions = {}): string | null {
  const result = convertDocument(document, options);
  return result.kind === 'csv' ? result.csv : null;
}
