/**
 * CSV serialization of unified records
 */

import { stringify } from 'csv-stringify/sync';
import type { ColumnSchema, LineRecord } from '../types/index.js';
import { recordToRow } from './schema-unifier.js';

const STRINGIFY_OPTIONS = {
  delimiter: ',',
  quote: '"',
  record_delimiter: 'unix',
  // comma, quote and \n are quoted by default
  quoted_match: /\r/,
} as const;

/**
 * Serialize rows (header included) as CSV with '\n' terminators.
 */
export function stringifyRows(rows: string[][]): string {
  if (rows.length === 0) {
    return '';
  }
  return stringify(rows, STRINGIFY_OPTIONS);
}

/**
 * Header row followed by one row per record, in record order
 */
export function emitCsv(schema: ColumnSchema, records: readonly LineRecord[]): string {
  const rows: string[][] = [schema.header];
  for (const record of records) {
    rows.push(recordToRow(record, schema));
  }
  return stringifyRows(rows);
}
