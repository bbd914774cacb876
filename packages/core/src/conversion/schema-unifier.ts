/**
 * Schema unification: the column set every row of a document shares
 */

import type { ColumnSchema, LineRecord } from '../types/index.js';
import { MEASUREMENT_COLUMN, TIMESTAMP_COLUMN } from '../types/index.js';
import { collectKeys, sortedKeys } from '../utils/index.js';

/**
 * Build a schema from explicit key sets. Tag and field keys are sorted
 * independently; tag columns always precede field columns.
 */
export function buildColumnSchema(
  tagKeys: Iterable<string>,
  fieldKeys: Iterable<string>
): ColumnSchema {
  const tags = sortedKeys(tagKeys);
  const fields = sortedKeys(fieldKeys);

  return {
    tagKeys: tags,
    fieldKeys: fields,
    header: [MEASUREMENT_COLUMN, ...tags, ...fields, TIMESTAMP_COLUMN],
  };
}

/**
 * Union of all tag keys and all field keys across `records`
 */
export function unifySchema(records: Iterable<LineRecord>): ColumnSchema {
  const tagKeys = new Set<string>();
  const fieldKeys = new Set<string>();

  for (const record of records) {
    collectKeys(tagKeys, record.tags);
    collectKeys(fieldKeys, record.fields);
  }

  return buildColumnSchema(tagKeys, fieldKeys);
}

/**
 * Row aligned to `schema.header`; absent keys and timestamps become ''
 */
export function recordToRow(record: LineRecord, schema: ColumnSchema): string[] {
  return [
    record.measurement,
    ...schema.tagKeys.map((key) => record.tags[key] ?? ''),
    ...schema.fieldKeys.map((key) => record.fields[key] ?? ''),
    record.timestamp ?? '',
  ];
}
