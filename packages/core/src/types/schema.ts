/**
 * Column schema shared by every row of one CSV document
 */

export const MEASUREMENT_COLUMN = 'measurement';
export const TIMESTAMP_COLUMN = 'timestamp';

export interface ColumnSchema {
  /** Sorted union of tag keys across the document */
  tagKeys: string[];
  /** Sorted union of field keys across the document */
  fieldKeys: string[];
  /** measurement, tag keys, field keys, timestamp */
  header: string[];
}
