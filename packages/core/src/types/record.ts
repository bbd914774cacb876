/**
 * Record types produced by the line parser
 */

/** Key/value pairs of a tag set or field set, keyed by unescaped key */
export type KeyValueMap = {
  [key: string]: string;
};

/** One parsed line-protocol line */
export interface LineRecord {
  /** Measurement name, unescaped */
  measurement: string;
  /** Tag set (may be empty) */
  tags: KeyValueMap;
  /** Field set (never empty) */
  fields: KeyValueMap;
  /** Decimal timestamp text, undefined when the line carries none */
  timestamp?: string;
}

/** Why a line produced no record without being an error */
export type SkipReason = 'blank' | 'comment';

/** Counters collected while converting one document */
export interface ConversionStats {
  /** Lines in the document, including blanks and comments */
  totalLines: number;
  blankLines: number;
  commentLines: number;
  /** Lines that became records */
  recordCount: number;
  /** Lines dropped as malformed */
  skippedLines: number;
  /** Tag/field fragments dropped for lacking an unescaped '=' */
  droppedFragments: number;
}
