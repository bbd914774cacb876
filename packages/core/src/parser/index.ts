export {
  indexOfUnescaped,
  splitUnescaped,
  isEscapedAt,
  unescapeMeasurement,
  unescapeKeyValue,
} from './escape.js';
export { parseKeyValuePairs } from './key-value.js';
export type { KeyValueParseOptions } from './key-value.js';
export { parseLine, splitTimestamp } from './line-parser.js';
export type { LineParseResult, LineParseOptions } from './line-parser.js';
