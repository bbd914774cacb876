export { buildColumnSchema, unifySchema, recordToRow } from './schema-unifier.js';
export { emitCsv, stringifyRows } from './csv-emitter.js';
export { convertDocument, lineProtocolToCsv } from './convert-document.js';
export type { ConvertOptions, ConversionResult } from './convert-document.js';
