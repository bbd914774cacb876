/**
 * @lineproto-csv/file-converter
 *
 * File and directory conversion of line protocol documents to CSV
 */

export {
  LineProtocolFileConverter,
  createLineProtocolFileConverter,
  errnoCode,
} from './line-protocol-file-converter.js';
export type {
  FileConverterConfig,
  FileConversionOutcome,
} from './line-protocol-file-converter.js';

export { convertDirectory } from './directory-converter.js';
export type {
  DirectoryConversionOptions,
  DirectoryConversionSummary,
  FileConversionReport,
} from './directory-converter.js';

export { outputFileName, matchesExtension, DEFAULT_OUTPUT_EXTENSION } from './output-naming.js';

// Re-export core types for convenience
export type {
  ConversionLogger,
  ConversionStats,
  Diagnostic,
  LineRecord,
} from '@lineproto-csv/core';
