/**
 * Output file naming for converted documents
 */

import { extname, basename } from 'node:path';

export const DEFAULT_OUTPUT_EXTENSION = '.csv';

/**
 * Replace the last extension of `inputName` with `extension`.
 * Dot-files without a further extension keep their full name.
 *
 * @example outputFileName('cpu.lp') // 'cpu.csv'
 */
export function outputFileName(
  inputName: string,
  extension: string = DEFAULT_OUTPUT_EXTENSION
): string {
  const name = basename(inputName);
  const ext = extname(name);
  const stem = ext ? name.slice(0, -ext.length) : name;
  return `${stem}${extension}`;
}

/**
 * Whether `fileName` ends with one of `extensions` (case-insensitive)
 */
export function matchesExtension(fileName: string, extensions: readonly string[]): boolean {
  const ext = extname(fileName).toLowerCase();
  return extensions.some((candidate) => candidate.toLowerCase() === ext);
}
