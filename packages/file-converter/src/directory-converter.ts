/**
 * Directory Converter
 * Converts every regular file of a directory (non-recursive) and reports
 * what happened to each one. One failing file never stops the others.
 */

import { mkdir, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { ConversionLogger, ConversionStats } from '@lineproto-csv/core';
import { ConversionError, compareCodeUnits, wrapError } from '@lineproto-csv/core';
import {
  LineProtocolFileConverter,
  errnoCode,
  type FileConverterConfig,
} from './line-protocol-file-converter.js';
import { matchesExtension } from './output-naming.js';

export interface DirectoryConversionOptions
  extends Omit<FileConverterConfig, 'inputPath' | 'logger'> {
  inputDir: string;
  /** Only convert files with one of these extensions (e.g. ['.lp']) */
  extensions?: string[];
  logger?: ConversionLogger;
}

export type FileConversionReport =
  | { file: string; status: 'converted'; outputPath: string; stats: ConversionStats }
  | { file: string; status: 'no-data'; stats: ConversionStats }
  | { file: string; status: 'failed'; error: ConversionError };

export interface DirectoryConversionSummary {
  /** Entries found in the input directory */
  entries: number;
  /** Files written */
  processed: number;
  /** Files without valid data or that failed */
  skipped: number;
  /** Directories, other non-file entries and filtered-out files */
  ignored: number;
  results: FileConversionReport[];
}

async function listEntries(inputDir: string): Promise<string[]> {
  try {
    const names = await readdir(inputDir);
    return names.sort(compareCodeUnits);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new ConversionError({
        code: 'NOT_FOUND',
        message: `Input directory not found: ${inputDir}`,
        source: inputDir,
        suggestion: 'Create the directory or pass a different --input.',
      });
    }
    throw new ConversionError({
      code: 'READ_FAILED',
      message: `Error listing files in ${inputDir}: ${error instanceof Error ? error.message : String(error)}`,
      source: inputDir,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    // dangling symlink or entry removed while listing
    return false;
  }
}

/**
 * Convert all files in `inputDir`, writing `<name>.csv` files to `outputDir`.
 *
 * @throws ConversionError when the output directory cannot be created or
 *   the input directory cannot be listed
 */
export async function convertDirectory(
  options: DirectoryConversionOptions
): Promise<DirectoryConversionSummary> {
  const { inputDir, outputDir, extensions, logger, ...fileOptions } = options;

  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new ConversionError({
      code: 'WRITE_FAILED',
      message: `Cannot create output directory: ${outputDir}`,
      source: outputDir,
      cause: error instanceof Error ? error : undefined,
    });
  }
  logger?.info(`Ensured output directory exists: ${outputDir}`);

  const names = await listEntries(inputDir);
  logger?.info(`Found ${names.length} entries in ${inputDir}. Processing files...`);

  const summary: DirectoryConversionSummary = {
    entries: names.length,
    processed: 0,
    skipped: 0,
    ignored: 0,
    results: [],
  };

  for (const name of names) {
    const inputPath = join(inputDir, name);

    if (!(await isRegularFile(inputPath))) {
      logger?.info(`Skipping non-file entry: ${name}`);
      summary.ignored++;
      continue;
    }

    if (extensions && !matchesExtension(name, extensions)) {
      logger?.debug(`Ignoring file with unlisted extension: ${name}`);
      summary.ignored++;
      continue;
    }

    logger?.info(`Processing file: ${name}`);
    const converter = new LineProtocolFileConverter({
      ...fileOptions,
      inputPath,
      outputDir,
      logger,
    });

    try {
      const outcome = await converter.convert();

      if (outcome.status === 'converted') {
        logger?.info(`Successfully converted '${name}' to '${outcome.outputPath}'`, {
          records: outcome.stats.recordCount,
          skippedLines: outcome.stats.skippedLines,
        });
        summary.processed++;
        summary.results.push({
          file: name,
          status: 'converted',
          outputPath: outcome.outputPath,
          stats: outcome.stats,
        });
      } else {
        logger?.warn(`Skipping '${name}': No valid line protocol data found.`);
        summary.skipped++;
        summary.results.push({ file: name, status: 'no-data', stats: outcome.stats });
      }
    } catch (error) {
      const wrapped = wrapError(error, inputPath);
      logger?.error(`Error processing file ${name}: ${wrapped.message}`, { code: wrapped.code });
      summary.skipped++;
      summary.results.push({ file: name, status: 'failed', error: wrapped });
    }
  }

  return summary;
}
