/**
 * Line Protocol File Converter
 * Reads one line protocol file and writes its CSV next to the other outputs
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ConversionLogger, ConversionStats, Diagnostic } from '@lineproto-csv/core';
import { ConversionError, convertDocument } from '@lineproto-csv/core';
import { DEFAULT_OUTPUT_EXTENSION, outputFileName } from './output-naming.js';

export interface FileConverterConfig {
  /** Path to the line protocol file */
  inputPath: string;
  /** Directory the CSV file is written to (created when missing) */
  outputDir: string;
  /** Character encoding of the input (default: utf-8) */
  encoding?: BufferEncoding;
  /** Extension of the written file (default: .csv) */
  outputExtension?: string;
  /** Reject inputs larger than this many bytes */
  maxInputBytes?: number;
  logger?: ConversionLogger;
}

export type FileConversionOutcome =
  | {
      status: 'converted';
      inputPath: string;
      outputPath: string;
      stats: ConversionStats;
    }
  | {
      status: 'no-data';
      inputPath: string;
      stats: ConversionStats;
    };

const silentLogger: ConversionLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class LineProtocolFileConverter {
  readonly config: FileConverterConfig;
  private readonly logger: ConversionLogger;

  constructor(config: FileConverterConfig) {
    this.config = config;
    this.logger = config.logger?.child?.({ file: config.inputPath }) ?? config.logger ?? silentLogger;
  }

  get outputPath(): string {
    return join(
      this.config.outputDir,
      outputFileName(this.config.inputPath, this.config.outputExtension ?? DEFAULT_OUTPUT_EXTENSION)
    );
  }

  /**
   * Convert the input file. Nothing is written when it holds no valid record.
   * @throws ConversionError on read/write failures or an oversized input
   */
  async convert(): Promise<FileConversionOutcome> {
    const content = await this.readInput();

    const result = convertDocument(content, {
      maxInputBytes: this.config.maxInputBytes,
      onDiagnostic: (diagnostic) => this.reportDiagnostic(diagnostic),
    });

    if (result.kind === 'no-data') {
      return { status: 'no-data', inputPath: this.config.inputPath, stats: result.stats };
    }

    const outputPath = this.outputPath;
    await this.writeOutput(outputPath, result.csv);

    return {
      status: 'converted',
      inputPath: this.config.inputPath,
      outputPath,
      stats: result.stats,
    };
  }

  private async readInput(): Promise<string> {
    const { inputPath } = this.config;

    try {
      return await readFile(inputPath, this.config.encoding ?? 'utf-8');
    } catch (error) {
      const code = errnoCode(error);

      if (code === 'ENOENT') {
        throw new ConversionError({
          code: 'NOT_FOUND',
          message: `File not found: ${inputPath}`,
          source: inputPath,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      if (code === 'EACCES') {
        throw new ConversionError({
          code: 'PERMISSION_DENIED',
          message: `Cannot read file: ${inputPath}`,
          source: inputPath,
          suggestion: 'Check file permissions.',
        });
      }

      throw new ConversionError({
        code: 'READ_FAILED',
        message: `Failed to read file: ${error instanceof Error ? error.message : String(error)}`,
        source: inputPath,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private async writeOutput(outputPath: string, csv: string): Promise<void> {
    try {
      await mkdir(this.config.outputDir, { recursive: true });
      await writeFile(outputPath, csv, 'utf-8');
    } catch (error) {
      throw new ConversionError({
        code: 'WRITE_FAILED',
        message: `Failed to write CSV: ${error instanceof Error ? error.message : String(error)}`,
        source: outputPath,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private reportDiagnostic(diagnostic: Diagnostic): void {
    const text =
      diagnostic.code === 'MALFORMED_LINE'
        ? `Skipping malformed line: ${diagnostic.message}`
        : diagnostic.message;

    this.logger.warn(text, {
      lineNumber: diagnostic.lineNumber,
      line: diagnostic.line,
    });
  }
}

/**
 * Factory function to create a file converter
 */
export function createLineProtocolFileConverter(
  config: FileConverterConfig
): LineProtocolFileConverter {
  return new LineProtocolFileConverter(config);
}
