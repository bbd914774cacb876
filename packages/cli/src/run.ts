import { resolve } from 'node:path';
import { ConversionError } from '@lineproto-csv/core';
import { convertDirectory, type DirectoryConversionSummary } from '@lineproto-csv/file-converter';
import { USAGE, UsageError, parseArgs } from './args.js';
import {
  ConfigError,
  DEFAULT_INPUT_DIR,
  DEFAULT_OUTPUT_DIR,
  loadConfig,
  type ConfigFile,
} from './config.js';
import { Logger, type LogSink } from './logger.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface RunOptions {
  argv: readonly string[];
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
  /** Environment used for ${VAR} expansion in the config file */
  env?: NodeJS.ProcessEnv;
  /** Where log lines and usage text go (default: process.stderr) */
  sink?: LogSink;
  now?: () => Date;
}

function logSummary(logger: Logger, summary: DirectoryConversionSummary): void {
  logger.info('--- Conversion Summary ---');
  logger.info(`Total files processed: ${summary.processed}`);
  logger.info(`Total files/entries skipped: ${summary.skipped}`);
  if (summary.ignored > 0) {
    logger.info(`Non-file entries ignored: ${summary.ignored}`);
  }
}

/**
 * Run one conversion from command-line arguments and return the exit code
 */
export async function run(options: RunOptions): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const sink = options.sink ?? process.stderr;
  let logger = new Logger({ sink, now: options.now });

  try {
    const args = parseArgs(options.argv);
    if (args.help) {
      sink.write(`${USAGE}\n`);
      return EXIT_OK;
    }

    const config: ConfigFile = args.configPath
      ? await loadConfig(args.configPath, cwd, { env: options.env })
      : {};

    logger = new Logger({
      level: args.logLevel ?? config.logging?.level,
      format: args.logFormat ?? config.logging?.format,
      sink,
      now: options.now,
    });

    const inputDir = resolve(cwd, args.inputDir ?? config.input?.dir ?? DEFAULT_INPUT_DIR);
    const outputDir = resolve(cwd, args.outputDir ?? config.output?.dir ?? DEFAULT_OUTPUT_DIR);

    logger.info('Starting line protocol to CSV conversion...');
    logger.info(`Input directory: ${inputDir}`);
    logger.info(`Output directory: ${outputDir}`);

    const summary = await convertDirectory({
      inputDir,
      outputDir,
      encoding: config.input?.encoding,
      extensions: config.input?.extensions,
      outputExtension: config.output?.extension,
      maxInputBytes: config.limits?.maxInputBytes,
      logger,
    });

    logSummary(logger, summary);
    logger.info('Conversion process finished.');
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError) {
      sink.write(`${error.message}\n\n${USAGE}\n`);
      return EXIT_USAGE;
    }

    if (error instanceof ConversionError) {
      logger.error(error.toActionableMessage(), { code: error.code });
      return EXIT_FAILURE;
    }

    if (error instanceof ConfigError) {
      logger.error(error.message);
      return EXIT_FAILURE;
    }

    logger.error('Conversion failed', { error });
    return EXIT_FAILURE;
  }
}
