import type { LogFormat, LogLevel } from './logger.js';

export interface CliArgs {
  help: boolean;
  configPath?: string;
  inputDir?: string;
  outputDir?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = [
  'Usage: lineproto-csv [--input <dir>] [--output <dir>] [--config <config.json>]',
  '                     [--log-level debug|info|warn|error] [--log-format text|json]',
  '',
  'Converts every line protocol file in the input directory (default ./input)',
  'to a CSV file of the same base name in the output directory (default ./output).',
].join('\n');

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const LOG_FORMATS: readonly LogFormat[] = ['text', 'json'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false };

  const valueOf = (flag: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '-h':
      case '--help':
        args.help = true;
        break;
      case '--config':
        args.configPath = valueOf(arg, i++);
        break;
      case '--input':
        args.inputDir = valueOf(arg, i++);
        break;
      case '--output':
        args.outputDir = valueOf(arg, i++);
        break;
      case '--log-level': {
        const value = valueOf(arg, i++);
        if (!isLogLevel(value)) {
          throw new UsageError(`Invalid --log-level: ${value}`);
        }
        args.logLevel = value;
        break;
      }
      case '--log-format': {
        const value = valueOf(arg, i++);
        if (!isLogFormat(value)) {
          throw new UsageError(`Invalid --log-format: ${value}`);
        }
        args.logFormat = value;
        break;
      }
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}
