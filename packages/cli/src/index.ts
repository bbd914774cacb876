/**
 * @lineproto-csv/cli
 *
 * Command-line front end for directory conversion
 */

export { run, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from './run.js';
export type { RunOptions } from './run.js';
export { parseArgs, UsageError, USAGE } from './args.js';
export type { CliArgs } from './args.js';
export {
  loadConfig,
  parseConfig,
  expandEnvVars,
  formatZodError,
  configFileSchema,
  ConfigError,
} from './config.js';
export type { ConfigFile, EnvExpansionOptions } from './config.js';
export { Logger, sanitizeLogValue } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions, LogSink } from './logger.js';
