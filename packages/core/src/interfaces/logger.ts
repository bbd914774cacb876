/**
 * Logging surface accepted by the file and directory converters.
 * Any object with the four level methods works; the CLI passes its Logger.
 */
export interface ConversionLogger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
  /** Logger that adds `fields` to every entry */
  child?(fields: Record<string, unknown>): ConversionLogger;
}
