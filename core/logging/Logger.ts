/**
 * Logger
 * Minimal logging surface used by Carpenter, managers and tables.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug lines (default: false) */
  verbose?: boolean;
  /** Prefix for every line (default: "[carpenter]") */
  prefix?: string;
}

/**
 * Console-backed logger. Debug output is only written in verbose mode.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const prefix = options.prefix ?? '[carpenter]';

  return {
    debug(message, ...details) {
      if (verbose) {
        console.debug(`${prefix} ${message}`, ...details);
      }
    },
    info(message, ...details) {
      console.info(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`${prefix} ${message}`, ...details);
    },
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
