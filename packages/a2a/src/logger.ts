/**
 * Minimal logging seam.
 *
 * Components log through this interface so hosts can route output
 * elsewhere. The console implementation keeps the `[tag] message` format.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug lines (default: false) */
  readonly debug?: boolean | undefined;
}

export function createConsoleLogger(tag: string, options?: ConsoleLoggerOptions): Logger {
  const prefix = `[${tag}]`;
  const debugEnabled = options?.debug ?? false;

  return {
    debug(message) {
      if (debugEnabled) {
        console.debug(`${prefix} ${message}`);
      }
    },
    info(message) {
      console.info(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message) {
      console.error(`${prefix} ${message}`);
    },
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
