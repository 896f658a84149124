/**
 * Console logging with a verbosity switch.
 *
 * `info` is progress output, `debug` the diagnostic trace enabled by --verbose.
 * Warnings and errors always go to stderr.
 */

export type LogLevel = "quiet" | "normal" | "verbose";

export interface Logger {
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createLogger(level: LogLevel = "normal"): Logger {
  return {
    info: (...args) => {
      if (level !== "quiet") console.log(...args);
    },
    debug: (...args) => {
      if (level === "verbose") console.log(...args);
    },
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
  };
}

/** Logger that drops everything, for library callers and tests */
export const silentLogger: Logger = {
  info: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
};
