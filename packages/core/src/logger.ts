export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export interface ConsoleLoggerOptions {
  /** Print debug lines (default: false) */
  verbose?: boolean | undefined;
}

/**
 * Prefixed lines on stderr, e.g. `[pinkeeper] resolved ascanrules 36`.
 * stdout stays free for machine-readable output.
 */
export function createConsoleLogger(
  prefix: string,
  options: ConsoleLoggerOptions = {},
): Logger {
  const tag = `[${prefix}]`;
  return {
    debug(message) {
      if (options.verbose) console.error(`${tag} ${message}`);
    },
    info(message) {
      console.error(`${tag} ${message}`);
    },
    warn(message) {
      console.error(`${tag} warning: ${message}`);
    },
    error(message) {
      console.error(`${tag} error: ${message}`);
    },
  };
}
