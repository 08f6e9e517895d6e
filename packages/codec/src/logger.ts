/**
 * Minimal diagnostic logger. Debug lines are written only when `verbose` is
 * set; warnings always are. Output goes to stderr unless a writer is given.
 */

export type LogWriter = (line: string) => void;

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

export interface LoggerOptions {
  readonly verbose?: boolean;
  readonly writer?: LogWriter;
  readonly prefix?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? ((line: string) => console.error(line));
  const prefix = options.prefix ?? "[polycodec]";
  const verbose = options.verbose ?? false;

  return {
    debug(message) {
      if (verbose) writer(`${prefix} ${message}`);
    },
    warn(message) {
      writer(`${prefix} warning: ${message}`);
    },
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug() {},
  warn() {},
};
