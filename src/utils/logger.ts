/**
 * Logger
 *
 * Components receive a Logger instead of writing to the terminal. The CLI
 * passes a console logger; library callers get the silent one by default.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger whose lines are tagged with a component name */
  child(tag: string): Logger;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  tag?: string;
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

/**
 * Console logger in the `[Tag] message` format
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const prefix = options.tag ? `[${options.tag}] ` : '';

  return {
    debug(message) {
      if (verbose) console.log(`${prefix}${message}`);
    },
    info(message) {
      console.log(`${prefix}${message}`);
    },
    warn(message) {
      console.warn(`${prefix}Warning: ${message}`);
    },
    error(message) {
      console.error(`${prefix}Error: ${message}`);
    },
    child(tag) {
      return createConsoleLogger({ verbose, tag });
    },
  };
}

/**
 * Logger that records lines in memory (for tests and dry runs)
 */
export interface RecordedLine {
  level: 'debug' | 'info' | 'warn' | 'error';
  tag: string | null;
  message: string;
}

export function createMemoryLogger(lines: RecordedLine[] = [], tag: string | null = null): Logger & { lines: RecordedLine[] } {
  return {
    lines,
    debug: (message) => lines.push({ level: 'debug', tag, message }),
    info: (message) => lines.push({ level: 'info', tag, message }),
    warn: (message) => lines.push({ level: 'warn', tag, message }),
    error: (message) => lines.push({ level: 'error', tag, message }),
    child: (childTag) => createMemoryLogger(lines, childTag),
  };
}
