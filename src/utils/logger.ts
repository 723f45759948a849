/**
 * Logger interface for library code
 *
 * Pipeline components take a Logger at construction. The CLI passes its
 * CommandContext (which satisfies Logger), tests pass silentLogger or a
 * vi.fn() mock.
 */

import chalk from 'chalk';

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log an informational message (optional) */
  info?: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 * Debug lines only appear when DEBUG is set.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(chalk.yellow(message)),
  info: (message: string) => console.log(message),
  debug: (message: string) => {
    if (process.env['DEBUG']) {
      console.log(chalk.dim(message));
    }
  },
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  info: () => {},
  debug: () => {},
};
