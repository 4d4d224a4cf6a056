/**
 * Console logging
 *
 * Everything goes to stderr so that reports written to stdout (JSON in
 * particular) stay machine-readable.
 */

import chalk from 'chalk';

let verbose = false;

export const logger = {
  setVerbose(enabled: boolean): void {
    verbose = enabled;
  },

  isVerbose(): boolean {
    return verbose;
  },

  info(message: string): void {
    console.error(chalk.dim(message));
  },

  success(message: string): void {
    console.error(chalk.green(message));
  },

  warn(message: string): void {
    console.error(chalk.yellow(`Warning: ${message}`));
  },

  error(message: string): void {
    console.error(chalk.red(`Error: ${message}`));
  },

  debug(message: string): void {
    if (verbose) {
      console.error(chalk.gray(`[debug] ${message}`));
    }
  },
};
