import chalk from 'chalk';
import type { Logger } from '@incgraph/core';

/**
 * Terminal logger for the CLI. Debug lines only show with --verbose.
 */
export function createCliLogger(verbose = false): Logger {
  return {
    info: (message: string) => console.log(message),
    warning: (message: string) => console.warn(chalk.yellow(`⚠️  ${message}`)),
    error: (message: string) => console.error(chalk.red(message)),
    debug: (message: string) => {
      if (verbose) {
        console.log(chalk.dim(message));
      }
    },
  };
}
