/**
 * Console logging gated by the CLI output mode
 */

import chalk from 'chalk';
import type { OutputMode } from './ui/render.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Build a logger for the given output mode.
 *
 * - json: only errors, on stderr, uncoloured (stdout belongs to the JSON output)
 * - quiet: warnings and errors
 * - verbose/debug: everything including per-exchange decisions
 */
export function createLogger(mode: OutputMode): Logger {
  const showDebug = !mode.json && (mode.verbose || mode.debug);
  const showInfo = !mode.json && !mode.quiet;
  const showWarn = !mode.json;

  return {
    debug(message) {
      if (showDebug) console.log(chalk.gray(message));
    },
    info(message) {
      if (showInfo) console.log(message);
    },
    warn(message) {
      if (showWarn) console.error(chalk.yellow('⚠') + ' ' + message);
    },
    error(message) {
      if (mode.json) {
        console.error(`Error: ${message}`);
      } else {
        console.error(chalk.red('✗') + ' ' + message);
      }
    },
  };
}
