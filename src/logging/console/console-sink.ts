/**
 * Console output sink
 *
 * Prefixes every line with a [HH:MM:SS] wall-clock stamp and, when enabled,
 * colours it by level with chalk. WARNING lines go to stderr via warn(),
 * CRITICAL lines via error().
 */

import chalk from 'chalk';
import { formatClock } from '../helpers';
import type { ConsoleAPI, ConsoleSinkConfig, LogLevel, LogSink } from '../types';

const PAINTERS: Record<LogLevel, (text: string) => string> = {
  0: (text) => chalk.gray(text),
  1: (text) => text,
  2: (text) => chalk.yellow(text),
  3: (text) => chalk.red.bold(text)
};

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (colors, clock)
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, {
 *   colors: process.stdout.isTTY,
 *   clock: () => new Date()
 * });
 * consoleSink.write('ℹ️ [INFO]     Watchdog started', LOG_LEVELS.INFO);
 * ```
 */
export function createConsoleSink(consoleApi: ConsoleAPI, config: ConsoleSinkConfig): LogSink {
  function write(formattedMessage: string, level: LogLevel): void {
    const line = `[${formatClock(config.clock())}] ${formattedMessage}`;
    const output = config.colors ? PAINTERS[level](line) : line;

    if (level === 3) {
      consoleApi.error(output);
    } else if (level === 2) {
      consoleApi.warn(output);
    } else {
      consoleApi.log(output);
    }
  }

  return { write };
}
