/**
 * Main logger coordinator
 *
 * Combines filtering, formatting, and output sinks into a unified logging system.
 * The logger routes messages through the level filter and formatter before writing to sinks.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Multiple output sinks (console, Slack), each with its own minimum level
 * - Runtime level adjustment
 * - Async sink initialization
 */

import { formatLogMessage, shouldLog } from './helpers';
import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, InitMessage, SinkWithLevel } from './types';

/**
 * Create a logger instance
 *
 * Each message is:
 * 1. Checked against the current log level
 * 2. Formatted with a level-appropriate tag
 * 3. Written to every sink whose minimum level it meets
 *
 * @param config - Logger configuration (level)
 * @param dependencies - External dependencies (sinks)
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO },
 *   {
 *     sinks: [
 *       { sink: consoleSink, minLevel: LOG_LEVELS.DEBUG },
 *       { sink: slackSink, minLevel: LOG_LEVELS.WARNING }
 *     ]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.info('Site 7 status: 0/3 probes reported down');  // Console only
 * logger.warning('Power cycling UPS 10.0.0.5 outlet 2');    // Console + Slack
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const sinks: SinkWithLevel[] = dependencies.sinks;

  function log(level: LogLevel, msg: string): void {
    if (!shouldLog(level, currentLevel)) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg, logLevels);

    for (const entry of sinks) {
      if (!shouldLog(level, entry.minLevel)) {
        continue;
      }

      try {
        entry.sink.write(formattedMessage, level);
      } catch (err) {
        // Sink errors must not take the watchdog down
        console.warn(`Logger sink error: ${String(err)}`);
      }
    }
  }

  /**
   * Log DEBUG level message
   * Use for request-level detail and raw probe records
   * @param msg - Message to log
   */
  function debug(msg: string): void {
    log(logLevels.DEBUG, msg);
  }

  /**
   * Log INFO level message
   * Use for per-site status lines and lifecycle events
   * @param msg - Message to log
   */
  function info(msg: string): void {
    log(logLevels.INFO, msg);
  }

  /**
   * Log WARNING level message
   * Use for remediation actions and recoverable failures
   * @param msg - Message to log
   */
  function warning(msg: string): void {
    log(logLevels.WARNING, msg);
  }

  /**
   * Log CRITICAL level message
   * Use for failed remediation and unexpected per-site crashes
   * @param msg - Message to log
   */
  function critical(msg: string): void {
    log(logLevels.CRITICAL, msg);
  }

  function setLevel(newLevel: LogLevel): void {
    currentLevel = newLevel;
  }

  function getLevel(): LogLevel {
    return currentLevel;
  }

  /**
   * Initialize all sinks that expose initialize()
   * @returns One message per initialized sink, in sink order
   */
  async function initialize(): Promise<InitMessage[]> {
    const pending: Promise<InitMessage>[] = [];

    for (const entry of sinks) {
      if (entry.sink.initialize) {
        pending.push(entry.sink.initialize());
      }
    }

    return Promise.all(pending);
  }

  return {
    log,
    debug,
    info,
    warning,
    critical,
    setLevel,
    getLevel,
    initialize
  };
}
