/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels } from './types';

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = '[DEBUG]    ';
  if (level === logLevels.INFO) tag = 'ℹ️ [INFO]     ';
  if (level === logLevels.WARNING) tag = '⚠️ [WARNING]  ';
  if (level === logLevels.CRITICAL) tag = '🚨 [CRITICAL] ';

  return tag + msg;
}

/**
 * Check if message should be logged at the current level
 * @param level - Level of the message
 * @param currentLevel - Minimum level currently enabled
 * @returns True if message should be logged
 */
export function shouldLog(level: LogLevel, currentLevel: LogLevel): boolean {
  return level >= currentLevel;
}

/**
 * Parse a log level name from the environment
 *
 * Accepts DEBUG, INFO, WARNING and CRITICAL (case-insensitive), plus the
 * common aliases WARN, ERROR and FATAL.
 *
 * @param raw - Raw level name, e.g. process.env.LOG_LEVEL
 * @param logLevels - Log level constants object
 * @param fallback - Level used when raw is missing or unrecognised
 * @returns Parsed log level
 */
export function parseLogLevel(raw: string | undefined, logLevels: LogLevels, fallback: LogLevel): LogLevel {
  switch ((raw ?? '').trim().toUpperCase()) {
    case 'DEBUG':
      return logLevels.DEBUG;
    case 'INFO':
      return logLevels.INFO;
    case 'WARN':
    case 'WARNING':
      return logLevels.WARNING;
    case 'ERROR':
    case 'FATAL':
    case 'CRITICAL':
      return logLevels.CRITICAL;
    default:
      return fallback;
  }
}

/**
 * Format a wall-clock time as HH:MM:SS (24h, local time)
 * @param date - Time to format
 * @returns Zero-padded clock string
 */
export function formatClock(date: Date): string {
  const hh = String(date.getHours()).padStart(2, '0');
  const mm = String(date.getMinutes()).padStart(2, '0');
  const ss = String(date.getSeconds()).padStart(2, '0');
  return `${hh}:${mm}:${ss}`;
}
