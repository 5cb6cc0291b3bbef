/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with clock prefix and colours (createConsoleSink)
 * - Slack sink with webhook retry buffer (createSlackSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, parseLogLevel, formatClock } from './helpers';
export { createConsoleSink } from './console';
export { createSlackSink } from './slack';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  SinkInitResult,
  ConsoleSinkConfig,
  ConsoleAPI,
  SlackSink,
  SlackSinkConfig,
  InitMessage
} from './types';
