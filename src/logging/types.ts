/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces (console, slack)
 * - Initialization messages
 */

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches APP_CONSTANTS.LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Log level constants structure
 * Passed to pure functions instead of importing APP_CONSTANTS
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  /** Log at specified level */
  log(level: LogLevel, msg: string): void;
  /** Log DEBUG level message */
  debug(msg: string): void;
  /** Log INFO level message */
  info(msg: string): void;
  /** Log WARNING level message */
  warning(msg: string): void;
  /** Log CRITICAL level message */
  critical(msg: string): void;
  /** Update log level at runtime */
  setLevel(newLevel: LogLevel): void;
  /** Get current log level */
  getLevel(): LogLevel;
  /** Initialize all sinks, resolving with one message per sink that needed it */
  initialize(): Promise<InitMessage[]>;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
}

/**
 * Sink with its minimum log level
 * Logger filters messages before sending to each sink
 */
export interface SinkWithLevel {
  /** The output sink */
  sink: LogSink;
  /** Minimum level this sink receives */
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Array of sinks with their minimum levels */
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in the logger before write() is called;
 * the level is passed along for presentation only
 */
export interface LogSink {
  /** Write formatted message to sink */
  write(formattedMessage: string, level: LogLevel): void;
  /** Optional initialization (e.g., validate webhook URL) */
  initialize?(): Promise<SinkInitResult>;
}

/**
 * Result reported by a sink's initialize()
 */
export interface SinkInitResult {
  success: boolean;
  message: string;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Colour lines by level with chalk */
  colors: boolean;
  /** Clock used for the [HH:MM:SS] prefix */
  clock: () => Date;
}

/**
 * Slack sink configuration
 */
export interface SlackSinkConfig {
  /** Incoming webhook URL */
  webhookUrl: string;
  /** Maximum messages in retry buffer before dropping oldest */
  bufferSize: number;
  /** Initial retry delay in ms (exponential: 1000 -> 2000 -> 4000...) */
  retryDelayMs: number;
  /** Maximum retry attempts before dropping message */
  maxRetries: number;
  /** Per-request timeout in ms */
  timeoutMs: number;
}

/**
 * Slack sink interface
 * Buffers messages and retries with exponential backoff
 */
export interface SlackSink extends LogSink {
  initialize(): Promise<SinkInitResult>;
  /** Check if sink is initialized */
  isInitialized(): boolean;
  /** Get current buffer size (for testing/monitoring) */
  getBufferSize(): number;
}

// ═══════════════════════════════════════════════════════════════
// INITIALIZATION TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Initialization result message
 * Collected from sinks during logger initialization
 */
export interface InitMessage {
  /** Whether initialization succeeded */
  success: boolean;
  /** Human-readable status message */
  message: string;
}
