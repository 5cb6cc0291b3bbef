import type { FetchFn, Sleeper, TimerAPI } from '$types/common';
import type { WatchdogEnvConfig } from '$types/config';
import type { ConsoleAPI, LogLevel } from '@logging';
import type { TextReader } from './config';

/**
 * Options parsed from the command line
 */
export interface CliOptions {
  /** YAML configuration path (overrides CONFIG_PATH) */
  config?: string;
  /** Run a single pass and exit */
  once?: boolean;
  /** Log level name (overrides LOG_LEVEL) */
  logLevel?: string;
}

/**
 * Everything initialize() needs; host APIs default to Node's
 */
export interface InitOptions {
  env: WatchdogEnvConfig;
  /** Configuration file path, defaults to env.CONFIG_PATH */
  configPath?: string;
  /** Global log level, defaults to env.LOG_LEVEL */
  logLevel?: LogLevel;
  fetchImpl?: FetchFn;
  consoleApi?: ConsoleAPI;
  readText?: TextReader;
  timer?: TimerAPI;
  sleep?: Sleeper;
  /** Environment that receives NODE_TLS_REJECT_UNAUTHORIZED */
  processEnv?: NodeJS.ProcessEnv;
}

export type { Monitor } from '@system/monitor';
