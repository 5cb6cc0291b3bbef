/**
 * Watchdog initialization
 */

import { APP_CONSTANTS, loadConfigFile } from './config';
import { collectSiteDevices, createSdwanClient } from '@devices/sdwan';
import { createUpsClient } from '@devices/ups';
import { createConsoleSink, createLogger, createSlackSink, formatLogMessage } from '@logging';
import { createMonitorState } from '@system/state';
import { nodeTimer, now, sleep as nodeSleep } from '@utils/time';
import { describeError } from '$types/errors';

import type { ConfigValidationResult } from '@validation';
import type { Logger, SinkWithLevel } from '@logging';
import type { SdwanDevice } from '@devices/sdwan';
import type { InitOptions, Monitor } from './types';

/**
 * Build the monitor: config, logging, SD-WAN login, inventory, UPS client
 *
 * Configuration problems are printed straight to the console since the logger
 * does not exist yet. An SD-WAN login failure is logged critical.
 *
 * @param options - Parsed environment plus injectable host APIs
 * @returns The monitor, or null when the watchdog cannot start
 */
export async function initialize(options: InitOptions): Promise<Monitor | null> {
  const { env } = options;
  const fetchImpl = options.fetchImpl ?? fetch;
  const consoleApi = options.consoleApi ?? console;
  const sleep = options.sleep ?? nodeSleep;
  const configPath = options.configPath ?? env.CONFIG_PATH;
  const levels = APP_CONSTANTS.LOG_LEVELS;

  // Validate configuration
  let validation: ConfigValidationResult;
  try {
    validation = await loadConfigFile(configPath, options.readText);
  } catch (e) {
    consoleApi.error(`INIT FAIL: ${describeError(e)}`);
    return null;
  }

  for (const warn of validation.warnings) {
    consoleApi.warn(`  [${warn.field}]: ${warn.message}`);
  }

  const config = validation.config;
  if (!validation.valid || !config) {
    consoleApi.error(`INIT FAIL: Invalid configuration (${configPath})`);
    for (const err of validation.errors) {
      consoleApi.error(`  [${err.field}]: ${err.message}`);
    }
    return null;
  }

  // Setup logging
  const sinks: SinkWithLevel[] = [
    { sink: createConsoleSink(consoleApi, { colors: process.stdout.isTTY === true, clock: () => new Date() }), minLevel: levels.DEBUG }
  ];
  if (env.SLACK_WEBHOOK_URL) {
    const slackSink = createSlackSink(fetchImpl, options.timer ?? nodeTimer, {
      webhookUrl: env.SLACK_WEBHOOK_URL,
      bufferSize: APP_CONSTANTS.SLACK_BUFFER_SIZE,
      retryDelayMs: APP_CONSTANTS.SLACK_RETRY_DELAY_MS,
      maxRetries: APP_CONSTANTS.SLACK_MAX_RETRIES,
      timeoutMs: env.HTTP_TIMEOUT_MS
    });
    sinks.push({ sink: slackSink, minLevel: env.SLACK_LOG_LEVEL });
  }

  const logger = createLogger({ level: options.logLevel ?? env.LOG_LEVEL }, { sinks }, levels);
  const messages = await logger.initialize();

  logger.info('🚀 SD-WAN UPS watchdog');
  logger.info(`🎯 ${config.sites.size} site(s) | ⏱️ every ${config.trigger.interval}s | 🔌 cycle after ${config.trigger.count} DOWN probes`);

  // Sink init warnings go straight to the console, after the title
  for (const message of messages) {
    if (!message.success) {
      consoleApi.log(formatLogMessage(levels.WARNING, message.message, levels));
    }
  }

  if (!env.TLS_VERIFY) {
    (options.processEnv ?? process.env).NODE_TLS_REJECT_UNAUTHORIZED = '0';
    logger.warning('TLS certificate verification is disabled (TLS_VERIFY=false)');
  }

  // SD-WAN manager login
  const sdwan = createSdwanClient({
    baseUrl: env.SDWAN_URL,
    username: env.SDWAN_USER,
    password: env.SDWAN_PASS,
    timeoutMs: env.HTTP_TIMEOUT_MS
  }, { fetchImpl, logger });

  try {
    await sdwan.authenticate();
  } catch (e) {
    logger.critical(describeError(e));
    return null;
  }

  const inventory = await loadInventory(() => sdwan.listDevices(), logger);
  const devicesBySite = collectSiteDevices(inventory, config.sites.keys(), logger);
  for (const [siteId, devices] of devicesBySite) {
    logger.info(`Site ${siteId}: ${devices.length} device(s) to monitor`);
  }

  const ups = createUpsClient({
    username: env.UPS_USER,
    password: env.UPS_PASS,
    timeoutMs: env.HTTP_TIMEOUT_MS
  }, { fetchImpl, logger });

  return {
    state: createMonitorState(now(), config, devicesBySite),
    logger,
    paths: sdwan,
    openSession: (address) => ups.openSession(address),
    powerCycle: {
      settleMs: APP_CONSTANTS.POWER_CYCLE_SETTLE_MS,
      confirmMs: APP_CONSTANTS.POWER_CYCLE_CONFIRM_MS,
      maxAttempts: APP_CONSTANTS.POWER_CYCLE_MAX_ATTEMPTS,
      sleep,
      logger
    },
    sleep,
    now
  };
}

/**
 * Fetch the device inventory; a failure leaves every site without devices
 * @param listDevices - Inventory fetch
 * @param logger - Logger
 * @returns Devices, or an empty list
 */
export async function loadInventory(
  listDevices: () => Promise<SdwanDevice[]>,
  logger: Logger
): Promise<SdwanDevice[]> {
  logger.info('Retrieving list of devices...');
  try {
    return await listDevices();
  } catch (e) {
    logger.critical(`Failed to retrieve device inventory: ${describeError(e)}`);
    return [];
  }
}
