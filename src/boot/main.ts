/**
 * SD-WAN UPS watchdog entry point
 */

import * as dotenv from 'dotenv';
import { program } from 'commander';

import { APP_CONSTANTS, loadEnvConfig } from './config';
import { initialize } from './init';
import { parseLogLevel } from '@logging';
import { runMonitor } from '@system/monitor';
import { ConfigValidationError, describeError } from '$types/errors';

import type { WatchdogEnvConfig } from '$types/config';
import type { CliOptions } from './types';

dotenv.config();

program
  .name('sdwan-ups-watchdog')
  .description('Power-cycle a site\'s UPS outlet when all of its SD-WAN paths are down')
  .option('-c, --config <path>', 'YAML configuration file (default: CONFIG_PATH or ./config.yaml)')
  .option('--once', 'Run a single health-check pass and exit')
  .option('-l, --log-level <level>', 'DEBUG, INFO, WARNING or CRITICAL (default: LOG_LEVEL)')
  .parse(process.argv);

const options = program.opts<CliOptions>();

async function main(): Promise<number> {
  let env: WatchdogEnvConfig;
  try {
    env = loadEnvConfig(process.env);
  } catch (e) {
    console.error(`INIT FAIL: ${describeError(e)}`);
    if (e instanceof ConfigValidationError) {
      for (const problem of e.problems) {
        console.error(`  ${problem}`);
      }
    }
    return 1;
  }

  const monitor = await initialize({
    env,
    configPath: options.config,
    logLevel: parseLogLevel(options.logLevel, APP_CONSTANTS.LOG_LEVELS, env.LOG_LEVEL)
  });

  if (!monitor) {
    return 1;
  }

  process.once('SIGINT', () => {
    monitor.logger.info('Received Ctrl-C. Quitting...');
    process.exit(0);
  });
  process.once('SIGTERM', () => {
    monitor.logger.info('Received SIGTERM. Quitting...');
    process.exit(0);
  });

  await runMonitor(monitor, { once: options.once === true });
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Watchdog crashed: ${describeError(err)}`);
    process.exit(1);
  }
);
