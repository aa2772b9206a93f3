/**
 * Entry point for power-control.
 *
 * Loads configuration from the environment and runs the power-control job,
 * either once or every hour.
 */

import type { Config, RunReport } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { ConfigError, loadConfig } from './core/config';
import { Orchestrator } from './core/orchestrator';
import { runHourly } from './core/scheduler';

const logger = setupLogger('power-control:main');

/**
 * Execute a single power-control run.
 */
export async function runOnce(config: Config, now: Date = new Date()): Promise<RunReport> {
  const orchestrator = new Orchestrator(config);
  return orchestrator.run(now);
}

/**
 * Run power-control with the given environment.
 *
 * @param env - Environment to read configuration from
 * @returns Process exit code
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let config: Config;
  try {
    config = loadConfig(env);
  } catch (error) {
    logger.fatal(
      { error: error instanceof ConfigError ? error.message : String(error) },
      'Invalid configuration'
    );
    return 1;
  }

  logger.debug(`power-control ${config.version}`);
  logger.info(
    {
      protectedOwners: config.protectedOwners,
      tz: config.tz,
      dryRun: config.dryRun,
      action: config.powerAction,
      sendEmail: config.sendEmail,
    },
    'Configuration loaded'
  );

  if (config.immediate) {
    try {
      await runOnce(config);
      return 0;
    } catch (error) {
      logger.fatal({ error: String(error) }, 'Power-control run failed');
      return 1;
    }
  }

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Received shutdown signal');
    controller.abort();
  };
  process.once('SIGTERM', stop);
  process.once('SIGINT', stop);

  try {
    await runHourly(() => runOnce(config), controller.signal);
  } finally {
    process.off('SIGTERM', stop);
    process.off('SIGINT', stop);
  }
  return 0;
}
