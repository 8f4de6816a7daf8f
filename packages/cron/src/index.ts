#!/usr/bin/env node
/**
 * cinefeed
 *
 * Runs the catalog and channel jobs on their own intervals until SIGINT or
 * SIGTERM. With --once the selected jobs run a single time and the process
 * exits non-zero if any of them ended in "error".
 *
 * Configuration: config/cron.yaml (CINEFEED_CONFIG_PATH), plus environment overrides.
 */

import { Command } from 'commander';
import { createLogger } from '@cinefeed/shared';
import { createApp, selectJobs } from './app.js';
import { loadConfig, type AppConfig } from './config.js';

interface CliOptions {
  config?: string;
  once?: boolean;
  catalog?: boolean;
  channels?: boolean;
}

const program = new Command();

program
  .name('cinefeed')
  .description('Publish the Cineplexx repertoire and Telegram channels as RSS feeds')
  .version('1.0.0')
  .option('-c, --config <path>', 'configuration file')
  .option('--once', 'run the jobs once and exit')
  .option('--catalog', 'with --once, run the catalog job')
  .option('--channels', 'with --once, run the channel job')
  .action(async () => {
    const options = program.opts<CliOptions>();
    const bootLogger = createLogger();

    let config: AppConfig;
    try {
      config = loadConfig({ configPath: options.config, logger: bootLogger });
    } catch (error) {
      bootLogger.fatal({ err: error }, 'config_invalid');
      process.exitCode = 1;
      return;
    }

    const logger = createLogger({ level: config.logLevel });
    const app = await createApp(config, logger);
    logger.info({ runId: app.runId, outDir: config.output.outDir }, 'cinefeed_start');

    if (options.once) {
      const records = await app.scheduler.runJobs(selectJobs(app.jobs, options));
      await app.close();
      process.exitCode = records.some((record) => record.status === 'error') ? 1 : 0;
      return;
    }

    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info({ signal }, 'shutdown_requested');
      app.scheduler.stop();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    await app.scheduler.run();
    await app.close();
  });

await program.parseAsync();
