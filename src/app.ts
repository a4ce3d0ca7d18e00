import cron from 'node-cron';
import { CliError } from './cli.js';
import type { CliOptions } from './cli.js';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { fileTimestamp, yesterday } from './utils/dates.js';
import { countPaymentsWithoutClient } from './services/reconcile.js';
import { runJobs } from './services/runner.js';

async function runOnce(options: CliOptions): Promise<0 | 1> {
  const summary = await runJobs(options.jobs, {
    range: options.range,
    exportWorkbook: options.exportWorkbook,
    dryRun: options.dryRun,
  });
  return summary.exitCode;
}

async function showStats(): Promise<void> {
  const stats = await countPaymentsWithoutClient();
  logger.info('📊 Payments list');
  logger.info(`   Rows: ${stats.totalRows}`);
  logger.info(`   Rows without client: ${stats.clientlessRows}`);
  logger.info(`   Payments without client: ${stats.clientlessPayments}`);
}

/**
 * Keeps the process alive and runs the jobs on SYNC_CRON, each time for the
 * previous day. A trigger that fires while a run is still going is skipped.
 */
function startSchedule(options: CliOptions): void {
  if (!cron.validate(config.syncCron)) {
    throw new CliError(`Invalid SYNC_CRON expression "${config.syncCron}"`);
  }

  let isRunning = false;

  const trigger = async () => {
    if (isRunning) {
      logger.warn('⏰ Previous run still in progress, skipping this trigger');
      return;
    }

    isRunning = true;
    try {
      const day = yesterday();
      logger.info(`⏰ Scheduled sync for ${day}`);
      await runOnce({ ...options, range: { from: day, to: day } });
    } finally {
      isRunning = false;
    }
  };

  cron.schedule(config.syncCron, () => {
    trigger().catch(error => logger.error('Scheduled run failed:', error));
  });

  logger.info(`⏰ Scheduled: ${config.syncCron} (${options.jobs.join(', ')})`);

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down...`);
    process.exit(0);
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

/**
 * Everything past argument parsing. Loading this module reads the full
 * configuration, so missing credentials fail here and not on --help.
 */
export async function runCommand(options: CliOptions): Promise<void> {
  if (options.dev) {
    logger.setLevel('debug');
  }

  const logFile = logger.attachFile(config.logDir, `alegra_${options.command}`, fileTimestamp());
  logger.info('🚀 Alegra → SharePoint sync starting...');
  logger.info('Configuration:', {
    command: options.command,
    jobs: options.jobs,
    range: options.range,
    site: config.siteUrl,
    export: options.exportWorkbook,
    dryRun: options.dryRun,
    logFile,
  });

  switch (options.command) {
    case 'stats':
      await showStats();
      break;
    case 'schedule':
      startSchedule(options);
      break;
    case 'run':
      process.exitCode = await runOnce(options);
      logger.info(`Log saved to ${logFile}`);
      break;
    case 'help':
      break;
  }
}
