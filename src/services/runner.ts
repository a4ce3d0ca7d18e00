import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { syncSalesInvoices } from './salesInvoiceSync.js';
import { syncPayments } from './paymentSync.js';
import { reconcilePayments } from './reconcile.js';
import { syncPurchaseBills } from './purchaseBillSync.js';
import { syncAccounts } from './accountSync.js';
import { syncProducts } from './productSync.js';
import type { JobName } from './jobNames.js';
import type { DateRange, JobResult } from '../types/index.js';

export { DEFAULT_SEQUENCE, JOB_NAMES, isJobName } from './jobNames.js';
export type { JobName } from './jobNames.js';

export interface RunOptions {
  range: DateRange;
  exportWorkbook: boolean;
  dryRun: boolean;
}

export interface JobDefinition {
  description: string;
  run: (options: RunOptions) => Promise<JobResult>;
}

export type JobRegistry = Record<JobName, JobDefinition>;

export const JOBS: JobRegistry = {
  'sales-invoices': {
    description: 'Sales invoices and their lines',
    run: options => syncSalesInvoices({ range: options.range, exportWorkbook: options.exportWorkbook }),
  },
  'payments': {
    description: 'Received payments, one row per invoice or category',
    run: options => syncPayments({ range: options.range }),
  },
  'reconcile-payments': {
    description: 'Rebuild payments stored without a client',
    run: options => reconcilePayments({ dryRun: options.dryRun }),
  },
  'purchase-bills': {
    description: 'Purchase bills with categories and retentions',
    run: options => syncPurchaseBills({ range: options.range }),
  },
  'accounts': {
    description: 'Chart of accounts (full load)',
    run: () => syncAccounts(),
  },
  'products': {
    description: 'Product items (full load)',
    run: () => syncProducts(),
  },
};

export interface JobOutcome {
  name: JobName;
  success: boolean;
  result: JobResult | null;
  error: string | null;
  durationMs: number;
}

export interface RunSummary {
  outcomes: JobOutcome[];
  succeeded: number;
  failed: number;
  exitCode: 0 | 1;
}

/**
 * Runs the jobs one after another. A failing or throwing job is logged and
 * the next one still runs. Exit code 1 only when every job failed.
 */
export async function runJobs(
  names: readonly JobName[],
  options: RunOptions,
  registry: JobRegistry = JOBS
): Promise<RunSummary> {
  const outcomes: JobOutcome[] = [];

  for (const [index, name] of names.entries()) {
    logger.info(`▶️  [${index + 1}/${names.length}] ${name}: ${registry[name].description}`);
    const startedAt = Date.now();

    try {
      const result = await registry[name].run(options);
      const durationMs = Date.now() - startedAt;
      outcomes.push({ name, success: result.success, result, error: null, durationMs });

      if (result.success) {
        logger.info(`   ${name} finished in ${(durationMs / 1000).toFixed(1)}s`);
      } else {
        logger.error(`   ${name} failed after ${(durationMs / 1000).toFixed(1)}s`);
      }
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      outcomes.push({ name, success: false, result: null, error: errorMessage(error), durationMs });
      logger.error(`   ${name} crashed: ${errorMessage(error)}`);
    }
  }

  const succeeded = outcomes.filter(outcome => outcome.success).length;
  const failed = outcomes.length - succeeded;
  const exitCode = outcomes.length > 0 && succeeded === 0 ? 1 : 0;

  logger.info('='.repeat(60));
  for (const outcome of outcomes) {
    logger.info(`   ${outcome.success ? '✅' : '❌'} ${outcome.name}`);
  }

  if (failed === 0) {
    logger.info(`✅ All ${succeeded} jobs succeeded`);
  } else if (succeeded > 0) {
    logger.warn(`⚠️  Partial success: ${succeeded} succeeded, ${failed} failed`);
  } else {
    logger.error(`❌ All ${failed} jobs failed`);
  }

  return { outcomes, succeeded, failed, exitCode };
}
