import { alegra } from '../clients/alegra.js';
import { sharepoint } from '../clients/sharepoint.js';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { collectByDate, emptyCounts, forEachInBatches } from './batch.js';
import { flattenPayment } from './flatten.js';
import { paymentFields } from './listFields.js';
import type { AlegraPayment, DateRange, JobResult, UploadCounts } from '../types/index.js';

export interface PaymentJobOptions {
  range: DateRange;
}

export interface UploadedPayment {
  rows: UploadCounts;
  skipped: number;
}

/**
 * All unified rows of one payment → payments list. Row failures are counted,
 * never thrown.
 */
export async function uploadPaymentRows(payment: AlegraPayment): Promise<UploadedPayment> {
  const { rows, skipped } = flattenPayment(payment);
  const counts = emptyCounts();

  for (const row of rows) {
    try {
      await sharepoint.createListItem(config.lists.payments, paymentFields(row));
      counts.created++;
    } catch (error) {
      counts.failed++;
      const target = row.invoiceNumber || row.categoryName || 'no invoice';
      logger.error(`   ❌ Payment ${row.number || row.paymentId} (${row.kind}, ${target}): ${errorMessage(error)}`);
    }
  }

  return { rows: counts, skipped };
}

export async function syncPayments(options: PaymentJobOptions): Promise<JobResult> {
  const { range } = options;
  logger.info(`💳 Starting payment sync ${range.from} → ${range.to}...`);

  const { records, failedDates, allFailed } = await collectByDate(range, 'payments', date => alegra.getPaymentsByDate(date));
  const missed = failedDates.length > 0 ? { failedDates } : {};
  const payments = records.filter((payment): payment is AlegraPayment => payment !== null);
  let skipped = records.length - payments.length;
  const uploads = { payments: emptyCounts() };

  if (allFailed) {
    logger.error('❌ Payment sync failed: no date could be fetched from Alegra');
    return { success: false, fetched: 0, uploads, skipped, ...missed };
  }

  if (payments.length === 0) {
    logger.info('   No payments for this period');
    return { success: true, fetched: records.length, uploads, skipped, ...missed };
  }

  await forEachInBatches(payments, { label: 'payments' }, async (payment, index) => {
    const result = await uploadPaymentRows(payment);
    uploads.payments.created += result.rows.created;
    uploads.payments.failed += result.rows.failed;
    skipped += result.skipped;
    logger.debug(`   [${index + 1}/${payments.length}] Payment ${payment.id}: ${result.rows.created} rows`);
  });

  logger.info(`✅ Payments done: ${uploads.payments.created} rows created, ${uploads.payments.failed} failed`);

  return { success: uploads.payments.created > 0, fetched: records.length, uploads, skipped, ...missed };
}
