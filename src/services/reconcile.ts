import { alegra } from '../clients/alegra.js';
import { sharepoint } from '../clients/sharepoint.js';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { sleep } from '../utils/http.js';
import { paymentInvoiceIds } from './flatten.js';
import { uploadPaymentRows } from './paymentSync.js';
import { uploadSalesInvoice } from './salesInvoiceSync.js';
import type { GraphListItem, JobResult } from '../types/index.js';

/**
 * Repairs payments that reached the payments list before Alegra had a client
 * on them: every row of such a payment is deleted and rebuilt from the
 * current Alegra payment, then each invoice the payment touches is rebuilt
 * too (invoice row and its lines).
 */

const CLIENT_ID_FIELD = 'ID_x0020_Cliente';
const CLIENT_NAME_FIELD = 'Nombre_x0020_Cliente';
const INVOICE_ID_FIELD = 'ID_x0020_Factura';

export interface ReconcileStats {
  paymentsReviewed: number;
  paymentsRecreated: number;
  paymentsUnchanged: number;
  paymentErrors: number;
  invoicesRecreated: number;
  invoiceErrors: number;
  linesRecreated: number;
  linesDeleted: number;
  rowsDeleted: number;
}

export interface ReconcileOptions {
  dryRun?: boolean;
}

export interface ClientlessSummary {
  totalRows: number;
  clientlessRows: number;
  clientlessPayments: number;
}

function emptyStats(): ReconcileStats {
  return {
    paymentsReviewed: 0,
    paymentsRecreated: 0,
    paymentsUnchanged: 0,
    paymentErrors: 0,
    invoicesRecreated: 0,
    invoiceErrors: 0,
    linesRecreated: 0,
    linesDeleted: 0,
    rowsDeleted: 0,
  };
}

export function fieldText(item: GraphListItem, name: string): string {
  const value = item.fields?.[name];
  return value === null || value === undefined ? '' : String(value).trim();
}

export function isMissingClient(item: GraphListItem): boolean {
  return fieldText(item, CLIENT_ID_FIELD) === '' || fieldText(item, CLIENT_NAME_FIELD) === '';
}

/** Clientless payment rows grouped by payment id (the row Title). */
export function groupClientlessRows(items: GraphListItem[]): Map<string, GraphListItem[]> {
  const groups = new Map<string, GraphListItem[]>();
  for (const item of items) {
    const paymentId = fieldText(item, 'Title');
    if (!paymentId || !isMissingClient(item)) continue;
    const rows = groups.get(paymentId) ?? [];
    rows.push(item);
    groups.set(paymentId, rows);
  }
  return groups;
}

export class PaymentReconciler {
  readonly stats: ReconcileStats = emptyStats();
  private readonly dryRun: boolean;

  constructor(options: ReconcileOptions = {}) {
    this.dryRun = options.dryRun ?? false;
  }

  async run(): Promise<ReconcileStats> {
    const items = await sharepoint.getListItems(config.lists.payments);
    const groups = groupClientlessRows(items);
    logger.info(`   ${items.length} payment rows read, ${groups.size} payments without client`);

    for (const [paymentId, rows] of groups) {
      try {
        await this.reconcilePayment(paymentId, rows);
      } catch (error) {
        this.stats.paymentErrors++;
        logger.error(`   ❌ Payment ${paymentId}: ${errorMessage(error)}`);
      }
    }

    return this.stats;
  }

  private async reconcilePayment(paymentId: string, rows: GraphListItem[]): Promise<void> {
    this.stats.paymentsReviewed++;
    const payment = await alegra.getPayment(paymentId);
    const clientId = payment.client?.id;

    if (clientId === null || clientId === undefined || String(clientId).trim() === '') {
      logger.info(`   Payment ${paymentId} still has no client in Alegra`);
      this.stats.paymentsUnchanged++;
      return;
    }

    const clientName = payment.client?.name ?? '';
    if (this.dryRun) {
      logger.info(`   [dry run] Payment ${paymentId} now has client ${clientName} (${rows.length} rows to rebuild)`);
      this.stats.paymentsUnchanged++;
      return;
    }

    logger.info(`   🔄 Payment ${paymentId} now has client ${clientName}, rebuilding`);

    const invoiceIds = new Set<string>();
    for (const row of rows) {
      const invoiceId = fieldText(row, INVOICE_ID_FIELD);
      if (invoiceId) invoiceIds.add(invoiceId);
    }
    for (const invoiceId of paymentInvoiceIds(payment)) {
      invoiceIds.add(invoiceId);
    }

    const deleted = await this.deletePaymentRows(paymentId);
    this.stats.rowsDeleted += deleted;

    const created = await uploadPaymentRows(payment);
    if (created.rows.created === 0) {
      this.stats.paymentErrors++;
      logger.error(`   ❌ Payment ${paymentId}: no rows recreated after deleting ${deleted}`);
      return;
    }

    this.stats.paymentsRecreated++;
    logger.info(`   ✅ Payment ${paymentId}: ${deleted} rows deleted → ${created.rows.created} created`);

    for (const invoiceId of invoiceIds) {
      await this.recreateInvoice(invoiceId);
    }
  }

  private async deleteByTitle(listName: string, title: string): Promise<number> {
    const items = await sharepoint.findItemsByTitle(listName, title);
    let deleted = 0;

    for (const item of items) {
      try {
        await sharepoint.deleteListItem(listName, item.id);
        deleted++;
      } catch (error) {
        logger.warn(`   Could not delete item ${item.id} from "${listName}": ${errorMessage(error)}`);
      }
    }

    return deleted;
  }

  /** Deletes every row titled with the payment id, then re-checks once for leftovers. */
  private async deletePaymentRows(paymentId: string): Promise<number> {
    let deleted = await this.deleteByTitle(config.lists.payments, paymentId);

    if (deleted > 0) {
      await sleep(config.deletePauseMs);
    }

    const leftovers = await this.deleteByTitle(config.lists.payments, paymentId);
    if (leftovers > 0) {
      logger.warn(`   ${leftovers} leftover rows of payment ${paymentId} deleted on second pass`);
      deleted += leftovers;
    }

    return deleted;
  }

  private async recreateInvoice(invoiceId: string): Promise<void> {
    try {
      const invoice = await alegra.getInvoice(invoiceId);
      const number = invoice.numberTemplate?.fullNumber ?? '';

      // Lines are titled with the invoice number, not its id
      if (number) {
        this.stats.linesDeleted += await this.deleteByTitle(config.lists.salesInvoiceItems, number);
      } else {
        logger.warn(`   Invoice ${invoiceId} has no number, its lines are left in place`);
      }
      const invoicesDeleted = await this.deleteByTitle(config.lists.salesInvoices, invoiceId);

      const result = await uploadSalesInvoice(invoice);
      if (result.itemId === null) {
        this.stats.invoiceErrors++;
        logger.error(`   ❌ Invoice ${number || invoiceId}: recreated without an item id, lines not linked`);
        return;
      }
      this.stats.invoicesRecreated++;
      this.stats.linesRecreated += result.lines.created;
      logger.info(
        `   ✅ Invoice ${number || invoiceId}: ${invoicesDeleted} rows deleted → 1 created with ${result.lines.created} lines`
      );
    } catch (error) {
      this.stats.invoiceErrors++;
      logger.error(`   ❌ Invoice ${invoiceId}: ${errorMessage(error)}`);
    }
  }
}

export async function countPaymentsWithoutClient(): Promise<ClientlessSummary> {
  const items = await sharepoint.getListItems(config.lists.payments);
  const groups = groupClientlessRows(items);
  let clientlessRows = 0;
  for (const rows of groups.values()) {
    clientlessRows += rows.length;
  }
  return { totalRows: items.length, clientlessRows, clientlessPayments: groups.size };
}

export function logReconcileStats(stats: ReconcileStats): void {
  logger.info('📋 Reconcile summary');
  logger.info(`   Payments: ${stats.paymentsReviewed} reviewed, ${stats.paymentsRecreated} recreated, ` +
    `${stats.paymentsUnchanged} unchanged, ${stats.paymentErrors} errors`);
  logger.info(`   Invoices: ${stats.invoicesRecreated} recreated, ${stats.invoiceErrors} errors`);
  logger.info(`   Lines: ${stats.linesRecreated} recreated, ${stats.linesDeleted} deleted`);
  logger.info(`   Payment rows deleted: ${stats.rowsDeleted}`);
}

export async function reconcilePayments(options: ReconcileOptions = {}): Promise<JobResult> {
  logger.info(`🩹 Starting payment reconcile${options.dryRun ? ' (dry run)' : ''}...`);

  const reconciler = new PaymentReconciler(options);
  const stats = await reconciler.run();
  logReconcileStats(stats);

  return {
    success: stats.paymentErrors === 0 || stats.paymentsRecreated > 0,
    fetched: stats.paymentsReviewed,
    uploads: {
      payments: { created: stats.paymentsRecreated, failed: stats.paymentErrors },
      invoices: { created: stats.invoicesRecreated, failed: stats.invoiceErrors },
    },
  };
}
