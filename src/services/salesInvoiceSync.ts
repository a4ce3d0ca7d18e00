import { alegra } from '../clients/alegra.js';
import { sharepoint } from '../clients/sharepoint.js';
import { config } from '../config/index.js';
import { SALES_INVOICE_LOOKUP_FIELDS } from '../config/lookupFields.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { fileTimestamp } from '../utils/dates.js';
import { addCounts, collectByDate, emptyCounts, forEachInBatches } from './batch.js';
import { flattenSalesInvoice, flattenSalesInvoiceItems } from './flatten.js';
import { salesInvoiceFields, salesInvoiceItemFields } from './listFields.js';
import {
  SALES_INVOICE_COLUMNS,
  SALES_INVOICE_ITEM_COLUMNS,
  buildSalesStatistics,
  buildWorkbook,
  salesWorkbookName,
  statisticsSheet,
  toWorksheet,
} from './workbook.js';
import type {
  AlegraInvoice,
  DateRange,
  JobResult,
  SalesInvoiceItemRow,
  SalesInvoiceRow,
  UploadCounts,
} from '../types/index.js';

export interface SalesInvoiceJobOptions {
  range: DateRange;
  exportWorkbook?: boolean;
}

export interface UploadedInvoice {
  itemId: string | null;
  lines: UploadCounts;
  skippedLines: number;
}

/**
 * Create the invoice row, then its lines pointing at the new row through the
 * invoice lookup column. Throws when the invoice row itself is rejected.
 */
export async function uploadSalesInvoice(invoice: AlegraInvoice): Promise<UploadedInvoice> {
  const row = flattenSalesInvoice(invoice);
  const itemId = await sharepoint.createListItem(config.lists.salesInvoices, salesInvoiceFields(row));
  const { rows: lines, skipped } = flattenSalesInvoiceItems(invoice);
  const counts = emptyCounts();

  if (itemId === null) {
    logger.warn(`Invoice ${row.number || row.id} created without an item id, ${lines.length} lines not linked`);
    counts.failed += lines.length;
    return { itemId, lines: counts, skippedLines: skipped };
  }

  for (const line of lines) {
    try {
      await sharepoint.createListItemWithLookup(config.lists.salesInvoiceItems, salesInvoiceItemFields(line), {
        candidates: SALES_INVOICE_LOOKUP_FIELDS,
        value: itemId,
      });
      counts.created++;
    } catch (error) {
      counts.failed++;
      logger.error(`   ❌ Line "${line.name}" of invoice ${row.number}: ${errorMessage(error)}`);
    }
  }

  return { itemId, lines: counts, skippedLines: skipped };
}

async function exportSalesWorkbook(
  range: DateRange,
  invoices: SalesInvoiceRow[],
  lines: SalesInvoiceItemRow[]
): Promise<string | null> {
  try {
    const sheets = [toWorksheet({ name: 'Facturas', columns: SALES_INVOICE_COLUMNS, rows: invoices })];
    const withLines = lines.length > 0
      ? [...sheets, toWorksheet({ name: 'Items_Detalle', columns: SALES_INVOICE_ITEM_COLUMNS, rows: lines })]
      : sheets;
    const content = buildWorkbook([
      ...withLines,
      statisticsSheet(buildSalesStatistics(range, invoices)),
    ]);
    const uploaded = await sharepoint.uploadFile(salesWorkbookName(range, fileTimestamp()), content, {
      folder: config.exportFolder,
      overwrite: false,
    });
    logger.info(`📊 Workbook uploaded: ${uploaded.name}${uploaded.webUrl ? ` (${uploaded.webUrl})` : ''}`);
    return uploaded.name;
  } catch (error) {
    logger.error(`Workbook export failed: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Sales invoices of a date range → invoices list + lines list.
 */
export async function syncSalesInvoices(options: SalesInvoiceJobOptions): Promise<JobResult> {
  const { range } = options;
  logger.info(`🧾 Starting sales invoice sync ${range.from} → ${range.to}...`);

  const { records, failedDates, allFailed } = await collectByDate(range, 'invoices', date => alegra.getInvoicesByDate(date));
  const missed = failedDates.length > 0 ? { failedDates } : {};
  const invoices = records.filter((invoice): invoice is AlegraInvoice => invoice !== null);
  let skipped = records.length - invoices.length;
  if (skipped > 0) {
    logger.warn(`   ${skipped} empty invoice entries skipped`);
  }

  const uploads = { invoices: emptyCounts(), lines: emptyCounts() };
  let exportedFile: string | null = null;

  if (allFailed) {
    logger.error('❌ Sales invoice sync failed: no date could be fetched from Alegra');
    return { success: false, fetched: 0, uploads, skipped, ...missed };
  }

  if (invoices.length === 0) {
    logger.info('   No invoices to upload');
    return { success: true, fetched: records.length, uploads, skipped, ...missed };
  }

  if (options.exportWorkbook) {
    const rows = invoices.map(flattenSalesInvoice);
    const lines = invoices.flatMap(invoice => flattenSalesInvoiceItems(invoice).rows);
    exportedFile = await exportSalesWorkbook(range, rows, lines);
  }

  await forEachInBatches(invoices, { label: 'invoices' }, async (invoice, index) => {
    const number = invoice.numberTemplate?.fullNumber ?? String(invoice.id);
    try {
      const result = await uploadSalesInvoice(invoice);
      uploads.invoices.created++;
      addCounts(uploads.lines, result.lines);
      skipped += result.skippedLines;
      logger.info(`   ✅ [${index + 1}/${invoices.length}] Invoice ${number}: ${result.lines.created} lines`);
    } catch (error) {
      uploads.invoices.failed++;
      logger.error(`   ❌ [${index + 1}/${invoices.length}] Invoice ${number}: ${errorMessage(error)}`);
    }
  });

  logger.info(
    `✅ Sales invoices done: ${uploads.invoices.created} created, ${uploads.invoices.failed} failed; ` +
    `lines ${uploads.lines.created} created, ${uploads.lines.failed} failed`
  );

  return {
    success: uploads.invoices.created > 0,
    fetched: records.length,
    uploads,
    skipped,
    exportedFile,
    ...missed,
  };
}
