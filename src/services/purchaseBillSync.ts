import { alegra } from '../clients/alegra.js';
import { sharepoint } from '../clients/sharepoint.js';
import { config } from '../config/index.js';
import { PURCHASE_BILL_LOOKUP_FIELDS } from '../config/lookupFields.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { addCounts, collectByDate, emptyCounts, forEachInBatches } from './batch.js';
import {
  flattenPurchaseBill,
  flattenPurchaseCategories,
  flattenPurchaseRetentions,
} from './flatten.js';
import { purchaseBillFields, purchaseCategoryFields, purchaseRetentionFields } from './listFields.js';
import type { AlegraBill, DateRange, JobResult, ListFields, UploadCounts } from '../types/index.js';

export interface PurchaseBillJobOptions {
  range: DateRange;
}

interface ChildUpload {
  label: string;
  fields: ListFields;
}

async function uploadChildren(listName: string, children: ChildUpload[], billItemId: string): Promise<UploadCounts> {
  const counts = emptyCounts();

  for (const child of children) {
    try {
      await sharepoint.createListItemWithLookup(listName, child.fields, {
        candidates: PURCHASE_BILL_LOOKUP_FIELDS,
        value: billItemId,
      });
      counts.created++;
    } catch (error) {
      counts.failed++;
      logger.error(`   ❌ ${child.label}: ${errorMessage(error)}`);
    }
  }

  return counts;
}

/**
 * Purchase bills of a date range → bills list, with their purchase categories
 * and retentions linked to the created bill row.
 */
export async function syncPurchaseBills(options: PurchaseBillJobOptions): Promise<JobResult> {
  const { range } = options;
  logger.info(`📥 Starting purchase bill sync ${range.from} → ${range.to}...`);

  const { records, failedDates, allFailed } = await collectByDate(range, 'bills', date => alegra.getBillsByDate(date));
  const missed = failedDates.length > 0 ? { failedDates } : {};
  const bills = records.filter((bill): bill is AlegraBill => bill !== null);
  let skipped = records.length - bills.length;

  const uploads = { bills: emptyCounts(), categories: emptyCounts(), retentions: emptyCounts() };

  if (allFailed) {
    logger.error('❌ Purchase bill sync failed: no date could be fetched from Alegra');
    return { success: false, fetched: 0, uploads, skipped, ...missed };
  }

  if (bills.length === 0) {
    logger.info('   No purchase bills to upload');
    return { success: true, fetched: records.length, uploads, skipped, ...missed };
  }

  await forEachInBatches(bills, { label: 'bills' }, async (bill, index) => {
    const row = flattenPurchaseBill(bill);
    const label = row.number || row.id;

    let itemId: string | null;
    try {
      itemId = await sharepoint.createListItem(config.lists.purchaseBills, purchaseBillFields(row));
      uploads.bills.created++;
    } catch (error) {
      uploads.bills.failed++;
      logger.error(`   ❌ [${index + 1}/${bills.length}] Bill ${label}: ${errorMessage(error)}`);
      return;
    }

    const categories = flattenPurchaseCategories(bill);
    const retentions = flattenPurchaseRetentions(bill);
    skipped += categories.skipped + retentions.skipped;

    if (itemId === null) {
      logger.warn(`   Bill ${label} created without an item id, children not linked`);
      uploads.categories.failed += categories.rows.length;
      uploads.retentions.failed += retentions.rows.length;
      return;
    }

    const categoryCounts = await uploadChildren(
      config.lists.purchaseCategories,
      categories.rows.map(category => ({
        label: `Category "${category.categoryName}" of bill ${label}`,
        fields: purchaseCategoryFields(category),
      })),
      itemId
    );
    const retentionCounts = await uploadChildren(
      config.lists.purchaseRetentions,
      retentions.rows.map(retention => ({
        label: `Retention ${retention.id} of bill ${label}`,
        fields: purchaseRetentionFields(retention),
      })),
      itemId
    );

    addCounts(uploads.categories, categoryCounts);
    addCounts(uploads.retentions, retentionCounts);
    logger.info(
      `   ✅ [${index + 1}/${bills.length}] Bill ${label}: ` +
      `${categoryCounts.created} categories, ${retentionCounts.created} retentions`
    );
  });

  logger.info(
    `✅ Purchase bills done: ${uploads.bills.created} created, ${uploads.bills.failed} failed; ` +
    `categories ${uploads.categories.created}/${uploads.categories.failed}, ` +
    `retentions ${uploads.retentions.created}/${uploads.retentions.failed} (created/failed)`
  );

  return { success: uploads.bills.created > 0, fetched: records.length, uploads, skipped, ...missed };
}
