import { alegra } from '../clients/alegra.js';
import { sharepoint } from '../clients/sharepoint.js';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { emptyCounts, forEachInBatches } from './batch.js';
import { flattenProduct } from './flatten.js';
import { productFields } from './listFields.js';
import type { AlegraItem, JobResult } from '../types/index.js';

export async function syncProducts(): Promise<JobResult> {
  logger.info('📦 Starting product item sync...');

  const records = await alegra.getItems();
  const items = records.filter((item): item is AlegraItem => item !== null);
  const skipped = records.length - items.length;
  const uploads = { products: emptyCounts() };

  await forEachInBatches(items.map(flattenProduct), { label: 'products' }, async (product, index) => {
    try {
      await sharepoint.createListItem(config.lists.products, productFields(product));
      uploads.products.created++;
      logger.debug(`   ✅ [${index + 1}/${items.length}] ${product.name}`);
    } catch (error) {
      uploads.products.failed++;
      logger.error(`   ❌ [${index + 1}/${items.length}] ${product.name}: ${errorMessage(error)}`);
    }
  });

  logger.info(`✅ Products done: ${uploads.products.created} created, ${uploads.products.failed} failed`);

  return {
    success: items.length === 0 || uploads.products.created > 0,
    fetched: records.length,
    uploads,
    skipped,
  };
}
