import { alegra } from '../clients/alegra.js';
import { sharepoint } from '../clients/sharepoint.js';
import { config } from '../config/index.js';
import { PARENT_ACCOUNT_LOOKUP_FIELDS } from '../config/lookupFields.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { emptyCounts } from './batch.js';
import { analyzeAccountTree, flattenAccount } from './flatten.js';
import { accountFields } from './listFields.js';
import type { AccountRow, JobResult } from '../types/index.js';

/**
 * Upload order for the chart of accounts: roots first, then every account
 * whose parent already has a list item id. Each pass uploads the accounts
 * that became ready in the previous one; stops when a pass adds nothing.
 */
export async function uploadAccountTree(accounts: AccountRow[]): Promise<JobResult> {
  const uploads = { accounts: emptyCounts() };
  // Alegra account id → SharePoint item id
  const itemIds = new Map<string, string>();
  let pending = accounts;
  let pass = 0;

  while (pending.length > 0) {
    const ready = pending.filter(account => account.parentId === null || itemIds.has(account.parentId));
    if (ready.length === 0) break;

    pass++;
    logger.info(`   Pass ${pass}: ${ready.length} accounts`);
    const readySet = new Set(ready);
    pending = pending.filter(account => !readySet.has(account));

    for (const account of ready) {
      const parentItemId = account.parentId === null ? undefined : itemIds.get(account.parentId);
      try {
        const itemId = parentItemId === undefined
          ? await sharepoint.createListItem(config.lists.accounts, accountFields(account))
          : await sharepoint.createListItemWithLookup(config.lists.accounts, accountFields(account), {
              candidates: PARENT_ACCOUNT_LOOKUP_FIELDS,
              value: parentItemId,
            });
        uploads.accounts.created++;
        if (itemId !== null) {
          itemIds.set(account.id, itemId);
        }
        logger.debug(`   ✅ ${account.code || account.id} ${account.name}`);
      } catch (error) {
        uploads.accounts.failed++;
        logger.error(`   ❌ Account ${account.id} ${account.name}: ${errorMessage(error)}`);
      }
    }
  }

  for (const account of pending) {
    logger.warn(`   Skipping ${account.name} (${account.id}): parent ${account.parentId} was not created`);
  }

  return {
    success: accounts.length === 0 || uploads.accounts.created > 0,
    fetched: accounts.length,
    uploads,
    skipped: pending.length,
  };
}

export async function syncAccounts(): Promise<JobResult> {
  logger.info('📚 Starting chart of accounts sync...');

  const accounts = (await alegra.getAccounts()).map(flattenAccount);
  const tree = analyzeAccountTree(accounts);
  logger.info(`   ${tree.total} accounts, ${tree.roots} roots, max depth ${tree.maxDepth}`);
  for (const [type, count] of Object.entries(tree.byType).sort(([a], [b]) => a.localeCompare(b))) {
    logger.info(`     ${type}: ${count}`);
  }

  const result = await uploadAccountTree(accounts);
  logger.info(
    `✅ Accounts done: ${result.uploads.accounts.created} created, ` +
    `${result.uploads.accounts.failed} failed, ${result.skipped ?? 0} skipped`
  );
  return result;
}
