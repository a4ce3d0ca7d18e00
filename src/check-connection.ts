#!/usr/bin/env node

/**
 * Checks the Azure AD app, the SharePoint site, every configured list and the
 * Alegra credentials without writing anything.
 */

import { alegra } from './clients/alegra.js';
import { sharepoint } from './clients/sharepoint.js';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { yesterday } from './utils/dates.js';

async function checkConnections() {
  logger.info('🔍 Checking connections...');

  let allSuccess = true;

  try {
    await sharepoint.getAccessToken();
    const siteId = await sharepoint.getSiteId();
    logger.info(`✅ SharePoint: site ${config.siteUrl} → ${siteId}`);
  } catch (error) {
    logger.error('❌ SharePoint: authentication or site lookup failed', error);
    process.exit(1);
  }

  for (const [key, listName] of Object.entries(config.lists)) {
    try {
      const listId = await sharepoint.getListId(listName);
      logger.info(`✅ List ${key}: "${listName}" → ${listId}`);
    } catch (error) {
      logger.error(`❌ List ${key}: "${listName}"`, error);
      allSuccess = false;
    }
  }

  try {
    const day = yesterday();
    const invoices = await alegra.getInvoicesByDate(day);
    logger.info(`✅ Alegra: ${invoices.length} invoices on ${day}`);
  } catch (error) {
    logger.error('❌ Alegra: request failed', error);
    allSuccess = false;
  }

  if (allSuccess) {
    logger.info('✅ All connections OK');
  } else {
    logger.warn('⚠️  Some checks failed');
  }
  process.exit(allSuccess ? 0 : 1);
}

checkConnections().catch((error) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
