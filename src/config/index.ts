import { getBackfillWindow, getEnvInt, getEnvVar, getLogLevel } from './env.js';
import type { AppConfig } from '../types/index.js';

const backfill = getBackfillWindow();

export const config: AppConfig = {
  // Alegra
  alegraEmail: getEnvVar('ALEGRA_EMAIL'),
  alegraToken: getEnvVar('ALEGRA_TOKEN'),

  // Azure AD app (client credentials)
  azureTenantId: getEnvVar('AZURE_TENANT_ID'),
  azureClientId: getEnvVar('AZURE_CLIENT_ID'),
  azureClientSecret: getEnvVar('AZURE_CLIENT_SECRET'),

  // SharePoint
  siteUrl: getEnvVar('SHAREPOINT_SITE_URL'),
  lists: {
    salesInvoices: getEnvVar('LIST_SALES_INVOICES', false) || 'Facturas de Venta',
    salesInvoiceItems: getEnvVar('LIST_SALES_INVOICE_ITEMS', false) || 'Items Facturas de Venta',
    payments: getEnvVar('LIST_PAYMENTS', false) || 'Pagos',
    purchaseBills: getEnvVar('LIST_PURCHASE_BILLS', false) || 'Facturas de Compra',
    purchaseCategories: getEnvVar('LIST_PURCHASE_CATEGORIES', false) || 'Categorias Facturas Compra',
    purchaseRetentions: getEnvVar('LIST_PURCHASE_RETENTIONS', false) || 'Retenciones Facturas de Compra',
    accounts: getEnvVar('LIST_ACCOUNTS', false) || 'Cuentas Contables',
    products: getEnvVar('LIST_PRODUCTS', false) || 'Items',
  },
  exportFolder: getEnvVar('EXPORT_FOLDER', false) || 'Documentos compartidos/Datos/Alegra',

  // Backfill
  backfillStartDate: backfill.startDate,
  backfillEndDate: backfill.endDate,
  batchSize: getEnvInt('BATCH_SIZE', 50) || 50,

  // Pauses (ms)
  alegraPagePauseMs: getEnvInt('ALEGRA_PAGE_PAUSE_MS', 500),
  rateLimitPauseMs: getEnvInt('RATE_LIMIT_PAUSE_MS', 2000),
  rateLimitRetries: getEnvInt('RATE_LIMIT_RETRIES', 1),
  batchPauseMs: getEnvInt('BATCH_PAUSE_MS', 2000),
  deletePauseMs: getEnvInt('DELETE_PAUSE_MS', 2000),
  datePauseMs: getEnvInt('DATE_PAUSE_MS', 1000),
  requestTimeoutMs: getEnvInt('REQUEST_TIMEOUT_MS', 60000),

  // Scheduling / logging
  syncCron: getEnvVar('SYNC_CRON', false) || '0 6 * * *',
  logLevel: getLogLevel(),
  logDir: getEnvVar('LOG_DIR', false) || 'logs',
};

// API endpoints
export const ALEGRA_API_BASE = 'https://api.alegra.com/api/v1';
export const GRAPH_API_BASE = 'https://graph.microsoft.com/v1.0';
export const AZURE_LOGIN_BASE = 'https://login.microsoftonline.com';
export const GRAPH_SCOPE = 'https://graph.microsoft.com/.default';
