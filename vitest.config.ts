import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      ALEGRA_EMAIL: 'sync@example.com',
      ALEGRA_TOKEN: 'test-token',
      AZURE_TENANT_ID: 'test-tenant',
      AZURE_CLIENT_ID: 'test-client',
      AZURE_CLIENT_SECRET: 'test-secret',
      SHAREPOINT_SITE_URL: 'https://contoso.sharepoint.com/sites/Finanzas',
      ALEGRA_PAGE_PAUSE_MS: '0',
      RATE_LIMIT_PAUSE_MS: '0',
      BATCH_PAUSE_MS: '0',
      DELETE_PAUSE_MS: '0',
      DATE_PAUSE_MS: '0',
      LOG_LEVEL: 'error',
    },
  },
});
