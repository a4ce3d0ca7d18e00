import { ALEGRA_API_BASE, config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { ApiError } from '../utils/errors.js';
import { fetchWithTimeout, sleep } from '../utils/http.js';
import type {
  AlegraAccount,
  AlegraBill,
  AlegraInvoice,
  AlegraItem,
  AlegraPayment,
} from '../types/index.js';

/**
 * Alegra API Client
 * Documentation: https://developer.alegra.com/
 */

// Alegra caps `limit` at 30 for list endpoints
const PAGE_SIZE = 30;

export interface AlegraSettings {
  email: string;
  token: string;
  pagePauseMs: number;
  rateLimitPauseMs: number;
  rateLimitRetries: number;
}

type QueryParams = Record<string, string | number>;

class AlegraClient {
  private settings: AlegraSettings;

  constructor(settings?: Partial<AlegraSettings>) {
    this.settings = {
      email: config.alegraEmail,
      token: config.alegraToken,
      pagePauseMs: config.alegraPagePauseMs,
      rateLimitPauseMs: config.rateLimitPauseMs,
      rateLimitRetries: config.rateLimitRetries,
      ...settings,
    };
  }

  private authHeader(): string {
    const credentials = Buffer.from(`${this.settings.email}:${this.settings.token}`).toString('base64');
    return `Basic ${credentials}`;
  }

  /**
   * GET against the Alegra API. A 429 waits `rateLimitPauseMs` and retries,
   * up to `rateLimitRetries` times.
   */
  private async fetch<T>(endpoint: string, params: QueryParams = {}): Promise<T> {
    const query = new URLSearchParams(
      Object.entries(params).map(([key, value]): [string, string] => [key, String(value)])
    ).toString();
    const url = `${ALEGRA_API_BASE}${endpoint}${query ? `?${query}` : ''}`;

    for (let attempt = 0; ; attempt++) {
      const response = await fetchWithTimeout(url, {
        method: 'GET',
        headers: {
          'Accept': 'application/json',
          'Authorization': this.authHeader(),
        },
      });

      if (response.status === 429 && attempt < this.settings.rateLimitRetries) {
        logger.warn(`Alegra rate limit (429) on ${endpoint}, waiting ${this.settings.rateLimitPauseMs / 1000}s before retry...`);
        await sleep(this.settings.rateLimitPauseMs);
        continue;
      }

      if (!response.ok) {
        const errorText = await response.text();
        logger.error(`Alegra API error [${response.status}]:`, errorText);
        throw new ApiError('Alegra', response.status, errorText);
      }

      return response.json() as Promise<T>;
    }
  }

  /**
   * Walks `start`/`limit` pages until a short or empty page comes back.
   */
  private async fetchAllPages<T>(endpoint: string, params: QueryParams = {}): Promise<T[]> {
    const results: T[] = [];
    let start = 0;

    while (true) {
      logger.debug(`Fetching ${endpoint} ${start + 1} - ${start + PAGE_SIZE}...`);
      const page = await this.fetch<T[] | null>(endpoint, { ...params, start, limit: PAGE_SIZE });

      if (!page || page.length === 0) {
        break;
      }

      results.push(...page);

      if (page.length < PAGE_SIZE) {
        break;
      }

      start += PAGE_SIZE;
      await sleep(this.settings.pagePauseMs);
    }

    return results;
  }

  /**
   * Sales invoices issued on `date` (YYYY-MM-DD)
   */
  async getInvoicesByDate(date: string): Promise<Array<AlegraInvoice | null>> {
    const invoices = await this.fetchAllPages<AlegraInvoice | null>('/invoices', { date });
    logger.info(`Fetched ${invoices.length} invoices from Alegra for ${date}`);
    return invoices;
  }

  /**
   * Purchase bills dated `date` (YYYY-MM-DD)
   */
  async getBillsByDate(date: string): Promise<Array<AlegraBill | null>> {
    const bills = await this.fetchAllPages<AlegraBill | null>('/bills', { date });
    logger.info(`Fetched ${bills.length} bills from Alegra for ${date}`);
    return bills;
  }

  /**
   * Payments dated `date` (YYYY-MM-DD), newest first, reconciled only
   */
  async getPaymentsByDate(date: string): Promise<Array<AlegraPayment | null>> {
    const payments = await this.fetchAllPages<AlegraPayment | null>('/payments', {
      order_direction: 'DESC',
      metadata: 'false',
      includeUnconciliated: 'false',
      date,
    });
    logger.info(`Fetched ${payments.length} payments from Alegra for ${date}`);
    return payments;
  }

  async getInvoice(id: string): Promise<AlegraInvoice> {
    return this.fetch<AlegraInvoice>(`/invoices/${encodeURIComponent(id)}`);
  }

  async getPayment(id: string): Promise<AlegraPayment> {
    return this.fetch<AlegraPayment>(`/payments/${encodeURIComponent(id)}`);
  }

  /**
   * Whole chart of accounts as a flat list (`idParent` links children to parents)
   */
  async getAccounts(): Promise<AlegraAccount[]> {
    const accounts = await this.fetch<AlegraAccount[]>('/categories', { format: 'plain' });
    logger.info(`Fetched ${accounts.length} accounts from Alegra`);
    return accounts;
  }

  async getItems(): Promise<Array<AlegraItem | null>> {
    const items = await this.fetchAllPages<AlegraItem | null>('/items');
    logger.info(`Fetched ${items.length} items from Alegra`);
    return items;
  }
}

export { AlegraClient };
export const alegra = new AlegraClient();
