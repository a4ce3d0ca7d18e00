import { config } from '../config/index.js';
import { logger } from './logger.js';

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * fetch() with a hard timeout. Timeouts surface as a `TimeoutError`
 * with the url in the message.
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit = {},
  timeout: number = config.requestTimeoutMs
): Promise<Response> {
  logger.debug(`${options.method ?? 'GET'} ${url}`);

  try {
    return await fetch(url, {
      ...options,
      signal: AbortSignal.timeout(timeout),
    });
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      const timeoutError = new Error(`Request timeout after ${timeout / 1000} seconds: ${url}`);
      timeoutError.name = 'TimeoutError';
      throw timeoutError;
    }
    throw error;
  }
}
