import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { chunk, dateRange } from '../utils/dates.js';
import { sleep } from '../utils/http.js';
import type { DateRange, UploadCounts } from '../types/index.js';

// Longer pause after this many dates of a backfill
const DATES_PER_PAUSE = 10;

export interface CollectedRecords<T> {
  records: Array<T | null>;
  failedDates: string[];
  // Every date failed, so nothing was learned about the range
  allFailed: boolean;
}

/**
 * Fetch one day at a time over an inclusive range. A failing date is logged
 * and skipped; the others still count.
 */
export async function collectByDate<T>(
  range: DateRange,
  label: string,
  fetchDate: (date: string) => Promise<Array<T | null>>
): Promise<CollectedRecords<T>> {
  const dates = dateRange(range.from, range.to);
  const records: Array<T | null> = [];
  const failedDates: string[] = [];

  for (const [index, date] of dates.entries()) {
    if (dates.length > 1) {
      logger.info(`   Date ${index + 1}/${dates.length}: ${date}`);
    }

    try {
      const found = await fetchDate(date);
      records.push(...found);
    } catch (error) {
      failedDates.push(date);
      logger.error(`Failed to fetch ${label} for ${date}: ${errorMessage(error)}`);
    }

    if ((index + 1) % DATES_PER_PAUSE === 0 && index + 1 < dates.length) {
      logger.debug(`Pausing after ${index + 1} dates...`);
      await sleep(config.datePauseMs);
    }
  }

  if (failedDates.length > 0) {
    logger.warn(`${label}: ${failedDates.length} of ${dates.length} dates failed`);
  }

  return { records, failedDates, allFailed: dates.length > 0 && failedDates.length === dates.length };
}

export interface BatchOptions {
  label: string;
  batchSize?: number;
  pauseMs?: number;
}

/**
 * Run `handle` over every row, `batchSize` rows at a time with a pause
 * between batches. `handle` is expected to deal with its own row errors.
 */
export async function forEachInBatches<T>(
  rows: T[],
  options: BatchOptions,
  handle: (row: T, index: number) => Promise<void>
): Promise<void> {
  const batchSize = options.batchSize ?? config.batchSize;
  const pauseMs = options.pauseMs ?? config.batchPauseMs;
  const batches = chunk(rows, batchSize);
  let index = 0;

  for (const [batchIndex, batch] of batches.entries()) {
    if (batches.length > 1) {
      logger.info(`   ${options.label}: batch ${batchIndex + 1}/${batches.length} (${batch.length} rows)`);
    }

    for (const row of batch) {
      await handle(row, index++);
    }

    if (batchIndex + 1 < batches.length) {
      await sleep(pauseMs);
    }
  }
}

export function emptyCounts(): UploadCounts {
  return { created: 0, failed: 0 };
}

export function addCounts(target: UploadCounts, source: UploadCounts): void {
  target.created += source.created;
  target.failed += source.failed;
}
