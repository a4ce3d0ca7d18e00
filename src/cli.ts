import { parseArgs } from 'util';
import { getBackfillWindow } from './config/env.js';
import { formatDate, isIsoDate, yesterday } from './utils/dates.js';
import { DEFAULT_SEQUENCE, JOB_NAMES, isJobName } from './services/jobNames.js';
import type { JobName } from './services/jobNames.js';
import type { DateRange } from './types/index.js';

export type CliCommand = 'run' | 'stats' | 'schedule' | 'help';

export interface CliOptions {
  command: CliCommand;
  jobs: JobName[];
  range: DateRange;
  exportWorkbook: boolean;
  dryRun: boolean;
  dev: boolean;
}

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

export const USAGE = `Usage: alegra-sharepoint-sync [options]

Runs ${DEFAULT_SEQUENCE.join(', ')} for yesterday unless told otherwise.

Options:
  --job <name>      Job to run, repeatable (${JOB_NAMES.join(', ')})
  --date <day>      Single day, YYYY-MM-DD
  --from <day>      First day of a range (YYYY-MM-DD)
  --to <day>        Last day of a range, defaults to today
  --backfill        Range from BACKFILL_START_DATE to BACKFILL_END_DATE (or today)
  --export          Also upload an Excel workbook of the sales invoices
  --dry-run         Reconcile only reports what it would rebuild
  --stats           Count payments stored without a client and exit
  --schedule        Stay running and sync on SYNC_CRON
  --dev             Debug logging
  -h, --help        Show this help`;

function checkDate(flag: string, value: string): string {
  if (!isIsoDate(value)) {
    throw new CliError(`--${flag} expects a date as YYYY-MM-DD, got "${value}"`);
  }
  return value;
}

function resolveRange(
  values: { date?: string; from?: string; to?: string; backfill?: boolean },
  now: Date
): DateRange {
  const today = formatDate(now);

  if (values.date !== undefined) {
    if (values.from !== undefined || values.to !== undefined || values.backfill) {
      throw new CliError('--date cannot be combined with --from, --to or --backfill');
    }
    const date = checkDate('date', values.date);
    return { from: date, to: date };
  }

  if (values.backfill) {
    const backfill = getBackfillWindow();
    const from = values.from ?? backfill.startDate;
    const to = values.to ?? (backfill.endDate || today);
    return orderedRange(checkDate('from', from), checkDate('to', to));
  }

  if (values.from !== undefined) {
    return orderedRange(checkDate('from', values.from), checkDate('to', values.to ?? today));
  }

  if (values.to !== undefined) {
    throw new CliError('--to needs --from');
  }

  const day = yesterday(now);
  return { from: day, to: day };
}

function orderedRange(from: string, to: string): DateRange {
  if (from > to) {
    throw new CliError(`Invalid range: ${from} is after ${to}`);
  }
  return { from, to };
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        job: { type: 'string', multiple: true },
        date: { type: 'string' },
        from: { type: 'string' },
        to: { type: 'string' },
        backfill: { type: 'boolean' },
        export: { type: 'boolean' },
        'dry-run': { type: 'boolean' },
        stats: { type: 'boolean' },
        schedule: { type: 'boolean' },
        dev: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new CliError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCli(argv: string[], now: Date = new Date()): CliOptions {
  const { values } = readArgs(argv);
  const jobs: JobName[] = [];
  for (const name of values.job ?? []) {
    if (!isJobName(name)) {
      throw new CliError(`Unknown job "${name}". Known jobs: ${JOB_NAMES.join(', ')}`);
    }
    if (!jobs.includes(name)) jobs.push(name);
  }

  let command: CliCommand = 'run';
  if (values.help) {
    command = 'help';
  } else if (values.stats) {
    command = 'stats';
  } else if (values.schedule) {
    command = 'schedule';
  }

  return {
    command,
    jobs: jobs.length > 0 ? jobs : [...DEFAULT_SEQUENCE],
    range: resolveRange(values, now),
    exportWorkbook: values.export ?? false,
    dryRun: values['dry-run'] ?? false,
    dev: values.dev ?? false,
  };
}
