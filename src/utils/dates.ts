const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

const pad = (value: number) => value.toString().padStart(2, '0');

/** Local calendar date as YYYY-MM-DD. */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function yesterday(now: Date = new Date()): string {
  const previous = new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1);
  return formatDate(previous);
}

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

function toUtcMidnight(value: string): number {
  if (!isIsoDate(value)) {
    throw new Error(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return Date.parse(`${value}T00:00:00Z`);
}

/** Every calendar date from `from` to `to`, both inclusive. */
export function dateRange(from: string, to: string): string[] {
  const start = toUtcMidnight(from);
  const end = toUtcMidnight(to);
  if (start > end) {
    throw new Error(`Invalid date range: ${from} is after ${to}`);
  }

  const dates: string[] = [];
  for (let current = start; current <= end; current += DAY_MS) {
    dates.push(new Date(current).toISOString().slice(0, 10));
  }
  return dates;
}

/** YYYYMMDD_HHMMSS, used in log and export file names. */
export function fileTimestamp(now: Date = new Date()): string {
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

export function chunk<T>(rows: T[], size: number): T[][] {
  if (size <= 0) throw new Error(`Chunk size must be positive, got ${size}`);
  const chunks: T[][] = [];
  for (let i = 0; i < rows.length; i += size) {
    chunks.push(rows.slice(i, i + size));
  }
  return chunks;
}
