import { afterEach, describe, expect, it, vi } from 'vitest';
import { CliError, parseCli } from '../src/cli.js';

// Sunday 2024-03-10, midday local time
const NOW = new Date(2024, 2, 10, 12, 0, 0);

function parse(...argv: string[]) {
  return parseCli(argv, NOW);
}

describe('parseCli', () => {
  it('runs the daily jobs for yesterday by default', () => {
    expect(parse()).toEqual({
      command: 'run',
      jobs: ['sales-invoices', 'payments', 'reconcile-payments', 'purchase-bills'],
      range: { from: '2024-03-09', to: '2024-03-09' },
      exportWorkbook: false,
      dryRun: false,
      dev: false,
    });
  });

  it('takes repeated jobs once each, in the order given', () => {
    expect(parse('--job', 'accounts', '--job', 'products', '--job', 'accounts').jobs).toEqual(['accounts', 'products']);
  });

  it('rejects an unknown job', () => {
    expect(() => parse('--job', 'ventas')).toThrow(
      'Unknown job "ventas". Known jobs: sales-invoices, payments, reconcile-payments, purchase-bills, accounts, products'
    );
  });

  it('reads flags', () => {
    expect(parse('--export', '--dry-run', '--dev')).toMatchObject({
      exportWorkbook: true,
      dryRun: true,
      dev: true,
    });
  });

  describe('date range', () => {
    it('takes a single day', () => {
      expect(parse('--date', '2024-02-29').range).toEqual({ from: '2024-02-29', to: '2024-02-29' });
    });

    it('runs an open range up to today', () => {
      expect(parse('--from', '2024-03-01').range).toEqual({ from: '2024-03-01', to: '2024-03-10' });
    });

    it('takes an explicit range', () => {
      expect(parse('--from', '2024-03-01', '--to', '2024-03-03').range).toEqual({ from: '2024-03-01', to: '2024-03-03' });
    });

    it('backfills from the configured start', () => {
      expect(parse('--backfill').range).toEqual({ from: '2024-01-01', to: '2024-03-10' });
      expect(parse('--backfill', '--from', '2024-02-01').range).toEqual({ from: '2024-02-01', to: '2024-03-10' });
    });

    it('rejects --date with a range', () => {
      expect(() => parse('--date', '2024-03-01', '--from', '2024-02-01')).toThrow(
        '--date cannot be combined with --from, --to or --backfill'
      );
    });

    it('rejects --to alone', () => {
      expect(() => parse('--to', '2024-03-01')).toThrow('--to needs --from');
    });

    it('rejects a malformed date', () => {
      expect(() => parse('--date', '2024-13-01')).toThrow('--date expects a date as YYYY-MM-DD, got "2024-13-01"');
    });

    it('rejects a reversed range', () => {
      expect(() => parse('--from', '2024-03-05', '--to', '2024-03-01')).toThrow(
        'Invalid range: 2024-03-05 is after 2024-03-01'
      );
    });
  });

  describe('command', () => {
    it('prefers help, then stats, then schedule', () => {
      expect(parse('--stats', '--schedule').command).toBe('stats');
      expect(parse('--help', '--stats').command).toBe('help');
      expect(parse('-h').command).toBe('help');
      expect(parse('--schedule').command).toBe('schedule');
    });
  });

  it('turns argument errors into CliError', () => {
    expect(() => parse('--nope')).toThrow(CliError);
    expect(() => parse('extra')).toThrow(CliError);
    expect(() => parse('--date')).toThrow(CliError);
  });
});

describe('parseCli without credentials', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('shows help and backfills without reading the required settings', async () => {
    vi.stubEnv('ALEGRA_TOKEN', '');
    vi.stubEnv('BACKFILL_START_DATE', '2023-07-01');
    vi.resetModules();

    const cli = await import('../src/cli.js');

    expect(cli.parseCli(['--help'], NOW).command).toBe('help');
    expect(cli.parseCli(['--backfill'], NOW).range).toEqual({ from: '2023-07-01', to: '2024-03-10' });
    await expect(import('../src/config/index.js')).rejects.toThrow(
      'Missing required environment variable: ALEGRA_TOKEN'
    );
  });
});
