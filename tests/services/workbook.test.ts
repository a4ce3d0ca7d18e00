import * as XLSX from 'xlsx';
import { describe, expect, it } from 'vitest';
import { flattenSalesInvoice } from '../../src/services/flatten.js';
import {
  buildSalesStatistics,
  buildWorkbook,
  formatMoney,
  salesWorkbookName,
  statisticsSheet,
  toWorksheet,
} from '../../src/services/workbook.js';
import { salesInvoice } from '../helpers/fixtures.js';

const MARCH = { from: '2024-03-01', to: '2024-03-31' };

describe('formatMoney', () => {
  it('uses thousands separators and two decimals', () => {
    expect(formatMoney(1234.5)).toBe('$1,234.50');
    expect(formatMoney(0)).toBe('$0.00');
  });
});

describe('buildSalesStatistics', () => {
  it('counts by status and sums totals and balances', () => {
    const rows = [
      flattenSalesInvoice(salesInvoice()),
      flattenSalesInvoice(salesInvoice({ id: 102, status: 'closed', total: 500, balance: 0 })),
    ];

    expect(buildSalesStatistics(MARCH, rows)).toEqual([
      { metric: 'Período Procesado', value: '2024-03-01 a 2024-03-31' },
      { metric: 'Total Facturas', value: 2 },
      { metric: 'Facturas Abiertas', value: 1 },
      { metric: 'Facturas Cerradas', value: 1 },
      { metric: 'Suma Total Facturas', value: '$1,690.00' },
      { metric: 'Suma Saldos Pendientes', value: '$1,190.00' },
      { metric: 'Promedio por Factura', value: '$845.00' },
    ]);
  });

  it('averages to zero without invoices', () => {
    const stats = buildSalesStatistics(MARCH, []);
    expect(stats[1]).toEqual({ metric: 'Total Facturas', value: 0 });
    expect(stats[6]).toEqual({ metric: 'Promedio por Factura', value: '$0.00' });
  });
});

describe('salesWorkbookName', () => {
  it('includes range and timestamp', () => {
    expect(salesWorkbookName(MARCH, '20240401_060000')).toBe(
      'facturas_historico_2024-03-01_a_2024-03-31_20240401_060000.xlsx'
    );
  });
});

describe('toWorksheet', () => {
  it('renders a header row and one row per record in column order', () => {
    const sheet = toWorksheet({
      name: 'Facturas',
      columns: [
        { header: 'Total', key: 'total', width: 10 },
        { header: 'Numero', key: 'number' },
        { header: 'Vence', key: 'dueDate' },
      ],
      rows: [{ number: 'FV-1', total: 100, dueDate: null }],
    });

    expect(sheet).toEqual({
      name: 'Facturas',
      widths: [10, 14, 14],
      cells: [
        ['Total', 'Numero', 'Vence'],
        [100, 'FV-1', ''],
      ],
    });
  });
});

describe('buildWorkbook', () => {
  it('writes one sheet per entry with headers and rows', () => {
    const content = buildWorkbook([
      toWorksheet({
        name: 'Facturas',
        columns: [
          { header: 'Numero', key: 'number' },
          { header: 'Total', key: 'total' },
        ],
        rows: [
          { number: 'FV-1', total: 100 },
          { number: 'FV-2', total: 250 },
        ],
      }),
      statisticsSheet([{ metric: 'Total Facturas', value: 2 }]),
    ]);

    const workbook = XLSX.read(content, { type: 'buffer' });
    expect(workbook.SheetNames).toEqual(['Facturas', 'Estadisticas']);

    const invoices: unknown[][] = XLSX.utils.sheet_to_json(workbook.Sheets.Facturas, { header: 1 });
    expect(invoices).toEqual([
      ['Numero', 'Total'],
      ['FV-1', 100],
      ['FV-2', 250],
    ]);

    const stats: unknown[][] = XLSX.utils.sheet_to_json(workbook.Sheets.Estadisticas, { header: 1 });
    expect(stats).toEqual([
      ['Métrica', 'Valor'],
      ['Total Facturas', 2],
    ]);
  });
});
