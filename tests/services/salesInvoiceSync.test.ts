import * as XLSX from 'xlsx';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { config } from '../../src/config/index.js';
import { syncSalesInvoices } from '../../src/services/salesInvoiceSync.js';
import { salesInvoice } from '../helpers/fixtures.js';
import { addConfiguredLists, useFakeApis } from '../helpers/fakeApis.js';

const TWO_DAYS = { from: '2024-03-05', to: '2024-03-06' };

describe('syncSalesInvoices', () => {
  const apis = useFakeApis();

  afterEach(() => {
    vi.useRealTimers();
  });

  function seedTwoDays() {
    addConfiguredLists(apis());
    apis().invoicesByDate['2024-03-05'] = [salesInvoice(), null];
    apis().invoicesByDate['2024-03-06'] = [
      salesInvoice({
        id: 102,
        numberTemplate: { fullNumber: 'FV-102' },
        items: [
          { name: 'Licencia', price: 200, quantity: 2, total: 400 },
          { name: 'Instalación', price: 100, quantity: 1, total: 100 },
        ],
      }),
    ];
  }

  it('uploads invoices and links their lines to the new rows', async () => {
    seedTwoDays();

    const result = await syncSalesInvoices({ range: TWO_DAYS });

    expect(result).toEqual({
      success: true,
      fetched: 3,
      uploads: {
        invoices: { created: 2, failed: 0 },
        lines: { created: 3, failed: 0 },
      },
      skipped: 2,
      exportedFile: null,
    });

    const invoices = apis().list(config.lists.salesInvoices).items;
    expect(invoices.map(item => item.fields.Title)).toEqual(['101', '102']);

    const lines = apis().list(config.lists.salesInvoiceItems).items;
    expect(lines.map(item => [item.fields.Title, item.fields.Nombre, item.fields.FacturadeVentaLookupId])).toEqual([
      ['FV-101', 'Soporte', invoices[0].id],
      ['FV-102', 'Licencia', invoices[1].id],
      ['FV-102', 'Instalación', invoices[1].id],
    ]);
  });

  it('counts a rejected invoice and keeps going', async () => {
    seedTwoDays();
    apis().list(config.lists.salesInvoices).reject = fields => fields.Title === '101';

    const result = await syncSalesInvoices({ range: TWO_DAYS });

    expect(result.success).toBe(true);
    expect(result.uploads).toEqual({
      invoices: { created: 1, failed: 1 },
      lines: { created: 2, failed: 0 },
    });
  });

  it('counts rejected lines without failing the invoice', async () => {
    seedTwoDays();
    apis().list(config.lists.salesInvoiceItems).reject = fields => fields.Nombre === 'Licencia';

    const result = await syncSalesInvoices({ range: TWO_DAYS });

    expect(result.uploads.invoices).toEqual({ created: 2, failed: 0 });
    expect(result.uploads.lines).toEqual({ created: 2, failed: 1 });
  });

  it('fails when no invoice could be created', async () => {
    seedTwoDays();
    apis().list(config.lists.salesInvoices).reject = () => true;

    const result = await syncSalesInvoices({ range: TWO_DAYS });

    expect(result.success).toBe(false);
    expect(result.uploads.invoices).toEqual({ created: 0, failed: 2 });
    expect(apis().list(config.lists.salesInvoiceItems).items).toEqual([]);
  });

  it('succeeds with nothing to upload', async () => {
    addConfiguredLists(apis());

    const result = await syncSalesInvoices({ range: TWO_DAYS });

    expect(result).toEqual({
      success: true,
      fetched: 0,
      uploads: { invoices: { created: 0, failed: 0 }, lines: { created: 0, failed: 0 } },
      skipped: 0,
    });
  });

  it('skips a day Alegra fails on', async () => {
    seedTwoDays();
    apis().alegraFailDates.add('2024-03-05');

    const result = await syncSalesInvoices({ range: TWO_DAYS });

    expect(result.fetched).toBe(1);
    expect(result.uploads.invoices).toEqual({ created: 1, failed: 0 });
    expect(result.failedDates).toEqual(['2024-03-05']);
  });

  it('fails when no day could be fetched', async () => {
    seedTwoDays();
    apis().alegraFailDates.add('2024-03-05');
    apis().alegraFailDates.add('2024-03-06');

    const result = await syncSalesInvoices({ range: TWO_DAYS });

    expect(result).toEqual({
      success: false,
      fetched: 0,
      uploads: { invoices: { created: 0, failed: 0 }, lines: { created: 0, failed: 0 } },
      skipped: 0,
      failedDates: ['2024-03-05', '2024-03-06'],
    });
    expect(apis().list(config.lists.salesInvoices).items).toEqual([]);
  });

  it('exports a workbook to the export folder', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(2024, 2, 7, 8, 9, 10));
    seedTwoDays();

    const result = await syncSalesInvoices({ range: TWO_DAYS, exportWorkbook: true });

    const name = 'facturas_historico_2024-03-05_a_2024-03-06_20240307_080910.xlsx';
    expect(result.exportedFile).toBe(name);
    expect(apis().uploads).toHaveLength(1);
    expect(apis().uploads[0].path).toBe(`${config.exportFolder}/${name}`);
    expect([...apis().folders]).toEqual([
      'Documentos compartidos',
      'Documentos compartidos/Datos',
      'Documentos compartidos/Datos/Alegra',
    ]);

    const workbook = XLSX.read(Buffer.from(apis().uploads[0].content), { type: 'buffer' });
    expect(workbook.SheetNames).toEqual(['Facturas', 'Items_Detalle', 'Estadisticas']);
    const rows = (name: string): unknown[][] => XLSX.utils.sheet_to_json(workbook.Sheets[name], { header: 1 });
    expect(rows('Facturas')).toHaveLength(3);
    expect(rows('Items_Detalle')).toHaveLength(4);
    expect(rows('Estadisticas')[2]).toEqual(['Total Facturas', 2]);
  });

  it('still uploads to the lists when the export fails', async () => {
    seedTwoDays();
    apis().failUploads = true;

    const result = await syncSalesInvoices({ range: TWO_DAYS, exportWorkbook: true });

    expect(result.exportedFile).toBeNull();
    expect(result.success).toBe(true);
    expect(result.uploads.invoices).toEqual({ created: 2, failed: 0 });
  });
});
