import * as XLSX from 'xlsx';
import type { DateRange, SalesInvoiceItemRow, SalesInvoiceRow } from '../types/index.js';

export interface SheetColumn<T> {
  header: string;
  key: keyof T & string;
  width?: number;
}

export interface SheetSpec<T> {
  name: string;
  columns: SheetColumn<T>[];
  rows: T[];
}

export interface StatisticRow {
  metric: string;
  value: string | number;
}

export type CellValue = string | number | boolean;

// Rendered cells, so one workbook can hold sheets of different row types
export interface WorksheetData {
  name: string;
  widths: number[];
  cells: CellValue[][];
}

export const SALES_INVOICE_COLUMNS: SheetColumn<SalesInvoiceRow>[] = [
  { header: 'ID', key: 'id', width: 12 },
  { header: 'Fecha', key: 'date', width: 12 },
  { header: 'Fecha_Vencimiento', key: 'dueDate', width: 12 },
  { header: 'Numero_Factura', key: 'number', width: 16 },
  { header: 'Estado', key: 'status', width: 10 },
  { header: 'Subtotal', key: 'subtotal' },
  { header: 'Descuento', key: 'discount' },
  { header: 'Impuestos', key: 'tax' },
  { header: 'Total', key: 'total' },
  { header: 'Total_Pagado', key: 'totalPaid' },
  { header: 'Saldo', key: 'balance' },
  { header: 'Termino_Pago', key: 'term' },
  { header: 'Forma_Pago', key: 'paymentForm' },
  { header: 'Cliente_ID', key: 'clientId' },
  { header: 'Cliente_Nombre', key: 'clientName', width: 30 },
  { header: 'Cliente_Identificacion', key: 'clientIdentification' },
  { header: 'Cliente_Email', key: 'clientEmail' },
  { header: 'Cliente_Telefono', key: 'clientPhone' },
  { header: 'Cliente_Ciudad', key: 'clientCity' },
  { header: 'Cliente_Departamento', key: 'clientDepartment' },
  { header: 'Cliente_Direccion', key: 'clientAddress' },
  { header: 'Vendedor_Nombre', key: 'sellerName' },
  { header: 'Vendedor_ID', key: 'sellerIdentification' },
  { header: 'Observaciones', key: 'observations' },
  { header: 'Anotacion', key: 'anotation' },
  { header: 'Almacen', key: 'warehouse' },
  { header: 'Centro_Costo', key: 'costCenter' },
  { header: 'CUFE', key: 'cufe' },
  { header: 'Estado_DIAN', key: 'legalStatus' },
  { header: 'Cantidad_Items', key: 'itemCount' },
];

export const SALES_INVOICE_ITEM_COLUMNS: SheetColumn<SalesInvoiceItemRow>[] = [
  { header: 'Factura_ID', key: 'invoiceId', width: 12 },
  { header: 'Numero_Factura', key: 'invoiceNumber', width: 16 },
  { header: 'Item_Nombre', key: 'name', width: 30 },
  { header: 'Item_Descripcion', key: 'description', width: 30 },
  { header: 'Item_Precio', key: 'price' },
  { header: 'Item_Cantidad', key: 'quantity' },
  { header: 'Item_Descuento', key: 'discount' },
  { header: 'Item_Total', key: 'total' },
  { header: 'Item_Referencia', key: 'reference' },
  { header: 'Item_Unidad', key: 'unit' },
];

const STATISTIC_COLUMNS: SheetColumn<StatisticRow>[] = [
  { header: 'Métrica', key: 'metric', width: 28 },
  { header: 'Valor', key: 'value', width: 28 },
];

export function formatMoney(value: number): string {
  return `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

/**
 * Summary rows for a sales backfill: period, counts per status, sums and average.
 */
export function buildSalesStatistics(range: DateRange, invoices: SalesInvoiceRow[]): StatisticRow[] {
  const total = invoices.reduce((sum, invoice) => sum + invoice.total, 0);
  const balance = invoices.reduce((sum, invoice) => sum + invoice.balance, 0);
  const average = invoices.length > 0 ? total / invoices.length : 0;

  return [
    { metric: 'Período Procesado', value: `${range.from} a ${range.to}` },
    { metric: 'Total Facturas', value: invoices.length },
    { metric: 'Facturas Abiertas', value: invoices.filter(invoice => invoice.status === 'open').length },
    { metric: 'Facturas Cerradas', value: invoices.filter(invoice => invoice.status === 'closed').length },
    { metric: 'Suma Total Facturas', value: formatMoney(total) },
    { metric: 'Suma Saldos Pendientes', value: formatMoney(balance) },
    { metric: 'Promedio por Factura', value: formatMoney(average) },
  ];
}

export function statisticsSheet(rows: StatisticRow[]): WorksheetData {
  return toWorksheet({ name: 'Estadisticas', columns: STATISTIC_COLUMNS, rows });
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return String(value);
}

/**
 * Header row followed by one row per record, in column order.
 */
export function toWorksheet<T>(sheet: SheetSpec<T>): WorksheetData {
  return {
    name: sheet.name,
    widths: sheet.columns.map(column => column.width ?? 14),
    cells: [
      sheet.columns.map(column => column.header),
      ...sheet.rows.map(row => sheet.columns.map(column => toCell(row[column.key]))),
    ],
  };
}

export function buildWorkbook(sheets: WorksheetData[]): Buffer {
  const workbook = XLSX.utils.book_new();

  for (const sheet of sheets) {
    const worksheet = XLSX.utils.aoa_to_sheet(sheet.cells);
    worksheet['!cols'] = sheet.widths.map(wch => ({ wch }));
    XLSX.utils.book_append_sheet(workbook, worksheet, sheet.name);
  }

  const content: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(content)) {
    throw new Error('Workbook writer did not return a buffer');
  }
  return content;
}

/**
 * `facturas_historico_2024-01-01_a_2024-01-31_20240201_060000.xlsx`
 */
export function salesWorkbookName(range: DateRange, timestamp: string): string {
  return `facturas_historico_${range.from}_a_${range.to}_${timestamp}.xlsx`;
}
