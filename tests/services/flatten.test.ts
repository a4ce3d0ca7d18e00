import { describe, expect, it } from 'vitest';
import {
  analyzeAccountTree,
  flattenAccount,
  flattenPayment,
  flattenProduct,
  flattenPurchaseBill,
  flattenPurchaseCategories,
  flattenPurchaseRetentions,
  flattenSalesInvoice,
  flattenSalesInvoiceItems,
  paymentInvoiceIds,
  summarizeProductTaxes,
  summarizeTaxes,
} from '../../src/services/flatten.js';
import { account, payment, product, purchaseBill, salesInvoice } from '../helpers/fixtures.js';

describe('sales invoices', () => {
  it('flattens header, client and stamp', () => {
    const row = flattenSalesInvoice(salesInvoice());
    expect(row).toMatchObject({
      id: '101',
      date: '2024-03-05',
      dueDate: '2024-04-04',
      number: 'FV-101',
      status: 'open',
      total: 1190,
      balance: 1190,
      clientId: '7',
      clientName: 'Comercial Andina',
      clientPhone: '6015551234',
      clientCity: 'Bogotá',
      clientDepartment: 'Cundinamarca',
      clientAddress: 'Calle 1 # 2-3',
      sellerName: 'Ana Ruiz',
      warehouse: 'Principal',
      costCenter: 'Ventas',
      cufe: 'cufe-101',
      legalStatus: 'STAMPED_AND_ACCEPTED',
      itemCount: 2,
    });
  });

  it('defaults missing values', () => {
    const row = flattenSalesInvoice({ id: 5 });
    expect(row.number).toBe('');
    expect(row.date).toBeNull();
    expect(row.total).toBe(0);
    expect(row.clientName).toBe('');
    expect(row.itemCount).toBe(0);
  });

  it('makes one line per present item and counts null items', () => {
    const { rows, skipped } = flattenSalesInvoiceItems(salesInvoice());
    expect(skipped).toBe(1);
    expect(rows).toEqual([
      {
        invoiceId: '101',
        invoiceNumber: 'FV-101',
        name: 'Soporte',
        description: 'Soporte mensual',
        price: 1000,
        quantity: 1,
        discount: 0,
        total: 1190,
        reference: 'SRV-1',
        unit: 'service',
      },
    ]);
  });
});

describe('summarizeTaxes', () => {
  it('totals taxes and keeps the IVA columns', () => {
    expect(
      summarizeTaxes([
        { name: 'IVA', percentage: '19', amount: 1900, type: 'IVA' },
        null,
        { name: 'ICA', percentage: 1, amount: 100, type: 'ICA' },
      ])
    ).toEqual({
      totalTax: 2000,
      detail: 'IVA: 19% = $1900 | ICA: 1% = $100',
      ivaPercentage: 19,
      ivaAmount: 1900,
    });
  });

  it('takes the last IVA entry, matching the type case-insensitively', () => {
    const summary = summarizeTaxes([
      { name: 'IVA 5', percentage: 5, amount: 50, type: 'IVA' },
      { name: 'IVA 19', percentage: 19, amount: 190, type: 'iva' },
    ]);
    expect(summary.ivaPercentage).toBe(19);
    expect(summary.ivaAmount).toBe(190);
  });

  it('is empty without taxes', () => {
    expect(summarizeTaxes(null)).toEqual({ totalTax: 0, detail: '', ivaPercentage: 0, ivaAmount: 0 });
  });
});

describe('purchase bills', () => {
  it('flattens provider and counts children', () => {
    expect(flattenPurchaseBill(purchaseBill())).toMatchObject({
      id: 'B-9',
      number: 'FC-9',
      providerId: '3',
      providerName: 'Inmobiliaria Centro',
      providerPhone: '6017654321',
      costCenter: 'Administración',
      costCenterCode: 'CC-1',
      retentionCount: 3,
      categoryCount: 2,
    });
  });

  it('flattens categories with their tax summary', () => {
    const { rows, skipped } = flattenPurchaseCategories(purchaseBill());
    expect(skipped).toBe(1);
    expect(rows).toEqual([
      {
        billNumber: 'FC-9',
        categoryId: '50',
        categoryName: 'Arriendo',
        unitPrice: 10000,
        quantity: 1,
        discount: 0,
        observations: '',
        subtotal: 10000,
        total: 11900,
        taxes: { totalTax: 1900, detail: 'IVA: 19% = $1900', ivaPercentage: 19, ivaAmount: 1900 },
      },
    ]);
  });

  it('flattens retentions and derives who assumes them', () => {
    const { rows, skipped } = flattenPurchaseRetentions(purchaseBill());
    expect(skipped).toBe(1);
    expect(rows).toEqual([
      {
        id: '4',
        name: 'Retefuente',
        percentage: '2.5',
        amount: 250,
        billNumber: 'FC-9',
        retentionType: 'RET',
        calculatedBy: 'subtotal',
        isAssumed: false,
        exchangeRate: '',
        assumedBy: 'Proveedor',
      },
      {
        id: '5',
        name: 'ReteICA',
        percentage: '0',
        amount: 10,
        billNumber: 'FC-9',
        retentionType: '',
        calculatedBy: '',
        isAssumed: true,
        exchangeRate: '',
        assumedBy: 'Empresa',
      },
    ]);
  });
});

describe('flattenPayment', () => {
  it('emits invoice rows then category rows with the payment columns on each', () => {
    const { rows, skipped } = flattenPayment(payment());
    expect(skipped).toBe(1);
    expect(rows.map(row => row.kind)).toEqual(['invoice', 'category']);

    for (const row of rows) {
      expect(row).toMatchObject({
        paymentId: '301',
        number: 'RC-301',
        internalNumber: '12',
        amount: 1190,
        accountName: 'Cuenta corriente',
        clientId: '7',
        clientName: 'Comercial Andina',
      });
    }

    expect(rows[0]).toMatchObject({
      invoiceId: '101',
      invoiceNumber: 'FV-101',
      invoiceDate: '2024-03-05',
      invoicePaid: 1000,
      invoiceTotal: 1190,
      invoiceBalance: 190,
      categoryName: '',
    });
    expect(rows[1]).toMatchObject({
      invoiceId: '',
      invoiceDate: null,
      categoryId: '60',
      categoryName: 'Intereses',
      categoryTotal: 190,
      categoryBehavior: 'income',
    });
  });

  it('emits a single simple row when nothing is linked', () => {
    const { rows, skipped } = flattenPayment({ id: 302, amount: 50 });
    expect(skipped).toBe(0);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ kind: 'simple', paymentId: '302', amount: 50, invoiceId: '', categoryId: '' });
  });

  it('emits nothing when every linked entry is null', () => {
    expect(flattenPayment({ id: 303, invoices: [null], categories: [] })).toEqual({ rows: [], skipped: 1 });
  });
});

describe('paymentInvoiceIds', () => {
  it('keeps order and drops duplicates and blanks', () => {
    expect(
      paymentInvoiceIds({ id: 1, invoices: [{ id: 5 }, { id: 6 }, { id: 5 }, { id: null }, null] })
    ).toEqual(['5', '6']);
  });
});

describe('chart of accounts', () => {
  it('treats 0, empty and missing parents as roots', () => {
    expect(flattenAccount(account(10, 0)).parentId).toBeNull();
    expect(flattenAccount({ id: 11, idParent: '' }).parentId).toBeNull();
    expect(flattenAccount({ id: 12 }).parentId).toBeNull();
    expect(flattenAccount(account(13, 10)).parentId).toBe('10');
  });

  it('stringifies flags and rule names', () => {
    const row = flattenAccount(account(10, null, { showThirdPartyBalance: true, categoryRule: { name: 'Gastos' } }));
    expect(row.showThirdPartyBalance).toBe('true');
    expect(row.categoryRule).toBe('Gastos');
    expect(flattenAccount({ id: 1 }).showThirdPartyBalance).toBe('false');
  });

  it('measures roots, depth and types', () => {
    const rows = [
      account(1, null),
      account(2, 1),
      account(3, 2, { type: '' }),
      account(4, 99, { type: 'liability' }),
    ].map(flattenAccount);

    expect(analyzeAccountTree(rows)).toEqual({
      total: 4,
      roots: 1,
      maxDepth: 2,
      byType: { asset: 2, unknown: 1, liability: 1 },
    });
  });

  it('stops walking at a cycle', () => {
    const rows = [account(5, 6), account(6, 5)].map(flattenAccount);
    expect(analyzeAccountTree(rows)).toMatchObject({ roots: 0, maxDepth: 1 });
  });
});

describe('products', () => {
  it('splits IVA from the other taxes', () => {
    expect(
      summarizeProductTaxes([
        { name: 'IVA 19%', percentage: '19.00', type: 'IVA' },
        { name: 'Impoconsumo', percentage: 8, type: 'INC' },
        null,
      ])
    ).toEqual({ ivaPercentage: 19, ivaName: 'IVA 19%', otherTaxes: 'Impoconsumo: 8%' });
  });

  it('uses the main price list entry', () => {
    expect(flattenProduct(product())).toMatchObject({
      id: '77',
      name: 'Café molido',
      itemCategoryId: '3',
      itemCategoryName: 'Bebidas',
      itemCategoryDescription: 'Bebidas calientes',
      mainPrice: 4500,
      priceList: 'Mayorista',
      currency: 'COP',
      unit: 'unit',
      initialQuantity: 0,
      availableQuantity: 12,
      unitCost: 3000,
      hasNoIvaDays: false,
      ivaPercentage: 19,
      ivaName: 'IVA',
      otherTaxes: '',
      taxCount: 1,
      priceCount: 2,
      customFieldCount: 1,
    });
  });

  it('falls back to the first price, or none', () => {
    const first = flattenProduct(product({ price: [{ name: 'General', price: 5000 }, { name: 'Otra', price: 1 }] }));
    expect(first.mainPrice).toBe(5000);
    expect(first.priceList).toBe('General');

    const none = flattenProduct(product({ price: null }));
    expect(none.mainPrice).toBe(0);
    expect(none.currency).toBe('');
    expect(none.priceCount).toBe(0);
  });
});
