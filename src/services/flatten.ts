import type {
  AccountRow,
  AlegraAccount,
  AlegraBill,
  AlegraInvoice,
  AlegraItem,
  AlegraPayment,
  AlegraTax,
  PaymentRow,
  ProductRow,
  PurchaseBillRow,
  PurchaseCategoryRow,
  PurchaseRetentionRow,
  SalesInvoiceItemRow,
  SalesInvoiceRow,
  TaxSummary,
} from '../types/index.js';

/**
 * Alegra documents → flat rows.
 *
 * Missing text becomes '' and missing amounts 0. Null entries inside child
 * arrays (items, categories, retentions, taxes) are dropped and counted in
 * `skipped`.
 */

export interface Flattened<T> {
  rows: T[];
  skipped: number;
}

function text(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}

function amount(value: number | null | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function percentage(value: string | number | null | undefined): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  const parsed = parseFloat(value ?? '');
  return Number.isNaN(parsed) ? 0 : parsed;
}

function presentEntries<T>(values: Array<T | null> | null | undefined): Flattened<T> {
  const rows: T[] = [];
  let skipped = 0;
  for (const value of values ?? []) {
    if (value === null) {
      skipped++;
    } else {
      rows.push(value);
    }
  }
  return { rows, skipped };
}

// ===== Sales invoices =====
export function flattenSalesInvoice(invoice: AlegraInvoice): SalesInvoiceRow {
  const client = invoice.client;
  return {
    id: text(invoice.id),
    date: invoice.date ?? null,
    dueDate: invoice.dueDate ?? null,
    number: text(invoice.numberTemplate?.fullNumber),
    status: text(invoice.status),
    subtotal: amount(invoice.subtotal),
    discount: amount(invoice.discount),
    tax: amount(invoice.tax),
    total: amount(invoice.total),
    totalPaid: amount(invoice.totalPaid),
    balance: amount(invoice.balance),
    term: text(invoice.term),
    paymentForm: text(invoice.paymentForm),
    clientId: text(client?.id),
    clientName: text(client?.name),
    clientIdentification: text(client?.identification),
    clientEmail: text(client?.email),
    clientPhone: text(client?.phonePrimary),
    clientCity: text(client?.address?.city),
    clientDepartment: text(client?.address?.department),
    clientAddress: text(client?.address?.address),
    sellerName: text(invoice.seller?.name),
    sellerIdentification: text(invoice.seller?.identification),
    observations: text(invoice.observations),
    anotation: text(invoice.anotation),
    warehouse: text(invoice.warehouse?.name),
    costCenter: text(invoice.costCenter?.name),
    cufe: text(invoice.stamp?.cufe),
    legalStatus: text(invoice.stamp?.legalStatus),
    itemCount: invoice.items?.length ?? 0,
  };
}

export function flattenSalesInvoiceItems(invoice: AlegraInvoice): Flattened<SalesInvoiceItemRow> {
  const { rows: items, skipped } = presentEntries(invoice.items);
  const invoiceId = text(invoice.id);
  const invoiceNumber = text(invoice.numberTemplate?.fullNumber);

  return {
    rows: items.map(item => ({
      invoiceId,
      invoiceNumber,
      name: text(item.name),
      description: text(item.description),
      price: amount(item.price),
      quantity: amount(item.quantity),
      discount: amount(item.discount),
      total: amount(item.total),
      reference: text(item.reference),
      unit: text(item.unit),
    })),
    skipped,
  };
}

// ===== Purchase bills =====

/**
 * Totals a category's taxes. `detail` reads `IVA: 19% = $1900 | ...`;
 * the IVA columns come from the last tax whose type is IVA.
 */
export function summarizeTaxes(taxes: Array<AlegraTax | null> | null | undefined): TaxSummary {
  const summary: TaxSummary = { totalTax: 0, detail: '', ivaPercentage: 0, ivaAmount: 0 };
  const details: string[] = [];

  for (const tax of presentEntries(taxes).rows) {
    const pct = percentage(tax.percentage);
    const taxAmount = amount(tax.amount);
    summary.totalTax += taxAmount;
    details.push(`${text(tax.name)}: ${pct}% = $${taxAmount}`);

    if (text(tax.type).toUpperCase() === 'IVA') {
      summary.ivaPercentage = pct;
      summary.ivaAmount = taxAmount;
    }
  }

  summary.detail = details.join(' | ');
  return summary;
}

export function flattenPurchaseBill(bill: AlegraBill): PurchaseBillRow {
  const provider = bill.provider;
  return {
    id: text(bill.id),
    date: bill.date ?? null,
    dueDate: bill.dueDate ?? null,
    number: text(bill.numberTemplate?.fullNumber),
    status: text(bill.status),
    total: amount(bill.total),
    totalPaid: amount(bill.totalPaid),
    balance: amount(bill.balance),
    billType: text(bill.type),
    observations: text(bill.observations),
    providerId: text(provider?.id),
    providerName: text(provider?.name),
    providerIdentification: text(provider?.identification),
    providerEmail: text(provider?.email),
    providerPhone: text(provider?.phonePrimary),
    warehouse: text(bill.warehouse?.name),
    costCenter: text(bill.costCenter?.name),
    costCenterCode: text(bill.costCenter?.code),
    retentionCount: bill.retentions?.length ?? 0,
    categoryCount: bill.purchases?.categories?.length ?? 0,
  };
}

export function flattenPurchaseCategories(bill: AlegraBill): Flattened<PurchaseCategoryRow> {
  const { rows: categories, skipped } = presentEntries(bill.purchases?.categories);
  const billNumber = text(bill.numberTemplate?.fullNumber);

  return {
    rows: categories.map(category => ({
      billNumber,
      categoryId: text(category.id),
      categoryName: text(category.name),
      unitPrice: amount(category.price),
      quantity: amount(category.quantity),
      discount: amount(category.discount),
      observations: text(category.observations),
      subtotal: amount(category.subtotal),
      total: amount(category.total),
      taxes: summarizeTaxes(category.tax),
    })),
    skipped,
  };
}

export function flattenPurchaseRetentions(bill: AlegraBill): Flattened<PurchaseRetentionRow> {
  const { rows: retentions, skipped } = presentEntries(bill.retentions);
  const billNumber = text(bill.numberTemplate?.fullNumber);

  return {
    rows: retentions.map((retention): PurchaseRetentionRow => {
      const isAssumed = retention.isAssumed === true;
      return {
        id: text(retention.id),
        name: text(retention.name),
        percentage: text(retention.percentage ?? 0),
        amount: amount(retention.amount),
        billNumber,
        retentionType: text(retention.type),
        calculatedBy: text(retention.calculatedBy),
        isAssumed,
        exchangeRate: text(retention.exchangeRate),
        assumedBy: isAssumed ? 'Empresa' : 'Proveedor',
      };
    }),
    skipped,
  };
}

// ===== Payments =====

/**
 * One row per linked invoice and one per category, each carrying the
 * payment's own columns. A payment linked to neither yields a single
 * `simple` row.
 */
export function flattenPayment(payment: AlegraPayment): Flattened<PaymentRow> {
  const base: PaymentRow = {
    kind: 'simple',
    paymentId: text(payment.id),
    date: payment.date ?? null,
    number: text(payment.numberTemplate?.fullNumber),
    internalNumber: text(payment.number),
    amount: amount(payment.amount),
    paymentType: text(payment.type),
    method: text(payment.paymentMethod),
    status: text(payment.status),
    observations: text(payment.observations),
    anotation: text(payment.anotation),
    accountId: text(payment.bankAccount?.id),
    accountName: text(payment.bankAccount?.name),
    accountType: text(payment.bankAccount?.type),
    clientId: text(payment.client?.id),
    clientName: text(payment.client?.name),
    clientPhone: text(payment.client?.phone),
    clientIdentification: text(payment.client?.identification),
    costCenterId: text(payment.costCenter?.id),
    costCenterCode: text(payment.costCenter?.code),
    costCenterName: text(payment.costCenter?.name),
    invoiceId: '',
    invoiceNumber: '',
    invoiceDate: null,
    invoicePaid: 0,
    invoiceTotal: 0,
    invoiceBalance: 0,
    categoryId: '',
    categoryName: '',
    categoryPrice: 0,
    categoryQuantity: 0,
    categoryTotal: 0,
    categoryObservations: '',
    categoryBehavior: '',
  };

  const invoices = presentEntries(payment.invoices);
  const categories = presentEntries(payment.categories);
  const linked = (payment.invoices?.length ?? 0) + (payment.categories?.length ?? 0);

  if (linked === 0) {
    return { rows: [base], skipped: 0 };
  }

  const rows: PaymentRow[] = [
    ...invoices.rows.map((invoice): PaymentRow => ({
      ...base,
      kind: 'invoice',
      invoiceId: text(invoice.id),
      invoiceNumber: text(invoice.number),
      invoiceDate: invoice.date ?? null,
      invoicePaid: amount(invoice.amount),
      invoiceTotal: amount(invoice.total),
      invoiceBalance: amount(invoice.balance),
    })),
    ...categories.rows.map((category): PaymentRow => ({
      ...base,
      kind: 'category',
      categoryId: text(category.id),
      categoryName: text(category.name),
      categoryPrice: amount(category.price),
      categoryQuantity: amount(category.quantity),
      categoryTotal: amount(category.total),
      categoryObservations: text(category.observations),
      categoryBehavior: text(category.behavior),
    })),
  ];

  return { rows, skipped: invoices.skipped + categories.skipped };
}

/** Invoice ids a payment is applied to, in order, without duplicates. */
export function paymentInvoiceIds(payment: AlegraPayment): string[] {
  const ids = presentEntries(payment.invoices)
    .rows.map(invoice => text(invoice.id))
    .filter(id => id !== '');
  return [...new Set(ids)];
}

// ===== Chart of accounts =====
function parentIdOf(account: AlegraAccount): string | null {
  const parent = account.idParent;
  if (parent === null || parent === undefined || parent === '' || parent === 0) return null;
  return String(parent);
}

export function flattenAccount(account: AlegraAccount): AccountRow {
  return {
    id: text(account.id),
    parentId: parentIdOf(account),
    globalId: text(account.idGlobal),
    code: text(account.code),
    name: text(account.name),
    text: text(account.text),
    description: text(account.description),
    type: text(account.type),
    status: text(account.status),
    blocked: text(account.blocked),
    nature: text(account.nature),
    use: text(account.use),
    showThirdPartyBalance: String(account.showThirdPartyBalance ?? false),
    categoryRule: text(account.categoryRule?.name),
  };
}

export interface AccountTreeStats {
  total: number;
  roots: number;
  maxDepth: number;
  byType: Record<string, number>;
}

export function analyzeAccountTree(accounts: AccountRow[]): AccountTreeStats {
  const parents = new Map(accounts.map(account => [account.id, account.parentId]));
  const byType: Record<string, number> = {};
  let roots = 0;
  let maxDepth = 0;

  for (const account of accounts) {
    const type = account.type || 'unknown';
    byType[type] = (byType[type] ?? 0) + 1;

    if (account.parentId === null) {
      roots++;
    }

    // Walk up until a root, an unknown parent or an id already on the path
    const seen = new Set<string>([account.id]);
    let depth = 0;
    let parent = account.parentId;
    while (parent !== null && !seen.has(parent)) {
      depth++;
      seen.add(parent);
      parent = parents.get(parent) ?? null;
    }
    maxDepth = Math.max(maxDepth, depth);
  }

  return { total: accounts.length, roots, maxDepth, byType };
}

// ===== Product items =====
export interface ProductTaxSummary {
  ivaPercentage: number;
  ivaName: string;
  otherTaxes: string;
}

export function summarizeProductTaxes(taxes: Array<AlegraTax | null> | null | undefined): ProductTaxSummary {
  const summary: ProductTaxSummary = { ivaPercentage: 0, ivaName: '', otherTaxes: '' };
  const others: string[] = [];

  for (const tax of presentEntries(taxes).rows) {
    const pct = percentage(tax.percentage);
    if (text(tax.type).toUpperCase() === 'IVA') {
      summary.ivaPercentage = pct;
      summary.ivaName = text(tax.name);
    } else {
      others.push(`${text(tax.name)}: ${pct}%`);
    }
  }

  summary.otherTaxes = others.join(' | ');
  return summary;
}

export function flattenProduct(item: AlegraItem): ProductRow {
  const prices = presentEntries(item.price).rows;
  const mainPrice = prices.find(price => price.main === true) ?? prices[0];
  const taxes = summarizeProductTaxes(item.tax);
  const inventory = item.inventory;

  return {
    id: text(item.id),
    name: text(item.name),
    description: text(item.description),
    reference: text(item.reference),
    status: text(item.status),
    type: text(item.type),
    itemType: text(item.itemType),
    productKey: text(item.productKey),
    categoryId: text(item.category?.id),
    categoryName: text(item.category?.name),
    itemCategoryId: text(item.itemCategory?.id),
    itemCategoryName: text(item.itemCategory?.name),
    itemCategoryDescription: text(item.itemCategory?.description),
    mainPrice: amount(mainPrice?.price),
    currency: text(mainPrice?.currency?.code),
    priceList: text(mainPrice?.name),
    unit: text(inventory?.unit),
    initialQuantity: amount(inventory?.initialQuantity),
    availableQuantity: amount(inventory?.availableQuantity),
    unitCost: amount(inventory?.unitCost),
    initialQuantityDate: text(inventory?.initialQuantityDate),
    calculationScale: amount(item.calculationScale),
    hasNoIvaDays: item.hasNoIvaDays === true,
    ivaPercentage: taxes.ivaPercentage,
    ivaName: taxes.ivaName,
    otherTaxes: taxes.otherTaxes,
    taxCount: item.tax?.length ?? 0,
    priceCount: item.price?.length ?? 0,
    customFieldCount: item.customFields?.length ?? 0,
  };
}
