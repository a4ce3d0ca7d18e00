import type {
  AlegraAccount,
  AlegraBill,
  AlegraInvoice,
  AlegraItem,
  AlegraPayment,
} from '../../src/types/index.js';

export function salesInvoice(overrides: Partial<AlegraInvoice> = {}): AlegraInvoice {
  return {
    id: 101,
    date: '2024-03-05',
    dueDate: '2024-04-04',
    numberTemplate: { fullNumber: 'FV-101' },
    status: 'open',
    subtotal: 1000,
    discount: 0,
    tax: 190,
    total: 1190,
    totalPaid: 0,
    balance: 1190,
    term: '30 días',
    paymentForm: 'CREDIT',
    client: {
      id: 7,
      name: 'Comercial Andina',
      identification: '900123456',
      email: 'compras@andina.test',
      phonePrimary: '6015551234',
      address: { address: 'Calle 1 # 2-3', city: 'Bogotá', department: 'Cundinamarca' },
    },
    seller: { name: 'Ana Ruiz', identification: '52123456' },
    warehouse: { name: 'Principal' },
    costCenter: { name: 'Ventas' },
    stamp: { cufe: 'cufe-101', legalStatus: 'STAMPED_AND_ACCEPTED' },
    items: [
      {
        id: 1,
        name: 'Soporte',
        description: 'Soporte mensual',
        price: 1000,
        quantity: 1,
        discount: 0,
        total: 1190,
        reference: 'SRV-1',
        unit: 'service',
      },
      null,
    ],
    ...overrides,
  };
}

export function purchaseBill(overrides: Partial<AlegraBill> = {}): AlegraBill {
  return {
    id: 'B-9',
    date: '2024-03-05',
    dueDate: '2024-03-20',
    numberTemplate: { fullNumber: 'FC-9' },
    status: 'open',
    total: 11900,
    totalPaid: 0,
    balance: 11900,
    type: 'bill',
    provider: {
      id: 3,
      name: 'Inmobiliaria Centro',
      identification: '800111222',
      email: 'cobros@centro.test',
      phonePrimary: '6017654321',
    },
    warehouse: { name: 'Principal' },
    costCenter: { name: 'Administración', code: 'CC-1' },
    retentions: [
      { id: 4, name: 'Retefuente', percentage: '2.5', amount: 250, type: 'RET', calculatedBy: 'subtotal', isAssumed: false },
      { id: 5, name: 'ReteICA', percentage: null, amount: 10, isAssumed: true },
      null,
    ],
    purchases: {
      categories: [
        {
          id: 50,
          name: 'Arriendo',
          price: 10000,
          quantity: 1,
          subtotal: 10000,
          total: 11900,
          tax: [{ name: 'IVA', percentage: 19, amount: 1900, type: 'IVA' }],
        },
        null,
      ],
    },
    ...overrides,
  };
}

export function payment(overrides: Partial<AlegraPayment> = {}): AlegraPayment {
  return {
    id: 301,
    date: '2024-03-06',
    numberTemplate: { fullNumber: 'RC-301' },
    number: 12,
    amount: 1190,
    type: 'in',
    paymentMethod: 'transfer',
    status: 'open',
    bankAccount: { id: 2, name: 'Cuenta corriente', type: 'bank' },
    client: { id: 7, name: 'Comercial Andina', phone: '3001234567', identification: '900123456' },
    invoices: [
      { id: 101, number: 'FV-101', date: '2024-03-05', amount: 1000, total: 1190, balance: 190 },
      null,
    ],
    categories: [
      { id: 60, name: 'Intereses', price: 190, quantity: 1, total: 190, behavior: 'income' },
    ],
    ...overrides,
  };
}

export function account(id: number, idParent: number | null, overrides: Partial<AlegraAccount> = {}): AlegraAccount {
  return {
    id,
    idParent,
    code: String(id),
    name: `Cuenta ${id}`,
    type: 'asset',
    status: 'active',
    nature: 'debit',
    use: 'movement',
    ...overrides,
  };
}

export function product(overrides: Partial<AlegraItem> = {}): AlegraItem {
  return {
    id: 77,
    name: 'Café molido',
    reference: 'CAF-500',
    status: 'active',
    type: 'product',
    itemCategory: { id: 3, name: 'Bebidas', description: 'Bebidas calientes' },
    price: [
      { name: 'General', price: 5000, currency: { code: 'COP' } },
      { name: 'Mayorista', price: 4500, main: true, currency: { code: 'COP' } },
    ],
    inventory: { unit: 'unit', availableQuantity: 12, unitCost: 3000 },
    tax: [{ name: 'IVA', percentage: 19, type: 'IVA' }],
    customFields: [{ name: 'Origen', value: 'Huila' }],
    ...overrides,
  };
}
