// Alegra API Types (only the fields the jobs read; everything is optional in practice)
export interface AlegraRef {
  id?: string | number | null;
  name?: string | null;
}

export interface AlegraNumberTemplate {
  fullNumber?: string | null;
}

export interface AlegraContact extends AlegraRef {
  identification?: string | null;
  email?: string | null;
  phone?: string | null;
  phonePrimary?: string | null;
  address?: {
    address?: string | null;
    city?: string | null;
    department?: string | null;
  } | null;
}

export interface AlegraCostCenter extends AlegraRef {
  code?: string | null;
}

export interface AlegraTax {
  id?: string | number | null;
  name?: string | null;
  percentage?: string | number | null;
  amount?: number | null;
  type?: string | null;
}

export interface AlegraInvoiceItem {
  id?: string | number | null;
  name?: string | null;
  description?: string | null;
  price?: number | null;
  quantity?: number | null;
  discount?: number | null;
  total?: number | null;
  reference?: string | null;
  unit?: string | null;
}

export interface AlegraInvoice {
  id: string | number;
  date?: string | null;
  dueDate?: string | null;
  numberTemplate?: AlegraNumberTemplate | null;
  status?: string | null;
  subtotal?: number | null;
  discount?: number | null;
  tax?: number | null;
  total?: number | null;
  totalPaid?: number | null;
  balance?: number | null;
  term?: string | null;
  paymentForm?: string | null;
  client?: AlegraContact | null;
  seller?: AlegraContact | null;
  observations?: string | null;
  anotation?: string | null;
  warehouse?: AlegraRef | null;
  costCenter?: AlegraCostCenter | null;
  stamp?: {
    cufe?: string | null;
    legalStatus?: string | null;
  } | null;
  items?: Array<AlegraInvoiceItem | null> | null;
}

export interface AlegraBillCategory {
  id?: string | number | null;
  name?: string | null;
  price?: number | null;
  quantity?: number | null;
  discount?: number | null;
  observations?: string | null;
  subtotal?: number | null;
  total?: number | null;
  tax?: Array<AlegraTax | null> | null;
}

export interface AlegraRetention {
  id?: string | number | null;
  name?: string | null;
  percentage?: string | number | null;
  amount?: number | null;
  type?: string | null;
  calculatedBy?: string | null;
  isAssumed?: boolean | null;
  exchangeRate?: string | number | null;
}

export interface AlegraBill {
  id: string | number;
  date?: string | null;
  dueDate?: string | null;
  numberTemplate?: AlegraNumberTemplate | null;
  status?: string | null;
  total?: number | null;
  totalPaid?: number | null;
  balance?: number | null;
  type?: string | null;
  observations?: string | null;
  provider?: AlegraContact | null;
  warehouse?: AlegraRef | null;
  costCenter?: AlegraCostCenter | null;
  retentions?: Array<AlegraRetention | null> | null;
  purchases?: {
    categories?: Array<AlegraBillCategory | null> | null;
  } | null;
}

export interface AlegraPaymentInvoice {
  id?: string | number | null;
  number?: string | null;
  date?: string | null;
  amount?: number | null;
  total?: number | null;
  balance?: number | null;
}

export interface AlegraPaymentCategory {
  id?: string | number | null;
  name?: string | null;
  price?: number | null;
  quantity?: number | null;
  total?: number | null;
  observations?: string | null;
  behavior?: string | null;
}

export interface AlegraPayment {
  id: string | number;
  date?: string | null;
  number?: string | number | null;
  numberTemplate?: AlegraNumberTemplate | null;
  amount?: number | null;
  type?: string | null;
  paymentMethod?: string | null;
  status?: string | null;
  observations?: string | null;
  anotation?: string | null;
  bankAccount?: (AlegraRef & { type?: string | null }) | null;
  client?: AlegraContact | null;
  costCenter?: AlegraCostCenter | null;
  invoices?: Array<AlegraPaymentInvoice | null> | null;
  categories?: Array<AlegraPaymentCategory | null> | null;
}

/** Chart-of-accounts entry as returned by `/categories?format=plain`. */
export interface AlegraAccount {
  id: string | number;
  idGlobal?: string | number | null;
  idParent?: string | number | null;
  code?: string | null;
  name?: string | null;
  text?: string | null;
  description?: string | null;
  type?: string | null;
  status?: string | null;
  blocked?: string | boolean | null;
  nature?: string | null;
  use?: string | null;
  showThirdPartyBalance?: boolean | null;
  categoryRule?: { name?: string | null } | null;
}

export interface AlegraPrice {
  idPriceList?: string | number | null;
  name?: string | null;
  price?: number | null;
  main?: boolean | null;
  currency?: { code?: string | null } | null;
}

export interface AlegraItem {
  id: string | number;
  name?: string | null;
  description?: string | null;
  reference?: string | null;
  status?: string | null;
  type?: string | null;
  itemType?: string | null;
  productKey?: string | null;
  category?: AlegraRef | null;
  itemCategory?: (AlegraRef & { description?: string | null }) | null;
  price?: Array<AlegraPrice | null> | null;
  inventory?: {
    unit?: string | null;
    initialQuantity?: number | null;
    availableQuantity?: number | null;
    unitCost?: number | null;
    initialQuantityDate?: string | null;
  } | null;
  calculationScale?: number | null;
  hasNoIvaDays?: boolean | null;
  tax?: Array<AlegraTax | null> | null;
  customFields?: unknown[] | null;
}

// Microsoft Graph Types
export type FieldValue = string | number | boolean;
export type ListFields = Record<string, FieldValue>;

export interface GraphListItem {
  id: string;
  fields?: Record<string, unknown>;
}

export interface GraphCollection<T> {
  value: T[];
  '@odata.nextLink'?: string;
}

export interface GraphDriveItem {
  id: string;
  name: string;
  size?: number;
  webUrl?: string;
  createdDateTime?: string;
  lastModifiedDateTime?: string;
  file?: Record<string, unknown>;
  folder?: Record<string, unknown>;
  '@microsoft.graph.downloadUrl'?: string;
}

// Flattened rows
export interface SalesInvoiceRow {
  id: string;
  date: string | null;
  dueDate: string | null;
  number: string;
  status: string;
  subtotal: number;
  discount: number;
  tax: number;
  total: number;
  totalPaid: number;
  balance: number;
  term: string;
  paymentForm: string;
  clientId: string;
  clientName: string;
  clientIdentification: string;
  clientEmail: string;
  clientPhone: string;
  clientCity: string;
  clientDepartment: string;
  clientAddress: string;
  sellerName: string;
  sellerIdentification: string;
  observations: string;
  anotation: string;
  warehouse: string;
  costCenter: string;
  cufe: string;
  legalStatus: string;
  itemCount: number;
}

export interface SalesInvoiceItemRow {
  invoiceId: string;
  invoiceNumber: string;
  name: string;
  description: string;
  price: number;
  quantity: number;
  discount: number;
  total: number;
  reference: string;
  unit: string;
}

export interface TaxSummary {
  totalTax: number;
  detail: string;
  ivaPercentage: number;
  ivaAmount: number;
}

export interface PurchaseBillRow {
  id: string;
  date: string | null;
  dueDate: string | null;
  number: string;
  status: string;
  total: number;
  totalPaid: number;
  balance: number;
  billType: string;
  observations: string;
  providerId: string;
  providerName: string;
  providerIdentification: string;
  providerEmail: string;
  providerPhone: string;
  warehouse: string;
  costCenter: string;
  costCenterCode: string;
  retentionCount: number;
  categoryCount: number;
}

export interface PurchaseCategoryRow {
  billNumber: string;
  categoryId: string;
  categoryName: string;
  unitPrice: number;
  quantity: number;
  discount: number;
  observations: string;
  subtotal: number;
  total: number;
  taxes: TaxSummary;
}

export interface PurchaseRetentionRow {
  id: string;
  name: string;
  percentage: string;
  amount: number;
  billNumber: string;
  retentionType: string;
  calculatedBy: string;
  isAssumed: boolean;
  exchangeRate: string;
  assumedBy: 'Empresa' | 'Proveedor';
}

export type PaymentRowKind = 'simple' | 'invoice' | 'category';

export interface PaymentRow {
  kind: PaymentRowKind;
  paymentId: string;
  date: string | null;
  number: string;
  internalNumber: string;
  amount: number;
  paymentType: string;
  method: string;
  status: string;
  observations: string;
  anotation: string;
  accountId: string;
  accountName: string;
  accountType: string;
  clientId: string;
  clientName: string;
  clientPhone: string;
  clientIdentification: string;
  costCenterId: string;
  costCenterCode: string;
  costCenterName: string;
  invoiceId: string;
  invoiceNumber: string;
  invoiceDate: string | null;
  invoicePaid: number;
  invoiceTotal: number;
  invoiceBalance: number;
  categoryId: string;
  categoryName: string;
  categoryPrice: number;
  categoryQuantity: number;
  categoryTotal: number;
  categoryObservations: string;
  categoryBehavior: string;
}

export interface AccountRow {
  id: string;
  parentId: string | null;
  globalId: string;
  code: string;
  name: string;
  text: string;
  description: string;
  type: string;
  status: string;
  blocked: string;
  nature: string;
  use: string;
  showThirdPartyBalance: string;
  categoryRule: string;
}

export interface ProductRow {
  id: string;
  name: string;
  description: string;
  reference: string;
  status: string;
  type: string;
  itemType: string;
  productKey: string;
  categoryId: string;
  categoryName: string;
  itemCategoryId: string;
  itemCategoryName: string;
  itemCategoryDescription: string;
  mainPrice: number;
  currency: string;
  priceList: string;
  unit: string;
  initialQuantity: number;
  availableQuantity: number;
  unitCost: number;
  initialQuantityDate: string;
  calculationScale: number;
  hasNoIvaDays: boolean;
  ivaPercentage: number;
  ivaName: string;
  otherTaxes: string;
  taxCount: number;
  priceCount: number;
  customFieldCount: number;
}

// Config Types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ListNames {
  salesInvoices: string;
  salesInvoiceItems: string;
  payments: string;
  purchaseBills: string;
  purchaseCategories: string;
  purchaseRetentions: string;
  accounts: string;
  products: string;
}

export interface AppConfig {
  alegraEmail: string;
  alegraToken: string;
  azureTenantId: string;
  azureClientId: string;
  azureClientSecret: string;
  siteUrl: string;
  lists: ListNames;
  exportFolder: string;
  backfillStartDate: string; // YYYY-MM-DD
  backfillEndDate: string; // YYYY-MM-DD, empty = today
  batchSize: number;
  alegraPagePauseMs: number;
  rateLimitPauseMs: number;
  rateLimitRetries: number;
  batchPauseMs: number;
  deletePauseMs: number;
  datePauseMs: number;
  requestTimeoutMs: number;
  syncCron: string;
  logLevel: LogLevel;
  logDir: string;
}

// Sync Types
export interface DateRange {
  from: string; // YYYY-MM-DD
  to: string; // YYYY-MM-DD
}

export interface UploadCounts {
  created: number;
  failed: number;
}

export interface JobResult {
  success: boolean;
  fetched: number;
  uploads: Record<string, UploadCounts>;
  skipped?: number;
  exportedFile?: string | null;
  failedDates?: string[];
}
