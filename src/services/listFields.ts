import type {
  AccountRow,
  FieldValue,
  ListFields,
  PaymentRow,
  ProductRow,
  PurchaseBillRow,
  PurchaseCategoryRow,
  PurchaseRetentionRow,
  SalesInvoiceItemRow,
  SalesInvoiceRow,
} from '../types/index.js';

/**
 * Flat rows → SharePoint list columns (internal names).
 * `Title` holds the natural key of each row. Lookup columns are added by the
 * uploader, not here.
 */

type DraftFields = Record<string, FieldValue | null | undefined>;

/** Drops null and undefined values; Graph rejects them for typed columns. */
export function compact(fields: DraftFields): ListFields {
  const result: ListFields = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== null && value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function blankToUndefined(value: string | null): string | undefined {
  return value === null || value.trim() === '' ? undefined : value;
}

/** Keeps digits and '.', then parses. `'2.5%'` → 2.5, `''` → 0. */
export function cleanPercentage(value: string): number {
  const cleaned = value.replace(/[^\d.]/g, '');
  const parsed = parseFloat(cleaned);
  return Number.isNaN(parsed) ? 0 : parsed;
}

export function salesInvoiceFields(row: SalesInvoiceRow): ListFields {
  return compact({
    Title: row.id,
    Fecha: row.date,
    Fecha_x0020_Vencimiento: row.dueDate,
    Numero_x0020_Factura: row.number,
    Subtotal: row.subtotal,
    Descuento: row.discount,
    Impuestos: row.tax,
    Total: row.total,
    Total_x0020_Pagado: row.totalPaid,
    Saldo: row.balance,
    Cliente_x0020_Nombre: row.clientName,
    Estado: row.status,
  });
}

export function salesInvoiceItemFields(row: SalesInvoiceItemRow): ListFields {
  return compact({
    Title: row.invoiceNumber,
    Nombre: row.name,
    Precio: row.price,
    Cantidad: row.quantity,
    Descuento: row.discount,
    Total: row.total,
  });
}

export function paymentFields(row: PaymentRow): ListFields {
  return compact({
    Title: row.paymentId,
    Fecha: row.date,
    Numero_x0020_Pago: row.number,
    Numero_x0020_Interno: row.internalNumber,
    Monto_x0020_Total: row.amount,
    Tipo_x0020_Pago: row.paymentType,
    Metodo_x0020_Pago: row.method,
    Estado_x0020_Pago: row.status,
    Observaciones: row.observations,
    Cuenta_x0020_Nombre: row.accountName,
    ID_x0020_Cuenta: row.accountId,
    Cuenta_x0020_Tipo: row.accountType,
    ID_x0020_Cliente: row.clientId,
    Nombre_x0020_Cliente: row.clientName,
    Identificacion_x0020_Cliente: row.clientIdentification,
    ID_x0020_Factura: row.invoiceId,
    Numero_x0020_Factura: row.invoiceNumber,
    // Date column: an empty string is rejected, so only send a real date
    Fecha_x0020_Factura: blankToUndefined(row.invoiceDate),
    Factura_x0020_Monto_x0020_Pagado: row.invoicePaid,
    Total_x0020_Factura: row.invoiceTotal,
    Saldo_x0020_Factura: row.invoiceBalance,
    Nombre_x0020_Categoria: row.categoryName,
    Precio_x0020_Categoria: row.categoryPrice,
    Cantidad_x0020_Categoria: row.categoryQuantity,
    Total_x0020_Categoria: row.categoryTotal,
    Observaciones_x0020_Categoria: row.categoryObservations,
  });
}

export function purchaseBillFields(row: PurchaseBillRow): ListFields {
  return compact({
    Title: row.id,
    Fecha: row.date,
    Fecha_x0020_Vencimiento: row.dueDate,
    Numero_x0020_Factura: row.number,
    Estado: row.status,
    Total: row.total,
    Total_x0020_Pagado: row.totalPaid,
    Saldo: row.balance,
    Tipo_x0020_Factura: row.billType,
    Observaciones: row.observations,
    ID_x0020_Proveedor: row.providerId,
    Nombre_x0020_Proveedor: row.providerName,
    Identificacion_x0020_Proveedor: row.providerIdentification,
    Nombre_x0020_Almacen: row.warehouse,
    Centro_x0020_de_x0020_Costo: row.costCenter,
    Codigo_x0020_Unico: row.costCenterCode,
    Cantidad_x0020_Retenciones: row.retentionCount,
    Cantidad_x0020_Categorias: row.categoryCount,
  });
}

export function purchaseCategoryFields(row: PurchaseCategoryRow): ListFields {
  return compact({
    Title: row.billNumber,
    Categoria_x0020_ID: row.categoryId,
    Categoria_x0020_Nombre: row.categoryName,
    Precio_x0020_Unitario: row.unitPrice,
    Cantidad: row.quantity,
    Descuento: row.discount,
    Observaciones: row.observations,
    Subtotal: row.subtotal,
    Total_x0020_Categoria: row.total,
    Impuestos: row.taxes.totalTax,
  });
}

export function purchaseRetentionFields(row: PurchaseRetentionRow): ListFields {
  return compact({
    Title: row.id,
    Nombre: row.name,
    Monto: row.amount,
    Retencion_x0020_Tipo: row.retentionType,
    Calculado_x0020_Por: row.calculatedBy,
    Tipo_x0020_de_x0020_Cambio: row.exchangeRate,
    Asumido_x0020_Por: row.assumedBy,
    Porcentaje: cleanPercentage(row.percentage),
  });
}

export function accountFields(row: AccountRow): ListFields {
  return compact({
    Title: row.id,
    ID_x0020_Global: row.globalId,
    Codigo: row.code,
    Nombre: row.name,
    Texto: row.text,
    Tipo_x0020_Cuenta_x0020_Contable: row.type,
    Estado: row.status,
    Bloqueado: row.blocked,
    Naturaleza: row.nature,
    Uso: row.use,
    // Internal name truncated by SharePoint at 32 characters
    Mostrar_x0020_Saldo_x0020_por_x0: row.showThirdPartyBalance,
    Descripcion: row.description || undefined,
    Regla_x0020_de_x0020_Categoria: row.categoryRule || undefined,
  });
}

export function productFields(row: ProductRow): ListFields {
  return compact({
    Title: row.name,
    Categoria: row.itemCategoryName,
    Precio_x0020_Principal: row.mainPrice,
  });
}
