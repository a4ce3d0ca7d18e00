/**
 * Candidate internal names for lookup columns.
 *
 * SharePoint derives a column's internal name from the display name it was
 * first created with (spaces become `_x0020_`, some tenants drop them), and
 * Graph accepts either the `...LookupId` form or the bare name depending on
 * how the column was provisioned. The uploader tries these in order.
 */

export const SALES_INVOICE_LOOKUP_FIELDS = [
  'Factura_x0020_de_x0020_VentaLookupId',
  'Factura_x0020_de_x0020_Venta',
  'FacturadeVentaLookupId',
  'FacturadeVenta',
] as const;

export const PURCHASE_BILL_LOOKUP_FIELDS = [
  'Factura_x0020_de_x0020_CompraLookupId',
  'Factura_x0020_de_x0020_Compra',
  'FacturadeCompraLookupId',
  'FacturadeCompra',
] as const;

export const PARENT_ACCOUNT_LOOKUP_FIELDS = [
  'ID_x0020_PadreLookupId',
  'ID_x0020_Padre',
  'IDPadreLookupId',
  'ID_PadreLookupId',
] as const;
