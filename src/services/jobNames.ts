export const JOB_NAMES = [
  'sales-invoices',
  'payments',
  'reconcile-payments',
  'purchase-bills',
  'accounts',
  'products',
] as const;

export type JobName = typeof JOB_NAMES[number];

// Daily run; accounts and products are loaded on demand
export const DEFAULT_SEQUENCE: readonly JobName[] = [
  'sales-invoices',
  'payments',
  'reconcile-payments',
  'purchase-bills',
];

export function isJobName(value: string): value is JobName {
  return JOB_NAMES.some(name => name === value);
}
