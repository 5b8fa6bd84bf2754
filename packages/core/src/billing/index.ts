export { reconcileBilling } from './billing-reconciler.js';
export type { BillingReconciliation, BillingRow, BillingStatus } from './billing-reconciler.js';
