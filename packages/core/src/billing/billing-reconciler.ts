import { getLogger } from '../shared/logger.js';
import type { DataQualityIssue } from '../shared/data-quality.js';
import { lineKey } from '../inputs/types.js';
import type { InvoiceLineFact, InvoiceReversalFact } from '../inputs/types.js';
import type { SpineRow } from '../grain/types.js';

export interface BillingStatus {
  invoiced_flg: boolean;
  paid_flg: boolean;
  /** Invoices counting toward invoiced_flg as of the cycle, sorted. */
  invoice_ids: string[];
  /** Invoices on this line cancelled by a reversal fact as of the cycle, sorted. */
  reversed_invoice_ids: string[];
}

export type BillingRow<T extends SpineRow = SpineRow> = T & { billing: BillingStatus };

export interface BillingReconciliation<T extends SpineRow> {
  rows: BillingRow<T>[];
  issues: DataQualityIssue[];
}

function reversalKey(invoiceId: string, scopePackageId: string, flocId: string): string {
  return `${invoiceId}|${lineKey(scopePackageId, flocId)}`;
}

/**
 * Join invoice facts onto the spine and derive invoiced/paid status as of `asOf`.
 * Invoice lines whose key is not on the spine are orphans: reported, never joined.
 */
export function reconcileBilling<T extends SpineRow>(
  rows: T[],
  invoices: InvoiceLineFact[],
  reversals: InvoiceReversalFact[],
  asOf: Date,
): BillingReconciliation<T> {
  const logger = getLogger('billing-reconciler');
  const t = asOf.getTime();
  const issues: DataQualityIssue[] = [];

  if (invoices.length === 0) {
    issues.push({
      kind: 'INGESTION_INCOMPLETE',
      message: 'No invoice lines delivered for this cycle',
      source: 'invoices',
    });
  }

  const reversed = new Set<string>();
  for (const reversal of reversals) {
    if (reversal.reversed_ts.getTime() <= t) {
      reversed.add(reversalKey(reversal.invoice_id, reversal.scope_package_id, reversal.floc_id));
    }
  }

  const spineKeys = new Set(rows.map((row) => lineKey(row.scope_package_id, row.floc_id)));
  const byKey = new Map<string, InvoiceLineFact[]>();
  for (const invoice of invoices) {
    const key = lineKey(invoice.scope_package_id, invoice.floc_id);
    if (!spineKeys.has(key)) {
      logger.warn(
        {
          invoice_id: invoice.invoice_id,
          scope_package_id: invoice.scope_package_id,
          floc_id: invoice.floc_id,
        },
        'orphan invoice line excluded from billing join',
      );
      issues.push({
        kind: 'ORPHAN_INVOICE_LINE',
        message: `Invoice ${invoice.invoice_id} bills (${invoice.scope_package_id}, ${invoice.floc_id}), which is not a package line`,
        source: 'invoices',
        invoice_id: invoice.invoice_id,
        scope_package_id: invoice.scope_package_id,
        floc_id: invoice.floc_id,
      });
      continue;
    }
    const existing = byKey.get(key) ?? [];
    existing.push(invoice);
    byKey.set(key, existing);
  }

  const reconciled = rows.map((row): BillingRow<T> => {
    const candidates = byKey.get(lineKey(row.scope_package_id, row.floc_id)) ?? [];
    const counting: InvoiceLineFact[] = [];
    const reversedIds: string[] = [];

    for (const invoice of candidates) {
      if (invoice.invoiced_ts.getTime() > t) continue;
      if (reversed.has(reversalKey(invoice.invoice_id, invoice.scope_package_id, invoice.floc_id))) {
        reversedIds.push(invoice.invoice_id);
        continue;
      }
      counting.push(invoice);
    }

    return {
      ...row,
      billing: {
        invoiced_flg: counting.length > 0,
        paid_flg: counting.some((invoice) => invoice.paid_ts !== null && invoice.paid_ts.getTime() <= t),
        invoice_ids: [...new Set(counting.map((invoice) => invoice.invoice_id))].sort(),
        reversed_invoice_ids: [...new Set(reversedIds)].sort(),
      },
    };
  });

  return { rows: reconciled, issues };
}
