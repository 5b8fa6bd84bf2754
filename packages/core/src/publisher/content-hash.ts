import { createHash } from 'node:crypto';
import type { DraftLine } from '../snapshot-store/types.js';

function compareLines(a: DraftLine, b: DraftLine): number {
  if (a.scope_package_id !== b.scope_package_id) {
    return a.scope_package_id < b.scope_package_id ? -1 : 1;
  }
  if (a.floc_id !== b.floc_id) return a.floc_id < b.floc_id ? -1 : 1;
  return 0;
}

/**
 * SHA-256 over the decision content of each line in key order. Snapshot identity,
 * as_of and rule version are not part of the hash.
 */
export function computeContentHash(lines: readonly DraftLine[]): string {
  const hash = createHash('sha256');
  for (const line of [...lines].sort(compareLines)) {
    hash.update(
      JSON.stringify([
        line.scope_package_id,
        line.floc_id,
        line.vendor,
        line.assignment_status,
        line.ready_to_invoice_flg,
        line.invoiced_flg,
        line.paid_flg,
        line.blocker_codes,
        line.invoice_ids,
      ]),
    );
    hash.update('\n');
  }
  return hash.digest('hex');
}
