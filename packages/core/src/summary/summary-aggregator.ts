import type {
  DraftLine,
  DraftSummary,
  SnapshotSummary,
} from '../snapshot-store/types.js';

/**
 * Roll lines up per scope package, sorted by package id. Pure; as_of and rule
 * version are carried over from the lines themselves.
 */
export function summarizeDraft(lines: readonly DraftLine[]): DraftSummary[] {
  const byPackage = new Map<string, DraftSummary>();

  for (const line of lines) {
    let summary = byPackage.get(line.scope_package_id);
    if (!summary) {
      summary = {
        scope_package_id: line.scope_package_id,
        vendor: line.vendor,
        line_count: 0,
        ready_count: 0,
        blocked_count: 0,
        invoiced_count: 0,
        paid_count: 0,
        as_of_ts: line.as_of_ts,
        rule_version: line.rule_version,
      };
      byPackage.set(line.scope_package_id, summary);
    }

    summary.line_count += 1;
    if (line.ready_to_invoice_flg) summary.ready_count += 1;
    else summary.blocked_count += 1;
    if (line.invoiced_flg) summary.invoiced_count += 1;
    if (line.paid_flg) summary.paid_count += 1;
  }

  return [...byPackage.values()].sort((a, b) =>
    a.scope_package_id < b.scope_package_id ? -1 : a.scope_package_id > b.scope_package_id ? 1 : 0,
  );
}

export function summarize(snapshotId: string, lines: readonly DraftLine[]): SnapshotSummary[] {
  return summarizeDraft(lines).map((summary) => ({ snapshot_id: snapshotId, ...summary }));
}
