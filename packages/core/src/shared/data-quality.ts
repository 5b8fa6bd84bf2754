export type DataQualityIssueKind =
  | 'INGESTION_INCOMPLETE'
  | 'ORPHAN_INVOICE_LINE'
  | 'UNMATCHED_EVIDENCE'
  | 'ASSIGNMENT_UNRESOLVED'
  | 'INVOICE_REGRESSION';

/** Non-fatal finding recorded with a publish cycle instead of aborting it. */
export interface DataQualityIssue {
  kind: DataQualityIssueKind;
  message: string;
  source?: string;
  scope_package_id?: string;
  floc_id?: string;
  invoice_id?: string;
}

export function countIssuesByKind(
  issues: DataQualityIssue[],
): Partial<Record<DataQualityIssueKind, number>> {
  const counts: Partial<Record<DataQualityIssueKind, number>> = {};
  for (const issue of issues) {
    counts[issue.kind] = (counts[issue.kind] ?? 0) + 1;
  }
  return counts;
}
