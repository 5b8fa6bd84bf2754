// Evidence and invoice relations are read whole; the reconcilers apply the as_of cut
// after their grain checks have seen every row.
export const QUERIES = {
  READ_ONLY_SNAPSHOT: `SET TRANSACTION ISOLATION LEVEL REPEATABLE READ, READ ONLY`,

  LIST_PACKAGES: `
    SELECT scope_package_id, vendor, status, upload_version
    FROM scope_packages
    ORDER BY scope_package_id
  `,

  LIST_LINES: `
    SELECT scope_package_id, floc_id, upload_version
    FROM package_lines
    ORDER BY scope_package_id, floc_id, upload_version
  `,

  LIST_INTERVALS: `
    SELECT floc_id, scope_package_id, effective_start_ts, effective_end_ts
    FROM assignment_intervals
    ORDER BY floc_id, effective_start_ts
  `,

  LIST_EVIDENCE: `
    SELECT scope_package_id, floc_id, evidence_type, received_flg, evidence_ts, count
    FROM evidence_aggregates
    WHERE evidence_type = $1
    ORDER BY scope_package_id, floc_id
  `,

  LIST_INVOICES: `
    SELECT invoice_id, scope_package_id, floc_id, invoiced_ts, paid_ts
    FROM invoice_line_facts
    ORDER BY invoice_id, scope_package_id, floc_id
  `,

  LIST_REVERSALS: `
    SELECT invoice_id, scope_package_id, floc_id, reversed_ts, reason
    FROM invoice_reversal_facts
    ORDER BY invoice_id, scope_package_id, floc_id
  `,
} as const;
