export const POINTER_NAME = 'eligibility';

export const QUERIES = {
  ACQUIRE_LEASE: `
    INSERT INTO publish_leases (lease_key, holder_id, acquired_at, expires_at)
    VALUES ($1, $2, NOW(), NOW() + ($3::integer * INTERVAL '1 millisecond'))
    ON CONFLICT (lease_key) DO UPDATE SET
      holder_id = EXCLUDED.holder_id,
      acquired_at = EXCLUDED.acquired_at,
      expires_at = EXCLUDED.expires_at
    WHERE publish_leases.expires_at < NOW() OR publish_leases.holder_id = EXCLUDED.holder_id
    RETURNING holder_id
  `,

  GET_LEASE_HOLDER: `
    SELECT holder_id FROM publish_leases WHERE lease_key = $1
  `,

  RELEASE_LEASE: `
    DELETE FROM publish_leases WHERE lease_key = $1 AND holder_id = $2
  `,

  INSERT_SNAPSHOT: `
    INSERT INTO eligibility_snapshots (
      snapshot_id, as_of_ts, rule_version, status, content_hash,
      line_count, summary_status, created_at, published_at, failure_message
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
  `,

  // one statement per chunk; arrays are unnested server side
  INSERT_LINES: `
    INSERT INTO eligibility_snapshot_lines (
      snapshot_id, scope_package_id, floc_id, vendor, assignment_status,
      ready_to_invoice_flg, invoiced_flg, paid_flg, blocker_codes, invoice_ids,
      as_of_ts, rule_version
    )
    SELECT $1, l.scope_package_id, l.floc_id, l.vendor, l.assignment_status,
           l.ready_to_invoice_flg, l.invoiced_flg, l.paid_flg,
           ARRAY(SELECT jsonb_array_elements_text(l.blocker_codes)),
           ARRAY(SELECT jsonb_array_elements_text(l.invoice_ids)),
           $2, $3
    FROM jsonb_to_recordset($4::jsonb) AS l(
      scope_package_id TEXT, floc_id TEXT, vendor TEXT, assignment_status TEXT,
      ready_to_invoice_flg BOOLEAN, invoiced_flg BOOLEAN, paid_flg BOOLEAN,
      blocker_codes JSONB, invoice_ids JSONB
    )
  `,

  INSERT_SUMMARY: `
    INSERT INTO eligibility_snapshot_summaries (
      snapshot_id, scope_package_id, vendor, line_count, ready_count,
      blocked_count, invoiced_count, paid_count, as_of_ts, rule_version
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
  `,

  SET_SUMMARY_STATUS: `
    UPDATE eligibility_snapshots SET summary_status = $2 WHERE snapshot_id = $1
  `,

  MARK_FAILED: `
    UPDATE eligibility_snapshots
    SET status = 'FAILED', failure_message = $2
    WHERE snapshot_id = $1 AND status <> 'PUBLISHED'
    RETURNING snapshot_id
  `,

  MARK_PUBLISHED: `
    UPDATE eligibility_snapshots
    SET status = 'PUBLISHED', published_at = NOW()
    WHERE snapshot_id = $1 AND status = 'COMMITTING'
    RETURNING *
  `,

  LOCK_POINTER: `
    SELECT * FROM eligibility_current_pointer WHERE pointer_name = $1 FOR UPDATE
  `,

  UPSERT_POINTER: `
    INSERT INTO eligibility_current_pointer (pointer_name, snapshot_id, version, as_of_ts, updated_at)
    VALUES ($1, $2, 1, $3, NOW())
    ON CONFLICT (pointer_name) DO UPDATE SET
      snapshot_id = EXCLUDED.snapshot_id,
      version = eligibility_current_pointer.version + 1,
      as_of_ts = EXCLUDED.as_of_ts,
      updated_at = EXCLUDED.updated_at
    RETURNING *
  `,

  GET_POINTER: `
    SELECT * FROM eligibility_current_pointer WHERE pointer_name = $1
  `,

  GET_SNAPSHOT: `
    SELECT * FROM eligibility_snapshots WHERE snapshot_id = $1
  `,

  LIST_SNAPSHOTS: `
    SELECT * FROM eligibility_snapshots ORDER BY created_at DESC
  `,

  GET_LINES: `
    SELECT * FROM eligibility_snapshot_lines
    WHERE snapshot_id = $1
    ORDER BY scope_package_id COLLATE "C", floc_id COLLATE "C"
  `,

  GET_SUMMARIES: `
    SELECT * FROM eligibility_snapshot_summaries
    WHERE snapshot_id = $1
    ORDER BY scope_package_id COLLATE "C"
  `,

  UPSERT_RUN: `
    INSERT INTO publish_runs (
      run_id, as_of_ts, rule_version, status, snapshot_id,
      message, metrics, started_at, ended_at
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
    ON CONFLICT (run_id) DO UPDATE SET
      status = EXCLUDED.status,
      snapshot_id = EXCLUDED.snapshot_id,
      message = EXCLUDED.message,
      metrics = EXCLUDED.metrics,
      ended_at = EXCLUDED.ended_at
  `,

  LIST_RUNS: `
    SELECT * FROM publish_runs ORDER BY started_at DESC LIMIT $1
  `,
} as const;
