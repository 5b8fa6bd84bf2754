import type pg from 'pg';
import { withTransaction } from '../shared/database.js';
import { SnapshotStoreError } from '../shared/errors.js';
import type { AssignmentStatus } from '../grain/types.js';
import { POINTER_NAME, QUERIES } from './snapshot-store.queries.js';
import type {
  CurrentPointer,
  LeaseResult,
  PublishOutcome,
  PublishRun,
  PublishRunStatus,
  Snapshot,
  SnapshotLine,
  SnapshotStatus,
  SnapshotStore,
  SnapshotSummary,
  SummaryStatus,
} from './types.js';

const LINE_CHUNK_SIZE = 1000;

export interface SnapshotRow {
  snapshot_id: string;
  as_of_ts: Date;
  rule_version: string;
  status: SnapshotStatus;
  content_hash: string;
  line_count: number;
  summary_status: SummaryStatus;
  created_at: Date;
  published_at: Date | null;
  failure_message: string | null;
}

export interface SnapshotLineRow {
  snapshot_id: string;
  scope_package_id: string;
  floc_id: string;
  vendor: string;
  assignment_status: AssignmentStatus;
  ready_to_invoice_flg: boolean;
  invoiced_flg: boolean;
  paid_flg: boolean;
  blocker_codes: string[] | null;
  invoice_ids: string[] | null;
  as_of_ts: Date;
  rule_version: string;
}

export interface PointerRow {
  pointer_name: string;
  snapshot_id: string;
  version: number;
  as_of_ts: Date;
  updated_at: Date;
}

export interface PublishRunRow {
  run_id: string;
  as_of_ts: Date;
  rule_version: string;
  status: PublishRunStatus;
  snapshot_id: string | null;
  message: string | null;
  metrics: Record<string, unknown> | null;
  started_at: Date;
  ended_at: Date | null;
}

export function rowToSnapshot(row: SnapshotRow): Snapshot {
  return {
    snapshot_id: row.snapshot_id,
    as_of_ts: row.as_of_ts,
    rule_version: row.rule_version,
    status: row.status,
    content_hash: row.content_hash,
    line_count: Number(row.line_count),
    summary_status: row.summary_status,
    created_at: row.created_at,
    published_at: row.published_at ?? null,
    failure_message: row.failure_message ?? null,
  };
}

export function rowToSnapshotLine(row: SnapshotLineRow): SnapshotLine {
  return {
    snapshot_id: row.snapshot_id,
    scope_package_id: row.scope_package_id,
    floc_id: row.floc_id,
    vendor: row.vendor,
    assignment_status: row.assignment_status,
    ready_to_invoice_flg: row.ready_to_invoice_flg,
    invoiced_flg: row.invoiced_flg,
    paid_flg: row.paid_flg,
    blocker_codes: row.blocker_codes ?? [],
    invoice_ids: row.invoice_ids ?? [],
    as_of_ts: row.as_of_ts,
    rule_version: row.rule_version,
  };
}

export function rowToPointer(row: PointerRow): CurrentPointer {
  return {
    snapshot_id: row.snapshot_id,
    version: Number(row.version),
    as_of_ts: row.as_of_ts,
    updated_at: row.updated_at,
  };
}

export function rowToPublishRun(row: PublishRunRow): PublishRun {
  return {
    run_id: row.run_id,
    as_of_ts: row.as_of_ts,
    rule_version: row.rule_version,
    status: row.status,
    snapshot_id: row.snapshot_id ?? null,
    message: row.message ?? null,
    metrics: row.metrics ?? {},
    started_at: row.started_at,
    ended_at: row.ended_at ?? null,
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PgSnapshotStore implements SnapshotStore {
  constructor(private readonly pool: pg.Pool) {}

  async acquireLease(leaseKey: string, holderId: string, ttlMs: number): Promise<LeaseResult> {
    const { rows } = await this.pool.query<{ holder_id: string }>(QUERIES.ACQUIRE_LEASE, [
      leaseKey,
      holderId,
      ttlMs,
    ]);
    if (rows.length > 0) return { acquired: true };

    const { rows: holders } = await this.pool.query<{ holder_id: string }>(
      QUERIES.GET_LEASE_HOLDER,
      [leaseKey],
    );
    return { acquired: false, held_by: holders[0]?.holder_id ?? 'unknown' };
  }

  async releaseLease(leaseKey: string, holderId: string): Promise<void> {
    await this.pool.query(QUERIES.RELEASE_LEASE, [leaseKey, holderId]);
  }

  async commitSnapshot(snapshot: Snapshot, lines: SnapshotLine[]): Promise<void> {
    try {
      await withTransaction(this.pool, async (client) => {
        await client.query(QUERIES.INSERT_SNAPSHOT, [
          snapshot.snapshot_id,
          snapshot.as_of_ts,
          snapshot.rule_version,
          snapshot.status,
          snapshot.content_hash,
          snapshot.line_count,
          snapshot.summary_status,
          snapshot.created_at,
          snapshot.published_at,
          snapshot.failure_message,
        ]);

        for (let i = 0; i < lines.length; i += LINE_CHUNK_SIZE) {
          const chunk = lines.slice(i, i + LINE_CHUNK_SIZE).map((line) => ({
            scope_package_id: line.scope_package_id,
            floc_id: line.floc_id,
            vendor: line.vendor,
            assignment_status: line.assignment_status,
            ready_to_invoice_flg: line.ready_to_invoice_flg,
            invoiced_flg: line.invoiced_flg,
            paid_flg: line.paid_flg,
            blocker_codes: line.blocker_codes,
            invoice_ids: line.invoice_ids,
          }));
          await client.query(QUERIES.INSERT_LINES, [
            snapshot.snapshot_id,
            snapshot.as_of_ts,
            snapshot.rule_version,
            JSON.stringify(chunk),
          ]);
        }
      });
    } catch (error: unknown) {
      throw new SnapshotStoreError(
        `Failed to commit snapshot ${snapshot.snapshot_id}: ${describeError(error)}`,
        'COMMIT_FAILED',
        error,
      );
    }
  }

  async markFailed(snapshotId: string, message: string): Promise<void> {
    const { rows } = await this.pool.query(QUERIES.MARK_FAILED, [snapshotId, message]);
    if (rows.length === 0) {
      throw new SnapshotStoreError(
        `Snapshot ${snapshotId} is missing or already published`,
        'IMMUTABLE',
      );
    }
  }

  async writeSummaries(snapshotId: string, summaries: SnapshotSummary[]): Promise<void> {
    try {
      await withTransaction(this.pool, async (client) => {
        for (const summary of summaries) {
          await client.query(QUERIES.INSERT_SUMMARY, [
            snapshotId,
            summary.scope_package_id,
            summary.vendor,
            summary.line_count,
            summary.ready_count,
            summary.blocked_count,
            summary.invoiced_count,
            summary.paid_count,
            summary.as_of_ts,
            summary.rule_version,
          ]);
        }
        await client.query(QUERIES.SET_SUMMARY_STATUS, [snapshotId, 'COMPLETE']);
      });
    } catch (error: unknown) {
      throw new SnapshotStoreError(
        `Failed to write summaries for snapshot ${snapshotId}: ${describeError(error)}`,
        'SUMMARY_WRITE_FAILED',
        error,
      );
    }
  }

  async markSummaryPending(snapshotId: string): Promise<void> {
    await this.pool.query(QUERIES.SET_SUMMARY_STATUS, [snapshotId, 'PENDING']);
  }

  async publishSnapshot(snapshotId: string): Promise<PublishOutcome> {
    return withTransaction(this.pool, async (client) => {
      const { rows } = await client.query<SnapshotRow>(QUERIES.MARK_PUBLISHED, [snapshotId]);
      if (rows.length === 0) {
        throw new SnapshotStoreError(
          `Snapshot ${snapshotId} is not in COMMITTING status`,
          'INVALID_STATUS',
        );
      }
      const snapshot = rowToSnapshot(rows[0]);

      const { rows: pointerRows } = await client.query<PointerRow>(QUERIES.LOCK_POINTER, [
        POINTER_NAME,
      ]);
      const current = pointerRows.length > 0 ? rowToPointer(pointerRows[0]) : null;
      if (current && current.as_of_ts.getTime() > snapshot.as_of_ts.getTime()) {
        return { snapshot, pointer: current, pointer_advanced: false };
      }

      const { rows: updated } = await client.query<PointerRow>(QUERIES.UPSERT_POINTER, [
        POINTER_NAME,
        snapshotId,
        snapshot.as_of_ts,
      ]);
      return { snapshot, pointer: rowToPointer(updated[0]), pointer_advanced: true };
    });
  }

  async getCurrentPointer(): Promise<CurrentPointer | null> {
    const { rows } = await this.pool.query<PointerRow>(QUERIES.GET_POINTER, [POINTER_NAME]);
    return rows.length > 0 ? rowToPointer(rows[0]) : null;
  }

  async getSnapshot(snapshotId: string): Promise<Snapshot | null> {
    const { rows } = await this.pool.query<SnapshotRow>(QUERIES.GET_SNAPSHOT, [snapshotId]);
    return rows.length > 0 ? rowToSnapshot(rows[0]) : null;
  }

  async listSnapshots(): Promise<Snapshot[]> {
    const { rows } = await this.pool.query<SnapshotRow>(QUERIES.LIST_SNAPSHOTS);
    return rows.map(rowToSnapshot);
  }

  async getLines(snapshotId: string): Promise<SnapshotLine[]> {
    const { rows } = await this.pool.query<SnapshotLineRow>(QUERIES.GET_LINES, [snapshotId]);
    return rows.map(rowToSnapshotLine);
  }

  async getSummaries(snapshotId: string): Promise<SnapshotSummary[]> {
    const { rows } = await this.pool.query<SnapshotSummary>(QUERIES.GET_SUMMARIES, [snapshotId]);
    return rows.map((row) => ({ ...row }));
  }

  async recordRun(run: PublishRun): Promise<void> {
    await this.pool.query(QUERIES.UPSERT_RUN, [
      run.run_id,
      run.as_of_ts,
      run.rule_version,
      run.status,
      run.snapshot_id,
      run.message,
      JSON.stringify(run.metrics),
      run.started_at,
      run.ended_at,
    ]);
  }

  async listRuns(limit = 100): Promise<PublishRun[]> {
    const { rows } = await this.pool.query<PublishRunRow>(QUERIES.LIST_RUNS, [limit]);
    return rows.map(rowToPublishRun);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
