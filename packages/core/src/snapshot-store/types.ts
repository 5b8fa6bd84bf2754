import type { AssignmentStatus } from '../grain/types.js';

export type SnapshotStatus = 'DRAFT' | 'COMMITTING' | 'PUBLISHED' | 'FAILED';

export type SummaryStatus = 'COMPLETE' | 'PENDING';

export interface Snapshot {
  snapshot_id: string;
  as_of_ts: Date;
  rule_version: string;
  status: SnapshotStatus;
  /** SHA-256 over the sorted line content; equal inputs give equal hashes. */
  content_hash: string;
  line_count: number;
  summary_status: SummaryStatus;
  created_at: Date;
  published_at: Date | null;
  failure_message: string | null;
}

export interface SnapshotLine {
  snapshot_id: string;
  scope_package_id: string;
  floc_id: string;
  vendor: string;
  assignment_status: AssignmentStatus;
  ready_to_invoice_flg: boolean;
  invoiced_flg: boolean;
  paid_flg: boolean;
  blocker_codes: string[];
  invoice_ids: string[];
  as_of_ts: Date;
  rule_version: string;
}

export interface SnapshotSummary {
  snapshot_id: string;
  scope_package_id: string;
  vendor: string;
  line_count: number;
  ready_count: number;
  blocked_count: number;
  invoiced_count: number;
  paid_count: number;
  as_of_ts: Date;
  rule_version: string;
}

/** A line as computed during DRAFT, before a snapshot identity is minted. */
export type DraftLine = Omit<SnapshotLine, 'snapshot_id'>;

export type DraftSummary = Omit<SnapshotSummary, 'snapshot_id'>;

/** Versioned reference to the snapshot presented as "latest". */
export interface CurrentPointer {
  snapshot_id: string;
  version: number;
  as_of_ts: Date;
  updated_at: Date;
}

export type LeaseResult = { acquired: true } | { acquired: false; held_by: string };

export interface PublishOutcome {
  snapshot: Snapshot;
  pointer: CurrentPointer | null;
  pointer_advanced: boolean;
}

export type PublishRunStatus = 'RUNNING' | 'SUCCEEDED' | 'FAILED';

export interface PublishRun {
  run_id: string;
  as_of_ts: Date;
  rule_version: string;
  status: PublishRunStatus;
  snapshot_id: string | null;
  message: string | null;
  metrics: Record<string, unknown>;
  started_at: Date;
  ended_at: Date | null;
}

/**
 * Append-only persistence for snapshots. Lines and summaries are written once;
 * the only mutable cells are a snapshot's status and the current pointer, and both
 * change only through `publishSnapshot` / `markFailed` / `markSummaryPending`.
 */
export interface SnapshotStore {
  acquireLease(leaseKey: string, holderId: string, ttlMs: number): Promise<LeaseResult>;
  releaseLease(leaseKey: string, holderId: string): Promise<void>;

  /** Atomically append the snapshot row (status COMMITTING) and all of its lines. */
  commitSnapshot(snapshot: Snapshot, lines: SnapshotLine[]): Promise<void>;
  markFailed(snapshotId: string, message: string): Promise<void>;
  writeSummaries(snapshotId: string, summaries: SnapshotSummary[]): Promise<void>;
  markSummaryPending(snapshotId: string): Promise<void>;
  /** Mark PUBLISHED and, unless it would move backwards in as_of time, advance the pointer. */
  publishSnapshot(snapshotId: string): Promise<PublishOutcome>;

  getCurrentPointer(): Promise<CurrentPointer | null>;
  getSnapshot(snapshotId: string): Promise<Snapshot | null>;
  listSnapshots(): Promise<Snapshot[]>;
  getLines(snapshotId: string): Promise<SnapshotLine[]>;
  getSummaries(snapshotId: string): Promise<SnapshotSummary[]>;

  recordRun(run: PublishRun): Promise<void>;
  listRuns(limit?: number): Promise<PublishRun[]>;
  ping(): Promise<void>;
}
