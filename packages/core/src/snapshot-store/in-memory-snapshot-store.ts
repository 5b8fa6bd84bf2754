import { EntityNotFoundError, SnapshotStoreError } from '../shared/errors.js';
import { lineKey } from '../inputs/types.js';
import type {
  CurrentPointer,
  LeaseResult,
  PublishOutcome,
  PublishRun,
  Snapshot,
  SnapshotLine,
  SnapshotStore,
  SnapshotSummary,
} from './types.js';

interface Lease {
  holder_id: string;
  expires_at: number;
}

function frozenCopy(values: string[]): string[] {
  const copy = [...values];
  Object.freeze(copy);
  return copy;
}

function freezeLine(line: SnapshotLine): SnapshotLine {
  return Object.freeze({
    ...line,
    blocker_codes: frozenCopy(line.blocker_codes),
    invoice_ids: frozenCopy(line.invoice_ids),
  });
}

/**
 * Arena of write-once records addressed by snapshot_id. Snapshot rows are replaced
 * by a new frozen record on each status change; lines and summaries never change.
 */
export class InMemorySnapshotStore implements SnapshotStore {
  private readonly snapshots = new Map<string, Snapshot>();
  private readonly lines = new Map<string, readonly SnapshotLine[]>();
  private readonly summaries = new Map<string, readonly SnapshotSummary[]>();
  private readonly leases = new Map<string, Lease>();
  private readonly runs = new Map<string, PublishRun>();
  private pointer: CurrentPointer | null = null;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async acquireLease(leaseKey: string, holderId: string, ttlMs: number): Promise<LeaseResult> {
    const now = this.now().getTime();
    const existing = this.leases.get(leaseKey);
    if (existing && existing.expires_at > now && existing.holder_id !== holderId) {
      return { acquired: false, held_by: existing.holder_id };
    }
    this.leases.set(leaseKey, { holder_id: holderId, expires_at: now + ttlMs });
    return { acquired: true };
  }

  async releaseLease(leaseKey: string, holderId: string): Promise<void> {
    if (this.leases.get(leaseKey)?.holder_id === holderId) {
      this.leases.delete(leaseKey);
    }
  }

  async commitSnapshot(snapshot: Snapshot, lines: SnapshotLine[]): Promise<void> {
    if (this.snapshots.has(snapshot.snapshot_id)) {
      throw new SnapshotStoreError(
        `Snapshot ${snapshot.snapshot_id} already exists`,
        'DUPLICATE_SNAPSHOT',
      );
    }
    if (snapshot.status !== 'COMMITTING') {
      throw new SnapshotStoreError(
        `Snapshot ${snapshot.snapshot_id} must be COMMITTING to be committed, got ${snapshot.status}`,
        'INVALID_STATUS',
      );
    }

    // validate everything before touching the arena so a failure leaves nothing behind
    const keys = new Set<string>();
    for (const line of lines) {
      if (line.snapshot_id !== snapshot.snapshot_id) {
        throw new SnapshotStoreError(
          `Line (${line.scope_package_id}, ${line.floc_id}) belongs to snapshot ${line.snapshot_id}, not ${snapshot.snapshot_id}`,
          'FOREIGN_LINE',
        );
      }
      const key = lineKey(line.scope_package_id, line.floc_id);
      if (keys.has(key)) {
        throw new SnapshotStoreError(
          `Duplicate line (${line.scope_package_id}, ${line.floc_id}) in snapshot ${snapshot.snapshot_id}`,
          'DUPLICATE_LINE',
        );
      }
      keys.add(key);
    }

    const frozenLines = lines.map(freezeLine);
    Object.freeze(frozenLines);
    this.lines.set(snapshot.snapshot_id, frozenLines);
    this.snapshots.set(snapshot.snapshot_id, Object.freeze({ ...snapshot }));
  }

  async markFailed(snapshotId: string, message: string): Promise<void> {
    const snapshot = this.require(snapshotId);
    if (snapshot.status === 'PUBLISHED') {
      throw new SnapshotStoreError(`Snapshot ${snapshotId} is already published`, 'IMMUTABLE');
    }
    this.snapshots.set(
      snapshotId,
      Object.freeze({ ...snapshot, status: 'FAILED' as const, failure_message: message }),
    );
  }

  async writeSummaries(snapshotId: string, summaries: SnapshotSummary[]): Promise<void> {
    const snapshot = this.require(snapshotId);
    if (this.summaries.has(snapshotId)) {
      throw new SnapshotStoreError(
        `Summaries for snapshot ${snapshotId} are already written`,
        'IMMUTABLE',
      );
    }
    const frozen = summaries.map((summary) => Object.freeze({ ...summary }));
    Object.freeze(frozen);
    this.summaries.set(snapshotId, frozen);
    this.snapshots.set(snapshotId, Object.freeze({ ...snapshot, summary_status: 'COMPLETE' as const }));
  }

  async markSummaryPending(snapshotId: string): Promise<void> {
    const snapshot = this.require(snapshotId);
    this.snapshots.set(snapshotId, Object.freeze({ ...snapshot, summary_status: 'PENDING' as const }));
  }

  async publishSnapshot(snapshotId: string): Promise<PublishOutcome> {
    const snapshot = this.require(snapshotId);
    if (snapshot.status !== 'COMMITTING') {
      throw new SnapshotStoreError(
        `Snapshot ${snapshotId} cannot be published from status ${snapshot.status}`,
        'INVALID_STATUS',
      );
    }

    const now = this.now();
    const published: Snapshot = Object.freeze({ ...snapshot, status: 'PUBLISHED' as const, published_at: now });
    this.snapshots.set(snapshotId, published);

    const current = this.pointer;
    if (current && current.as_of_ts.getTime() > published.as_of_ts.getTime()) {
      return { snapshot: published, pointer: current, pointer_advanced: false };
    }

    this.pointer = Object.freeze({
      snapshot_id: snapshotId,
      version: (current?.version ?? 0) + 1,
      as_of_ts: published.as_of_ts,
      updated_at: now,
    });
    return { snapshot: published, pointer: this.pointer, pointer_advanced: true };
  }

  async getCurrentPointer(): Promise<CurrentPointer | null> {
    return this.pointer;
  }

  async getSnapshot(snapshotId: string): Promise<Snapshot | null> {
    return this.snapshots.get(snapshotId) ?? null;
  }

  async listSnapshots(): Promise<Snapshot[]> {
    // newest first; equal timestamps keep reverse insertion order
    return [...this.snapshots.values()]
      .reverse()
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime());
  }

  async getLines(snapshotId: string): Promise<SnapshotLine[]> {
    return [...(this.lines.get(snapshotId) ?? [])];
  }

  async getSummaries(snapshotId: string): Promise<SnapshotSummary[]> {
    return [...(this.summaries.get(snapshotId) ?? [])];
  }

  async recordRun(run: PublishRun): Promise<void> {
    this.runs.set(run.run_id, Object.freeze({ ...run, metrics: { ...run.metrics } }));
  }

  async listRuns(limit = 100): Promise<PublishRun[]> {
    return [...this.runs.values()]
      .reverse()
      .sort((a, b) => b.started_at.getTime() - a.started_at.getTime())
      .slice(0, limit);
  }

  async ping(): Promise<void> {}

  private require(snapshotId: string): Snapshot {
    const snapshot = this.snapshots.get(snapshotId);
    if (!snapshot) throw new EntityNotFoundError('snapshot', snapshotId);
    return snapshot;
  }
}
