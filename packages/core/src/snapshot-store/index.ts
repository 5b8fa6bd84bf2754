export { InMemorySnapshotStore } from './in-memory-snapshot-store.js';
export {
  PgSnapshotStore,
  rowToSnapshot,
  rowToSnapshotLine,
  rowToPointer,
  rowToPublishRun,
} from './pg-snapshot-store.js';
export { QUERIES as SNAPSHOT_STORE_QUERIES, POINTER_NAME } from './snapshot-store.queries.js';
export type {
  CurrentPointer,
  DraftLine,
  DraftSummary,
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
