export { SnapshotPublisher, DEFAULT_PUBLISHER_CONFIG } from './snapshot-publisher.js';
export {
  PublishCycle,
  SNAPSHOT_TRANSITIONS,
  assertTransition,
  canTransition,
  isTerminal,
} from './publish-state.js';
export { computeContentHash } from './content-hash.js';
export type {
  PublishRequest,
  PublishResult,
  PublishResultStatus,
  SnapshotPublisherDeps,
} from './types.js';
