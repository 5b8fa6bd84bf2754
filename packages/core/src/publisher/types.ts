import type { DataQualityIssue } from '../shared/data-quality.js';
import type { PublisherConfig } from '../shared/config.js';
import type { Logger } from '../shared/logger.js';
import type { EligibilitySource } from '../inputs/types.js';
import type { RuleVersionRegistry } from '../rules-engine/rule-registry.js';
import type {
  DraftLine,
  DraftSummary,
  SnapshotStore,
  SummaryStatus,
} from '../snapshot-store/types.js';

export interface PublishRequest {
  asOf: Date;
  ruleVersion: string;
  dryRun?: boolean;
  /** Restrict the cycle to these packages. */
  scopePackageIds?: string[];
  /** Reuse the current snapshot when as_of, rule version and content all match. */
  skipIfUnchanged?: boolean;
}

/**
 * PUBLISHED: a new snapshot was committed and published.
 * DRY_RUN: everything was computed and validated, nothing was written.
 * UNCHANGED: short-circuited onto the current snapshot.
 */
export type PublishResultStatus = 'PUBLISHED' | 'DRY_RUN' | 'UNCHANGED';

export interface PublishResult {
  run_id: string;
  snapshot_id: string | null;
  status: PublishResultStatus;
  as_of_ts: Date;
  rule_version: string;
  content_hash: string;
  line_count: number;
  lines: DraftLine[];
  summaries: DraftSummary[];
  issues: DataQualityIssue[];
  short_circuited: boolean;
  pointer_advanced: boolean;
  summary_status: SummaryStatus | null;
}

export interface SnapshotPublisherDeps {
  source: EligibilitySource;
  store: SnapshotStore;
  registry: RuleVersionRegistry;
  config?: Partial<PublisherConfig>;
  logger?: Logger;
  now?: () => Date;
}
