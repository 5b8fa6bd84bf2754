// Shared
export { generateId } from './shared/types.js';
export {
  ValidationError,
  EntityNotFoundError,
  GrainViolationError,
  RuleVersionUnknownError,
  RuleVersionConflictError,
  ConcurrentPublishConflictError,
  PublishTimeoutError,
  InvalidStateTransitionError,
  SnapshotStoreError,
} from './shared/errors.js';
export type { GrainViolationKind } from './shared/errors.js';
export { createPool, runMigrations, withTransaction } from './shared/database.js';
export type { DatabaseConfig } from './shared/database.js';
export { loadConfig } from './shared/config.js';
export type { AppConfig, PublisherConfig } from './shared/config.js';
export { getLogger, setRootLogger, createLogger } from './shared/logger.js';
export type { Logger } from './shared/logger.js';
export { countIssuesByKind } from './shared/data-quality.js';
export type { DataQualityIssue, DataQualityIssueKind } from './shared/data-quality.js';
export { validateWithSchema } from './shared/schema-validator.js';

// Inputs
export {
  EVIDENCE_TYPES,
  lineKey,
  InMemoryEligibilitySource,
  PgEligibilitySource,
} from './inputs/index.js';
export type {
  AssignmentInterval,
  EligibilityInputs,
  EligibilitySource,
  EvidenceAggregate,
  EvidenceType,
  InMemorySourceData,
  InvoiceLineFact,
  InvoiceReversalFact,
  PackageLine,
  ScopePackage,
  ScopePackageStatus,
} from './inputs/index.js';

// Grain Resolver
export {
  resolveGrain,
  resolveAssignment,
  validateAssignmentIntervals,
} from './grain/index.js';
export type {
  AssignmentStatus,
  AssignmentTable,
  GrainResolution,
  ResolveGrainParams,
  SpineRow,
} from './grain/index.js';

// Evidence Reconciler
export { reconcileEvidence } from './evidence/index.js';
export type {
  EvidenceReconciliation,
  EvidenceRow,
  EvidenceStatus,
  EvidenceStatusByType,
} from './evidence/index.js';

// Billing Reconciler
export { reconcileBilling } from './billing/index.js';
export type { BillingReconciliation, BillingRow, BillingStatus } from './billing/index.js';

// Rules Engine
export {
  evaluateRuleVersion,
  buildFacts,
  evaluateCondition,
  RuleVersionRegistry,
  createDefaultRegistry,
  loadRuleVersionFile,
  loadRuleVersionsFromDirectory,
  registerRuleVersionsFromDirectory,
  ELIGIBILITY_RULES_V1,
} from './rules-engine/index.js';
export type {
  Condition,
  ConditionOperator,
  EligibilityDecision,
  EligibilityFacts,
  EligibilityRule,
  EvaluationTrace,
  FactField,
  FactValue,
  RuleVersion,
} from './rules-engine/index.js';

// Snapshot Store
export {
  InMemorySnapshotStore,
  PgSnapshotStore,
} from './snapshot-store/index.js';
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
} from './snapshot-store/index.js';

// Summary Aggregator
export { summarize, summarizeDraft } from './summary/index.js';

// Snapshot Publisher
export {
  SnapshotPublisher,
  DEFAULT_PUBLISHER_CONFIG,
  PublishCycle,
  canTransition,
  computeContentHash,
} from './publisher/index.js';
export type {
  PublishRequest,
  PublishResult,
  PublishResultStatus,
  SnapshotPublisherDeps,
} from './publisher/index.js';

// Observability
export { getTracer, startSpan, endSpan, SpanStatusCode } from './observability/index.js';
