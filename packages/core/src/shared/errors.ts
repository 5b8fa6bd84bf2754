export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class EntityNotFoundError extends Error {
  constructor(
    public readonly entityType: string,
    public readonly entityId: string,
  ) {
    super(`Entity not found: ${entityType}/${entityId}`);
    this.name = 'EntityNotFoundError';
  }
}

export type GrainViolationKind =
  | 'duplicate_package'
  | 'duplicate_package_line'
  | 'overlapping_assignment'
  | 'invalid_assignment_interval'
  | 'duplicate_evidence';

/**
 * Upstream data broke a grain contract. Always fatal: the publish cycle aborts
 * before anything is written.
 */
export class GrainViolationError extends Error {
  constructor(
    public readonly kind: GrainViolationKind,
    message: string,
    public readonly key: Record<string, string>,
  ) {
    super(message);
    this.name = 'GrainViolationError';
  }
}

export class RuleVersionUnknownError extends Error {
  constructor(public readonly ruleVersion: string) {
    super(`Rule version "${ruleVersion}" is not registered`);
    this.name = 'RuleVersionUnknownError';
  }
}

export class RuleVersionConflictError extends Error {
  constructor(public readonly ruleVersion: string) {
    super(`Rule version "${ruleVersion}" is already registered and cannot be changed`);
    this.name = 'RuleVersionConflictError';
  }
}

export class ConcurrentPublishConflictError extends Error {
  constructor(
    public readonly leaseKey: string,
    public readonly heldBy?: string,
  ) {
    super(
      heldBy
        ? `Publish already in flight for ${leaseKey} (held by run ${heldBy})`
        : `Publish already in flight for ${leaseKey}`,
    );
    this.name = 'ConcurrentPublishConflictError';
  }
}

export class PublishTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Publish draft stage exceeded ${timeoutMs}ms; aborted before any write`);
    this.name = 'PublishTimeoutError';
  }
}

export class InvalidStateTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Invalid snapshot state transition: ${from} -> ${to}`);
    this.name = 'InvalidStateTransitionError';
  }
}

export class SnapshotStoreError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'SnapshotStoreError';
  }
}
