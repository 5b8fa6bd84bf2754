import { InvalidStateTransitionError } from '../shared/errors.js';
import type { SnapshotStatus } from '../snapshot-store/types.js';

export const SNAPSHOT_TRANSITIONS: Readonly<Record<SnapshotStatus, readonly SnapshotStatus[]>> = {
  DRAFT: ['COMMITTING', 'FAILED'],
  COMMITTING: ['PUBLISHED', 'FAILED'],
  PUBLISHED: [],
  FAILED: [],
};

export function canTransition(from: SnapshotStatus, to: SnapshotStatus): boolean {
  return SNAPSHOT_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: SnapshotStatus, to: SnapshotStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidStateTransitionError(from, to);
  }
}

export function isTerminal(status: SnapshotStatus): boolean {
  return SNAPSHOT_TRANSITIONS[status].length === 0;
}

/** Status of one publish cycle; every move goes through the transition table. */
export class PublishCycle {
  private current: SnapshotStatus = 'DRAFT';

  get status(): SnapshotStatus {
    return this.current;
  }

  transition(to: SnapshotStatus): void {
    assertTransition(this.current, to);
    this.current = to;
  }
}
