import { describe, it, expect } from 'vitest';
import { PublishCycle, canTransition, isTerminal } from './publish-state.js';
import { InvalidStateTransitionError } from '../shared/errors.js';

describe('publish state machine', () => {
  it('should allow the happy path', () => {
    const cycle = new PublishCycle();
    cycle.transition('COMMITTING');
    cycle.transition('PUBLISHED');

    expect(cycle.status).toBe('PUBLISHED');
    expect(isTerminal(cycle.status)).toBe(true);
  });

  it('should allow failing from DRAFT and COMMITTING', () => {
    expect(canTransition('DRAFT', 'FAILED')).toBe(true);
    expect(canTransition('COMMITTING', 'FAILED')).toBe(true);
  });

  it('should not skip COMMITTING', () => {
    expect(canTransition('DRAFT', 'PUBLISHED')).toBe(false);
    expect(() => new PublishCycle().transition('PUBLISHED')).toThrow(InvalidStateTransitionError);
  });

  it('should not leave a terminal status', () => {
    const cycle = new PublishCycle();
    cycle.transition('FAILED');

    expect(() => cycle.transition('COMMITTING')).toThrow('Invalid snapshot state transition: FAILED -> COMMITTING');
    expect(canTransition('PUBLISHED', 'FAILED')).toBe(false);
  });
});
