import type { Condition, EligibilityFacts } from './types.js';

export function evaluateCondition(condition: Condition, facts: EligibilityFacts): boolean {
  const value: unknown = facts[condition.field];
  const expected = condition.value;

  switch (condition.operator) {
    case 'eq':
      return value === expected;

    case 'neq':
      return value !== expected;

    case 'not_empty':
      return value !== null && value !== undefined && value !== '';

    case 'in':
      return Array.isArray(expected) && expected.some((candidate) => candidate === value);

    case 'not_in':
      return Array.isArray(expected) && !expected.some((candidate) => candidate === value);

    case 'exists':
      return value !== undefined;

    case 'gt':
      return typeof value === 'number' && typeof expected === 'number' && value > expected;

    case 'lt':
      return typeof value === 'number' && typeof expected === 'number' && value < expected;

    case 'gte':
      return typeof value === 'number' && typeof expected === 'number' && value >= expected;

    case 'lte':
      return typeof value === 'number' && typeof expected === 'number' && value <= expected;

    case 'matches':
      if (typeof value !== 'string' || typeof expected !== 'string') return false;
      try {
        return new RegExp(expected).test(value);
      } catch {
        return false;
      }

    default:
      return false;
  }
}
