import type { AssignmentStatus } from '../grain/types.js';

export type ConditionOperator =
  | 'eq'
  | 'neq'
  | 'not_empty'
  | 'in'
  | 'not_in'
  | 'exists'
  | 'gt'
  | 'lt'
  | 'gte'
  | 'lte'
  | 'matches';

/** Flattened reconciled facts a rule can test. */
export interface EligibilityFacts {
  assignment_is_current: boolean;
  assignment_status: AssignmentStatus;
  survey_received: boolean;
  images_received: boolean;
  images_count: number;
  deliveries_received: boolean;
  deliveries_count: number;
  invoiced: boolean;
  paid: boolean;
}

export type FactField = keyof EligibilityFacts;

export type FactValue = string | number | boolean | null;

export interface Condition {
  field: FactField;
  operator: ConditionOperator;
  value?: FactValue | FactValue[];
}

/**
 * A rule contributes `blocker_code` when all of its conditions hold.
 */
export interface EligibilityRule {
  id: string;
  name: string;
  description: string;
  priority: number;
  conditions: Condition[];
  blocker_code: string;
}

export interface RuleVersion {
  version: string;
  description: string;
  rules: EligibilityRule[];
}

export interface EvaluationTrace {
  rule_id: string;
  rule_name: string;
  result: 'fired' | 'condition_false';
  blocker_code?: string;
}

export interface EligibilityDecision {
  rule_version: string;
  ready_to_invoice_flg: boolean;
  blocker_codes: string[];
  traces: EvaluationTrace[];
}
