import { evaluateCondition } from './condition-evaluator.js';
import type { AssignmentStatus } from '../grain/types.js';
import type { EvidenceStatusByType } from '../evidence/evidence-reconciler.js';
import type { BillingStatus } from '../billing/billing-reconciler.js';
import type {
  EligibilityDecision,
  EligibilityFacts,
  EligibilityRule,
  EvaluationTrace,
  RuleVersion,
} from './types.js';

export function buildFacts(
  evidence: EvidenceStatusByType,
  assignment: AssignmentStatus,
  billing: BillingStatus,
): EligibilityFacts {
  return {
    assignment_is_current: assignment === 'CURRENT',
    assignment_status: assignment,
    survey_received: evidence.survey.received_flg,
    images_received: evidence.images.received_flg,
    images_count: evidence.images.count,
    deliveries_received: evidence.deliveries.received_flg,
    deliveries_count: evidence.deliveries.count,
    invoiced: billing.invoiced_flg,
    paid: billing.paid_flg,
  };
}

function compareRules(a: EligibilityRule, b: EligibilityRule): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.blocker_code !== b.blocker_code) return a.blocker_code < b.blocker_code ? -1 : 1;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  return 0;
}

/**
 * Evaluate one rule version against one line's facts. Pure: no clock, no I/O, so the
 * same facts under the same version always produce the same decision.
 */
export function evaluateRuleVersion(
  ruleVersion: RuleVersion,
  facts: EligibilityFacts,
): EligibilityDecision {
  const ordered = [...ruleVersion.rules].sort(compareRules);
  const traces: EvaluationTrace[] = [];
  const blockerCodes: string[] = [];

  for (const rule of ordered) {
    const allConditionsMet = rule.conditions.every((condition) =>
      evaluateCondition(condition, facts),
    );

    if (allConditionsMet) {
      traces.push({
        rule_id: rule.id,
        rule_name: rule.name,
        result: 'fired',
        blocker_code: rule.blocker_code,
      });
      if (!blockerCodes.includes(rule.blocker_code)) blockerCodes.push(rule.blocker_code);
    } else {
      traces.push({ rule_id: rule.id, rule_name: rule.name, result: 'condition_false' });
    }
  }

  return {
    rule_version: ruleVersion.version,
    ready_to_invoice_flg: blockerCodes.length === 0,
    blocker_codes: blockerCodes,
    traces,
  };
}
