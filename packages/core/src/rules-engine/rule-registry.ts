import { RuleVersionConflictError, RuleVersionUnknownError, ValidationError } from '../shared/errors.js';
import { buildFacts, evaluateRuleVersion } from './rules-engine.js';
import { ELIGIBILITY_RULES_V1 } from './eligibility-rules.js';
import type { AssignmentStatus } from '../grain/types.js';
import type { EvidenceStatusByType } from '../evidence/evidence-reconciler.js';
import type { BillingStatus } from '../billing/billing-reconciler.js';
import type { Condition, EligibilityDecision, RuleVersion } from './types.js';

function freezeRuleVersion(ruleVersion: RuleVersion): RuleVersion {
  const rules = ruleVersion.rules.map((rule) => {
    const conditions = rule.conditions.map((condition) => {
      const copy: Condition = Array.isArray(condition.value)
        ? { ...condition, value: [...condition.value] }
        : { ...condition };
      if (Array.isArray(copy.value)) Object.freeze(copy.value);
      return Object.freeze(copy);
    });
    Object.freeze(conditions);
    return Object.freeze({ ...rule, conditions });
  });
  Object.freeze(rules);
  return Object.freeze({ ...ruleVersion, rules });
}

/**
 * Append-only mapping from rule version id to its rule set. A version is written
 * once and frozen; changed logic ships under a new id.
 */
export class RuleVersionRegistry {
  private readonly versions = new Map<string, RuleVersion>();

  register(ruleVersion: RuleVersion): RuleVersion {
    if (ruleVersion.version.trim() === '') {
      throw new ValidationError('Rule version id must not be empty', 'version');
    }
    if (this.versions.has(ruleVersion.version)) {
      throw new RuleVersionConflictError(ruleVersion.version);
    }

    const ids = new Set<string>();
    for (const rule of ruleVersion.rules) {
      if (ids.has(rule.id)) {
        throw new ValidationError(
          `Rule id "${rule.id}" appears twice in rule version ${ruleVersion.version}`,
          'rules',
        );
      }
      ids.add(rule.id);
    }

    const frozen = freezeRuleVersion(ruleVersion);
    this.versions.set(frozen.version, frozen);
    return frozen;
  }

  has(version: string): boolean {
    return this.versions.has(version);
  }

  get(version: string): RuleVersion {
    const ruleVersion = this.versions.get(version);
    if (!ruleVersion) throw new RuleVersionUnknownError(version);
    return ruleVersion;
  }

  list(): RuleVersion[] {
    return [...this.versions.values()].sort((a, b) => (a.version < b.version ? -1 : 1));
  }

  evaluate(
    version: string,
    evidence: EvidenceStatusByType,
    assignment: AssignmentStatus,
    billing: BillingStatus,
  ): EligibilityDecision {
    return evaluateRuleVersion(this.get(version), buildFacts(evidence, assignment, billing));
  }
}

export function createDefaultRegistry(): RuleVersionRegistry {
  const registry = new RuleVersionRegistry();
  registry.register(ELIGIBILITY_RULES_V1);
  return registry;
}
