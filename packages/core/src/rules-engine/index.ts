export { evaluateRuleVersion, buildFacts } from './rules-engine.js';
export { evaluateCondition } from './condition-evaluator.js';
export { RuleVersionRegistry, createDefaultRegistry } from './rule-registry.js';
export {
  loadRuleVersionFile,
  loadRuleVersionsFromDirectory,
  registerRuleVersionsFromDirectory,
} from './rule-loader.js';
export { RULE_VERSION_SCHEMA } from './rule-version.schema.js';
export { ELIGIBILITY_RULES_V1 } from './eligibility-rules.js';
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
} from './types.js';
