export { EVIDENCE_TYPES, lineKey } from './types.js';
export type {
  AssignmentInterval,
  EligibilityInputs,
  EligibilitySource,
  EvidenceAggregate,
  EvidenceType,
  InvoiceLineFact,
  InvoiceReversalFact,
  PackageLine,
  ScopePackage,
  ScopePackageStatus,
} from './types.js';
export { InMemoryEligibilitySource } from './in-memory-source.js';
export type { InMemorySourceData } from './in-memory-source.js';
export { PgEligibilitySource } from './pg-source.js';
