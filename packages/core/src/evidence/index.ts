export { reconcileEvidence } from './evidence-reconciler.js';
export type {
  EvidenceReconciliation,
  EvidenceRow,
  EvidenceStatus,
  EvidenceStatusByType,
} from './evidence-reconciler.js';
