import { GrainViolationError, ValidationError } from '../shared/errors.js';
import { getLogger } from '../shared/logger.js';
import type { DataQualityIssue } from '../shared/data-quality.js';
import { EVIDENCE_TYPES, lineKey } from '../inputs/types.js';
import type { EvidenceAggregate, EvidenceType } from '../inputs/types.js';
import type { SpineRow } from '../grain/types.js';

export interface EvidenceStatus {
  received_flg: boolean;
  count: number;
  evidence_ts: Date | null;
}

export type EvidenceStatusByType = Record<EvidenceType, EvidenceStatus>;

export interface EvidenceRow extends SpineRow {
  evidence: EvidenceStatusByType;
}

export interface EvidenceReconciliation {
  rows: EvidenceRow[];
  issues: DataQualityIssue[];
}

const NOT_RECEIVED: EvidenceStatus = Object.freeze({
  received_flg: false,
  count: 0,
  evidence_ts: null,
});

function indexSource(
  evidenceType: EvidenceType,
  aggregates: EvidenceAggregate[],
): Map<string, EvidenceAggregate> {
  const index = new Map<string, EvidenceAggregate>();
  for (const aggregate of aggregates) {
    if (aggregate.evidence_type !== evidenceType) {
      throw new ValidationError(
        `Evidence row of type "${aggregate.evidence_type}" delivered on the ${evidenceType} stream`,
        'evidence_type',
        { scope_package_id: aggregate.scope_package_id, floc_id: aggregate.floc_id },
      );
    }
    const key = lineKey(aggregate.scope_package_id, aggregate.floc_id);
    if (index.has(key)) {
      throw new GrainViolationError(
        'duplicate_evidence',
        `More than one ${evidenceType} evidence row for (${aggregate.scope_package_id}, ${aggregate.floc_id})`,
        {
          scope_package_id: aggregate.scope_package_id,
          floc_id: aggregate.floc_id,
          evidence_type: evidenceType,
        },
      );
    }
    index.set(key, aggregate);
  }
  return index;
}

function toStatus(aggregate: EvidenceAggregate | undefined, asOf: Date): EvidenceStatus {
  // evidence that lands after as_of has not been received yet for this cycle
  if (!aggregate || aggregate.evidence_ts.getTime() > asOf.getTime()) return NOT_RECEIVED;
  return {
    received_flg: aggregate.received_flg,
    count: aggregate.count,
    evidence_ts: aggregate.evidence_ts,
  };
}

/**
 * Left-join every evidence stream onto the spine. Each row gets a status for every
 * known evidence type; absence is recorded as not received.
 */
export function reconcileEvidence(
  spine: SpineRow[],
  evidenceByType: Partial<Record<EvidenceType, EvidenceAggregate[]>>,
  asOf: Date,
): EvidenceReconciliation {
  const logger = getLogger('evidence-reconciler');
  const issues: DataQualityIssue[] = [];
  const spineKeys = new Set(spine.map((row) => lineKey(row.scope_package_id, row.floc_id)));
  const indexes = new Map<EvidenceType, Map<string, EvidenceAggregate>>();

  for (const evidenceType of EVIDENCE_TYPES) {
    const aggregates = evidenceByType[evidenceType] ?? [];
    if (aggregates.length === 0) {
      issues.push({
        kind: 'INGESTION_INCOMPLETE',
        message: `No ${evidenceType} evidence delivered for this cycle`,
        source: evidenceType,
      });
    }

    const index = indexSource(evidenceType, aggregates);
    indexes.set(evidenceType, index);

    for (const [key, aggregate] of index) {
      if (spineKeys.has(key)) continue;
      issues.push({
        kind: 'UNMATCHED_EVIDENCE',
        message: `${evidenceType} evidence for (${aggregate.scope_package_id}, ${aggregate.floc_id}) has no matching package line`,
        source: evidenceType,
        scope_package_id: aggregate.scope_package_id,
        floc_id: aggregate.floc_id,
      });
    }
  }

  const rows = spine.map((row): EvidenceRow => {
    const key = lineKey(row.scope_package_id, row.floc_id);
    const statusOf = (evidenceType: EvidenceType) =>
      toStatus(indexes.get(evidenceType)?.get(key), asOf);
    return {
      ...row,
      evidence: {
        survey: statusOf('survey'),
        images: statusOf('images'),
        deliveries: statusOf('deliveries'),
      },
    };
  });

  logger.debug(
    { spine_rows: spine.length, issues: issues.length },
    'evidence reconciled',
  );

  return { rows, issues };
}
