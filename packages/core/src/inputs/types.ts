export type ScopePackageStatus = 'ACTIVE' | 'CLOSED' | 'CANCELLED';

export interface ScopePackage {
  scope_package_id: string;
  vendor: string;
  status: ScopePackageStatus;
  /** Upload version whose lines make up the package today. */
  upload_version: number;
}

export interface PackageLine {
  scope_package_id: string;
  floc_id: string;
  upload_version: number;
}

/** Half-open `[effective_start_ts, effective_end_ts)`; a null end is the open, current interval. */
export interface AssignmentInterval {
  floc_id: string;
  scope_package_id: string;
  effective_start_ts: Date;
  effective_end_ts: Date | null;
}

export const EVIDENCE_TYPES = ['survey', 'images', 'deliveries'] as const;

export type EvidenceType = (typeof EVIDENCE_TYPES)[number];

export interface EvidenceAggregate {
  scope_package_id: string;
  floc_id: string;
  evidence_type: EvidenceType;
  received_flg: boolean;
  evidence_ts: Date;
  count: number;
}

export interface InvoiceLineFact {
  invoice_id: string;
  scope_package_id: string;
  floc_id: string;
  invoiced_ts: Date;
  paid_ts: Date | null;
}

/** Explicit cancellation of one invoice line; the only way an invoiced line stops counting. */
export interface InvoiceReversalFact {
  invoice_id: string;
  scope_package_id: string;
  floc_id: string;
  reversed_ts: Date;
  reason: string;
}

export interface EligibilityInputs {
  packages: ScopePackage[];
  lines: PackageLine[];
  intervals: AssignmentInterval[];
  evidence: Record<EvidenceType, EvidenceAggregate[]>;
  invoices: InvoiceLineFact[];
  reversals: InvoiceReversalFact[];
}

/**
 * Boundary to the ingestion side. Implementations hand over read-only,
 * grain-conformed relations as they stood at `asOf`.
 */
export interface EligibilitySource {
  load(asOf: Date): Promise<EligibilityInputs>;
}

export function lineKey(scopePackageId: string, flocId: string): string {
  return `${scopePackageId}|${flocId}`;
}
