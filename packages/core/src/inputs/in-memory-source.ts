import type {
  AssignmentInterval,
  EligibilityInputs,
  EligibilitySource,
  EvidenceAggregate,
  EvidenceType,
  InvoiceLineFact,
  InvoiceReversalFact,
  PackageLine,
  ScopePackage,
} from './types.js';

export interface InMemorySourceData {
  packages?: ScopePackage[];
  lines?: PackageLine[];
  intervals?: AssignmentInterval[];
  evidence?: Partial<Record<EvidenceType, EvidenceAggregate[]>>;
  invoices?: InvoiceLineFact[];
  reversals?: InvoiceReversalFact[];
}

/**
 * Holds conformed relations in memory. `load` hands out copies, so later changes
 * made through `update` never reach an already running cycle.
 */
export class InMemoryEligibilitySource implements EligibilitySource {
  private data: EligibilityInputs;

  constructor(data: InMemorySourceData = {}) {
    this.data = InMemoryEligibilitySource.normalize(data);
  }

  update(change: (current: EligibilityInputs) => InMemorySourceData): void {
    this.data = InMemoryEligibilitySource.normalize(change(this.snapshot()));
  }

  async load(_asOf: Date): Promise<EligibilityInputs> {
    return this.snapshot();
  }

  private snapshot(): EligibilityInputs {
    return InMemoryEligibilitySource.normalize(this.data);
  }

  private static normalize(data: InMemorySourceData): EligibilityInputs {
    return {
      packages: (data.packages ?? []).map((pkg) => ({ ...pkg })),
      lines: (data.lines ?? []).map((line) => ({ ...line })),
      intervals: (data.intervals ?? []).map((interval) => ({ ...interval })),
      evidence: {
        survey: (data.evidence?.survey ?? []).map((row) => ({ ...row })),
        images: (data.evidence?.images ?? []).map((row) => ({ ...row })),
        deliveries: (data.evidence?.deliveries ?? []).map((row) => ({ ...row })),
      },
      invoices: (data.invoices ?? []).map((invoice) => ({ ...invoice })),
      reversals: (data.reversals ?? []).map((reversal) => ({ ...reversal })),
    };
  }
}
