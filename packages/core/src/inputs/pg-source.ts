import type pg from 'pg';
import { withTransaction } from '../shared/database.js';
import { getLogger } from '../shared/logger.js';
import { QUERIES } from './eligibility-source.queries.js';
import { EVIDENCE_TYPES } from './types.js';
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

/**
 * Reads the conformed input tables inside one repeatable-read transaction. Rows
 * dated after as_of are returned too, so the grain checks and the orphan and
 * ingestion signals see the same relations as the in-memory source.
 */
export class PgEligibilitySource implements EligibilitySource {
  private readonly logger = getLogger('pg-source');

  constructor(private readonly pool: pg.Pool) {}

  async load(asOf: Date): Promise<EligibilityInputs> {
    return withTransaction(this.pool, async (client) => {
      await client.query(QUERIES.READ_ONLY_SNAPSHOT);

      const packages = await client.query<ScopePackage>(QUERIES.LIST_PACKAGES);
      const lines = await client.query<PackageLine>(QUERIES.LIST_LINES);
      const intervals = await client.query<AssignmentInterval>(QUERIES.LIST_INTERVALS);

      const evidence: Record<EvidenceType, EvidenceAggregate[]> = {
        survey: [],
        images: [],
        deliveries: [],
      };
      for (const evidenceType of EVIDENCE_TYPES) {
        const { rows } = await client.query<EvidenceAggregate>(QUERIES.LIST_EVIDENCE, [evidenceType]);
        evidence[evidenceType] = rows;
      }

      const invoices = await client.query<InvoiceLineFact>(QUERIES.LIST_INVOICES);
      const reversals = await client.query<InvoiceReversalFact>(QUERIES.LIST_REVERSALS);

      this.logger.debug(
        {
          as_of_ts: asOf.toISOString(),
          packages: packages.rowCount,
          lines: lines.rowCount,
          invoices: invoices.rowCount,
        },
        'inputs loaded',
      );

      return {
        packages: packages.rows,
        lines: lines.rows,
        intervals: intervals.rows,
        evidence,
        invoices: invoices.rows,
        reversals: reversals.rows,
      };
    });
  }
}
