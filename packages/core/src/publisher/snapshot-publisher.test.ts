import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import { pino } from 'pino';
import { SnapshotPublisher } from './snapshot-publisher.js';
import { InMemorySnapshotStore } from '../snapshot-store/in-memory-snapshot-store.js';
import { InMemoryEligibilitySource } from '../inputs/in-memory-source.js';
import type { InMemorySourceData } from '../inputs/in-memory-source.js';
import type { EligibilityInputs, EligibilitySource } from '../inputs/types.js';
import { createDefaultRegistry } from '../rules-engine/rule-registry.js';
import { setRootLogger } from '../shared/logger.js';
import {
  ConcurrentPublishConflictError,
  GrainViolationError,
  PublishTimeoutError,
  RuleVersionUnknownError,
  ValidationError,
} from '../shared/errors.js';
import type { DraftLine, PublishRun, SnapshotSummary } from '../snapshot-store/types.js';

const JAN = new Date('2026-01-01T00:00:00Z');
const FEB = new Date('2026-02-01T00:00:00Z');
const AS_OF = new Date('2026-03-01T00:00:00Z');
const LATER = new Date('2026-03-15T00:00:00Z');

const silent = pino({ level: 'silent' });

function baseData(): InMemorySourceData {
  return {
    packages: [
      { scope_package_id: 'P1', vendor: 'Acme Field Services', status: 'ACTIVE', upload_version: 1 },
    ],
    lines: [
      { scope_package_id: 'P1', floc_id: 'F1', upload_version: 1 },
      { scope_package_id: 'P1', floc_id: 'F2', upload_version: 1 },
    ],
    intervals: [
      { floc_id: 'F1', scope_package_id: 'P1', effective_start_ts: JAN, effective_end_ts: null },
      { floc_id: 'F2', scope_package_id: 'P1', effective_start_ts: JAN, effective_end_ts: null },
    ],
    evidence: {
      survey: [
        { scope_package_id: 'P1', floc_id: 'F1', evidence_type: 'survey', received_flg: true, evidence_ts: FEB, count: 1 },
        { scope_package_id: 'P1', floc_id: 'F2', evidence_type: 'survey', received_flg: true, evidence_ts: FEB, count: 1 },
      ],
      images: [
        { scope_package_id: 'P1', floc_id: 'F1', evidence_type: 'images', received_flg: true, evidence_ts: FEB, count: 10 },
      ],
    },
  };
}

function invoiceOnF1(source: InMemoryEligibilitySource): void {
  source.update((current) => ({
    ...current,
    invoices: [
      {
        invoice_id: 'INV-1',
        scope_package_id: 'P1',
        floc_id: 'F1',
        invoiced_ts: new Date('2026-03-10T00:00:00Z'),
        paid_ts: null,
      },
    ],
  }));
}

function decisions(lines: DraftLine[]) {
  return lines.map((line) => ({
    scope_package_id: line.scope_package_id,
    floc_id: line.floc_id,
    ready_to_invoice_flg: line.ready_to_invoice_flg,
    blocker_codes: line.blocker_codes,
  }));
}

/** Source whose load blocks until released. */
class GatedSource implements EligibilitySource {
  started: Promise<void>;
  private markStarted: () => void = () => {};
  private releaseLoad: () => void = () => {};

  constructor(private readonly inner: EligibilitySource) {
    this.started = new Promise((resolve) => {
      this.markStarted = resolve;
    });
  }

  release(): void {
    this.releaseLoad();
  }

  async load(asOf: Date): Promise<EligibilityInputs> {
    const gate = new Promise<void>((resolve) => {
      this.releaseLoad = resolve;
    });
    this.markStarted();
    await gate;
    return this.inner.load(asOf);
  }
}

class FlakyRunLogStore extends InMemorySnapshotStore {
  async recordRun(run: PublishRun): Promise<void> {
    if (run.status === 'SUCCEEDED') throw new Error('run log down');
    return super.recordRun(run);
  }
}

class FlakySummaryStore extends InMemorySnapshotStore {
  failSummaries = true;

  async writeSummaries(snapshotId: string, summaries: SnapshotSummary[]): Promise<void> {
    if (this.failSummaries) throw new Error('summary table unavailable');
    return super.writeSummaries(snapshotId, summaries);
  }
}

describe('SnapshotPublisher', () => {
  let source: InMemoryEligibilitySource;
  let store: InMemorySnapshotStore;
  let publisher: SnapshotPublisher;

  beforeAll(() => {
    setRootLogger(silent);
  });

  beforeEach(() => {
    source = new InMemoryEligibilitySource(baseData());
    store = new InMemorySnapshotStore();
    publisher = new SnapshotPublisher({
      source,
      store,
      registry: createDefaultRegistry(),
      logger: silent,
    });
  });

  describe('publish', () => {
    it('should mark F1 ready and block F2 on missing images', async () => {
      const result = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });

      expect(result.status).toBe('PUBLISHED');
      expect(decisions(result.lines)).toEqual([
        { scope_package_id: 'P1', floc_id: 'F1', ready_to_invoice_flg: true, blocker_codes: [] },
        { scope_package_id: 'P1', floc_id: 'F2', ready_to_invoice_flg: false, blocker_codes: ['MISSING_IMAGES'] },
      ]);
    });

    it('should persist lines and summaries and advance the pointer', async () => {
      const result = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });
      const snapshotId = result.snapshot_id ?? '';

      expect(result.pointer_advanced).toBe(true);
      expect(result.summary_status).toBe('COMPLETE');
      expect(await store.getCurrentPointer()).toMatchObject({ snapshot_id: snapshotId, version: 1 });

      const snapshot = await publisher.getSnapshot(snapshotId);
      expect(snapshot.status).toBe('PUBLISHED');
      expect(snapshot.line_count).toBe(2);
      expect(snapshot.content_hash).toBe(result.content_hash);

      const lines = await publisher.getLines(snapshotId);
      expect(lines.every((line) => line.snapshot_id === snapshotId)).toBe(true);
      expect(lines.every((line) => line.rule_version === 'v1')).toBe(true);
      expect(lines.every((line) => line.as_of_ts.getTime() === AS_OF.getTime())).toBe(true);

      expect(await publisher.getSummaries(snapshotId)).toEqual([
        {
          snapshot_id: snapshotId,
          scope_package_id: 'P1',
          vendor: 'Acme Field Services',
          line_count: 2,
          ready_count: 1,
          blocked_count: 1,
          invoiced_count: 0,
          paid_count: 0,
          as_of_ts: AS_OF,
          rule_version: 'v1',
        },
      ]);
    });

    it('should report missing deliveries and invoices as incomplete ingestion', async () => {
      const result = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });

      expect(
        result.issues.filter((issue) => issue.kind === 'INGESTION_INCOMPLETE').map((issue) => issue.source),
      ).toEqual(['deliveries', 'invoices']);
    });

    it('should block an invoiced line in the next snapshot', async () => {
      await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });
      invoiceOnF1(source);

      const result = await publisher.publish({ asOf: LATER, ruleVersion: 'v1' });
      const f1 = result.lines.find((line) => line.floc_id === 'F1');

      expect(f1).toMatchObject({
        invoiced_flg: true,
        ready_to_invoice_flg: false,
        blocker_codes: ['ALREADY_INVOICED'],
        invoice_ids: ['INV-1'],
      });
    });

    it('should follow a FLOC reassigned between packages', async () => {
      const switchover = new Date('2026-03-05T00:00:00Z');
      source.update((current) => ({
        ...current,
        packages: [
          ...current.packages,
          { scope_package_id: 'P2', vendor: 'Borealis Utilities', status: 'ACTIVE', upload_version: 1 },
        ],
        lines: [
          ...current.lines,
          { scope_package_id: 'P1', floc_id: 'F3', upload_version: 1 },
          { scope_package_id: 'P2', floc_id: 'F3', upload_version: 1 },
        ],
        intervals: [
          ...current.intervals,
          { floc_id: 'F3', scope_package_id: 'P1', effective_start_ts: JAN, effective_end_ts: switchover },
          { floc_id: 'F3', scope_package_id: 'P2', effective_start_ts: switchover, effective_end_ts: null },
        ],
      }));

      const before = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });
      const after = await publisher.publish({ asOf: LATER, ruleVersion: 'v1' });

      const currentOwner = (lines: DraftLine[]) =>
        lines.find((line) => line.floc_id === 'F3' && line.assignment_status === 'CURRENT')
          ?.scope_package_id;
      expect(currentOwner(before.lines)).toBe('P1');
      expect(currentOwner(after.lines)).toBe('P2');

      const staleP1 = after.lines.find((line) => line.scope_package_id === 'P1' && line.floc_id === 'F3');
      expect(staleP1?.blocker_codes).toContain('ASSIGNMENT_STALE');
    });

    it('should produce identical decisions for unchanged inputs', async () => {
      const first = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });
      const second = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });

      expect(second.snapshot_id).not.toBe(first.snapshot_id);
      expect(second.content_hash).toBe(first.content_hash);
      expect(decisions(second.lines)).toEqual(decisions(first.lines));
      expect((await store.getCurrentPointer())?.version).toBe(2);
    });

    it('should reuse the current snapshot when asked to skip unchanged content', async () => {
      const first = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });
      const second = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1', skipIfUnchanged: true });

      expect(second.status).toBe('UNCHANGED');
      expect(second.short_circuited).toBe(true);
      expect(second.snapshot_id).toBe(first.snapshot_id);
      expect(await publisher.listSnapshots()).toHaveLength(1);
    });

    it('should publish anyway when content changed under skipIfUnchanged', async () => {
      await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });
      invoiceOnF1(source);
      source.update((current) => ({
        ...current,
        invoices: current.invoices.map((invoice) => ({
          ...invoice,
          invoiced_ts: new Date('2026-02-20T00:00:00Z'),
        })),
      }));

      const second = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1', skipIfUnchanged: true });

      expect(second.status).toBe('PUBLISHED');
      expect(await publisher.listSnapshots()).toHaveLength(2);
    });

    it('should not move the pointer back for a backfill', async () => {
      const latest = await publisher.publish({ asOf: LATER, ruleVersion: 'v1' });
      const backfill = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });

      expect(backfill.status).toBe('PUBLISHED');
      expect(backfill.pointer_advanced).toBe(false);
      expect((await publisher.getCurrent())?.snapshot.snapshot_id).toBe(latest.snapshot_id);
    });

    it('should reject an invalid as_of', async () => {
      await expect(
        publisher.publish({ asOf: new Date('not a date'), ruleVersion: 'v1' }),
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('dry run', () => {
    it('should compute the same blocker codes as a real run without writing', async () => {
      const dry = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1', dryRun: true });

      expect(dry.status).toBe('DRY_RUN');
      expect(dry.snapshot_id).toBeNull();
      expect(dry.summaries).toEqual([
        {
          scope_package_id: 'P1',
          vendor: 'Acme Field Services',
          line_count: 2,
          ready_count: 1,
          blocked_count: 1,
          invoiced_count: 0,
          paid_count: 0,
          as_of_ts: AS_OF,
          rule_version: 'v1',
        },
      ]);
      expect(await store.getCurrentPointer()).toBeNull();
      expect(await store.listSnapshots()).toEqual([]);

      const real = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });
      expect(decisions(real.lines)).toEqual(decisions(dry.lines));
      expect(real.content_hash).toBe(dry.content_hash);
    });

    it('should leave an existing pointer untouched', async () => {
      const published = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });
      invoiceOnF1(source);

      await publisher.publish({ asOf: LATER, ruleVersion: 'v1', dryRun: true });

      expect(await store.getCurrentPointer()).toMatchObject({
        snapshot_id: published.snapshot_id,
        version: 1,
      });
      expect(await store.listSnapshots()).toHaveLength(1);
    });

    it('should not write to the run log', async () => {
      await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1', dryRun: true });

      expect(await publisher.listRuns()).toEqual([]);
    });

    it('should not write to the run log when it fails', async () => {
      await expect(
        publisher.publish({ asOf: AS_OF, ruleVersion: 'v9', dryRun: true }),
      ).rejects.toBeInstanceOf(RuleVersionUnknownError);

      expect(await publisher.listRuns()).toEqual([]);
    });

    it('should narrow the lines to the requested packages', async () => {
      source.update((current) => ({
        ...current,
        packages: [
          ...current.packages,
          { scope_package_id: 'P2', vendor: 'Birch Utilities', status: 'ACTIVE', upload_version: 1 },
        ],
        lines: [...current.lines, { scope_package_id: 'P2', floc_id: 'F9', upload_version: 1 }],
        intervals: [
          ...current.intervals,
          { floc_id: 'F9', scope_package_id: 'P2', effective_start_ts: JAN, effective_end_ts: null },
        ],
      }));

      const dry = await publisher.publish({
        asOf: AS_OF,
        ruleVersion: 'v1',
        dryRun: true,
        scopePackageIds: ['P2'],
      });

      expect(dry.lines.map((line) => `${line.scope_package_id}/${line.floc_id}`)).toEqual(['P2/F9']);
    });
  });

  describe('scoped publish', () => {
    it('should reject package scoping outside a dry run', async () => {
      await expect(
        publisher.publish({ asOf: AS_OF, ruleVersion: 'v1', scopePackageIds: ['P1'] }),
      ).rejects.toMatchObject({ name: 'ValidationError', field: 'scope_package_ids' });

      expect(await store.listSnapshots()).toEqual([]);
      expect(await publisher.listRuns()).toEqual([]);
    });

    it('should keep the full snapshot current', async () => {
      const full = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });

      await expect(
        publisher.publish({ asOf: LATER, ruleVersion: 'v1', scopePackageIds: ['P1'] }),
      ).rejects.toBeInstanceOf(ValidationError);

      const current = await publisher.getCurrent();
      expect(current?.snapshot.snapshot_id).toBe(full.snapshot_id);
      expect(current?.snapshot.line_count).toBe(2);
    });
  });

  describe('failures', () => {
    it('should fail fast while another publish holds the lease', async () => {
      await store.acquireLease(publisher.leaseKeyFor(AS_OF), 'other-run', 60_000);

      await expect(publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' })).rejects.toBeInstanceOf(
        ConcurrentPublishConflictError,
      );
      expect(await store.listSnapshots()).toEqual([]);
      expect((await publisher.listRuns())[0].status).toBe('FAILED');
    });

    it('should reject a concurrent publish for the same as_of', async () => {
      const gated = new GatedSource(source);
      const concurrent = new SnapshotPublisher({
        source: gated,
        store,
        registry: createDefaultRegistry(),
        logger: silent,
      });

      const first = concurrent.publish({ asOf: AS_OF, ruleVersion: 'v1' });
      await gated.started;

      await expect(concurrent.publish({ asOf: AS_OF, ruleVersion: 'v1' })).rejects.toBeInstanceOf(
        ConcurrentPublishConflictError,
      );

      gated.release();
      const result = await first;
      expect(result.status).toBe('PUBLISHED');
      expect(await store.listSnapshots()).toHaveLength(1);
    });

    it('should allow a different as_of to publish concurrently', async () => {
      await store.acquireLease(publisher.leaseKeyFor(AS_OF), 'other-run', 60_000);

      const result = await publisher.publish({ asOf: LATER, ruleVersion: 'v1' });
      expect(result.status).toBe('PUBLISHED');
    });

    it('should abort on an unknown rule version and release the lease', async () => {
      await expect(publisher.publish({ asOf: AS_OF, ruleVersion: 'v9' })).rejects.toBeInstanceOf(
        RuleVersionUnknownError,
      );
      expect(await store.getCurrentPointer()).toBeNull();
      expect(await store.listSnapshots()).toEqual([]);

      const retry = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });
      expect(retry.status).toBe('PUBLISHED');
    });

    it('should abort on a grain violation and keep the last good snapshot current', async () => {
      const good = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });
      source.update((current) => ({
        ...current,
        lines: [...current.lines, { scope_package_id: 'P1', floc_id: 'F1', upload_version: 1 }],
      }));

      await expect(publisher.publish({ asOf: LATER, ruleVersion: 'v1' })).rejects.toBeInstanceOf(
        GrainViolationError,
      );
      expect((await store.getCurrentPointer())?.snapshot_id).toBe(good.snapshot_id);
      expect(await store.listSnapshots()).toHaveLength(1);

      const [failedRun] = await publisher.listRuns();
      expect(failedRun.status).toBe('FAILED');
      expect(failedRun.message).toContain('Duplicate line (P1, F1)');
    });

    it('should time out a slow draft before writing anything', async () => {
      const gated = new GatedSource(source);
      const slow = new SnapshotPublisher({
        source: gated,
        store,
        registry: createDefaultRegistry(),
        config: { draftTimeoutMs: 20 },
        logger: silent,
      });

      await expect(slow.publish({ asOf: AS_OF, ruleVersion: 'v1' })).rejects.toBeInstanceOf(
        PublishTimeoutError,
      );
      gated.release();

      expect(await store.listSnapshots()).toEqual([]);
      expect(await store.acquireLease(slow.leaseKeyFor(AS_OF), 'next-run', 1000)).toEqual({
        acquired: true,
      });
    });

    it('should publish with pending summaries when the summary write fails', async () => {
      const flaky = new FlakySummaryStore();
      const flakyPublisher = new SnapshotPublisher({
        source,
        store: flaky,
        registry: createDefaultRegistry(),
        logger: silent,
      });

      const result = await flakyPublisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });
      const snapshotId = result.snapshot_id ?? '';

      expect(result.status).toBe('PUBLISHED');
      expect(result.pointer_advanced).toBe(true);
      expect(result.summary_status).toBe('PENDING');
      expect(await flaky.getSnapshot(snapshotId)).toMatchObject({
        status: 'PUBLISHED',
        summary_status: 'PENDING',
      });
      expect(await flaky.getLines(snapshotId)).toHaveLength(2);

      flaky.failSummaries = false;
      const summaries = await flakyPublisher.regenerateSummaries(snapshotId);

      expect(summaries).toHaveLength(1);
      expect(summaries[0]).toMatchObject({ line_count: 2, ready_count: 1, blocked_count: 1 });
      expect((await flaky.getSnapshot(snapshotId))?.summary_status).toBe('COMPLETE');
    });
  });

  describe('run log', () => {
    it('should return the published result when the final run record fails', async () => {
      const runLogStore = new FlakyRunLogStore();
      const resilient = new SnapshotPublisher({
        source,
        store: runLogStore,
        registry: createDefaultRegistry(),
        logger: silent,
      });

      const result = await resilient.publish({ asOf: AS_OF, ruleVersion: 'v1' });

      expect(result.status).toBe('PUBLISHED');
      expect(await runLogStore.getSnapshot(result.snapshot_id ?? '')).toMatchObject({
        status: 'PUBLISHED',
      });
      expect(await runLogStore.getCurrentPointer()).toMatchObject({
        snapshot_id: result.snapshot_id,
        version: 1,
      });
      const [run] = await runLogStore.listRuns();
      expect(run).toMatchObject({ run_id: result.run_id, status: 'RUNNING' });
      expect(await runLogStore.listSnapshots()).toHaveLength(1);
    });
  });

  describe('invoiced monotonicity', () => {
    it('should flag a line that silently stops being invoiced', async () => {
      invoiceOnF1(source);
      await publisher.publish({ asOf: LATER, ruleVersion: 'v1' });
      source.update((current) => ({ ...current, invoices: [] }));

      const result = await publisher.publish({ asOf: new Date('2026-03-20T00:00:00Z'), ruleVersion: 'v1' });

      const regressions = result.issues.filter((issue) => issue.kind === 'INVOICE_REGRESSION');
      expect(regressions).toHaveLength(1);
      expect(regressions[0]).toMatchObject({ scope_package_id: 'P1', floc_id: 'F1' });
    });

    it('should accept an explicit reversal', async () => {
      invoiceOnF1(source);
      await publisher.publish({ asOf: LATER, ruleVersion: 'v1' });
      source.update((current) => ({
        ...current,
        reversals: [
          {
            invoice_id: 'INV-1',
            scope_package_id: 'P1',
            floc_id: 'F1',
            reversed_ts: new Date('2026-03-18T00:00:00Z'),
            reason: 'billed in error',
          },
        ],
      }));

      const result = await publisher.publish({ asOf: new Date('2026-03-20T00:00:00Z'), ruleVersion: 'v1' });

      expect(result.issues.filter((issue) => issue.kind === 'INVOICE_REGRESSION')).toEqual([]);
      expect(result.lines.find((line) => line.floc_id === 'F1')).toMatchObject({
        invoiced_flg: false,
        ready_to_invoice_flg: true,
      });
    });
  });

  describe('reads', () => {
    it('should return null when nothing is published', async () => {
      expect(await publisher.getCurrent()).toBeNull();
    });

    it('should record a successful run with metrics', async () => {
      const result = await publisher.publish({ asOf: AS_OF, ruleVersion: 'v1' });

      const [run] = await publisher.listRuns();
      expect(run).toMatchObject({
        run_id: result.run_id,
        status: 'SUCCEEDED',
        snapshot_id: result.snapshot_id,
      });
      expect(run.metrics).toMatchObject({ line_count: 2, ready_count: 1 });
    });

    it('should throw for an unknown snapshot', async () => {
      await expect(publisher.getLines('missing')).rejects.toThrow('Entity not found: snapshot/missing');
    });
  });
});
