import { generateId } from '../shared/types.js';
import {
  ConcurrentPublishConflictError,
  EntityNotFoundError,
  PublishTimeoutError,
  ValidationError,
} from '../shared/errors.js';
import { getLogger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';
import type { PublisherConfig } from '../shared/config.js';
import { countIssuesByKind } from '../shared/data-quality.js';
import type { DataQualityIssue } from '../shared/data-quality.js';
import { startSpan, endSpan } from '../observability/tracing.js';
import { lineKey } from '../inputs/types.js';
import type { EligibilitySource } from '../inputs/types.js';
import { resolveGrain } from '../grain/grain-resolver.js';
import { reconcileEvidence } from '../evidence/evidence-reconciler.js';
import { reconcileBilling } from '../billing/billing-reconciler.js';
import type { RuleVersionRegistry } from '../rules-engine/rule-registry.js';
import { summarize, summarizeDraft } from '../summary/summary-aggregator.js';
import type {
  CurrentPointer,
  DraftLine,
  PublishRun,
  Snapshot,
  SnapshotLine,
  SnapshotStore,
  SnapshotSummary,
} from '../snapshot-store/types.js';
import { computeContentHash } from './content-hash.js';
import { PublishCycle, isTerminal } from './publish-state.js';
import type { PublishRequest, PublishResult, SnapshotPublisherDeps } from './types.js';

export const DEFAULT_PUBLISHER_CONFIG: PublisherConfig = {
  environment: 'default',
  draftTimeoutMs: 120_000,
  leaseTtlMs: 15 * 60_000,
};

interface Draft {
  lines: DraftLine[];
  issues: DataQualityIssue[];
  contentHash: string;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new PublishTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs one publish cycle per call: DRAFT (load, grain, evidence, billing, rules),
 * COMMITTING (lines, then summaries) and PUBLISHED with the pointer advanced, or
 * FAILED with the pointer untouched.
 */
export class SnapshotPublisher {
  private readonly source: EligibilitySource;
  private readonly store: SnapshotStore;
  private readonly registry: RuleVersionRegistry;
  private readonly config: PublisherConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: SnapshotPublisherDeps) {
    this.source = deps.source;
    this.store = deps.store;
    this.registry = deps.registry;
    this.config = { ...DEFAULT_PUBLISHER_CONFIG, ...deps.config };
    this.logger = deps.logger ?? getLogger('snapshot-publisher');
    this.now = deps.now ?? (() => new Date());
  }

  leaseKeyFor(asOf: Date): string {
    return `${this.config.environment}:${asOf.toISOString()}`;
  }

  async publish(request: PublishRequest): Promise<PublishResult> {
    const asOf = request.asOf;
    if (Number.isNaN(asOf.getTime())) {
      throw new ValidationError('asOf must be a valid timestamp', 'as_of_ts');
    }
    if (request.ruleVersion.trim() === '') {
      throw new ValidationError('ruleVersion is required', 'rule_version');
    }

    const dryRun = request.dryRun ?? false;
    // a partial snapshot must never become the current one
    if (request.scopePackageIds !== undefined && !dryRun) {
      throw new ValidationError('scopePackageIds is only allowed on a dry run', 'scope_package_ids');
    }
    const runId = generateId();
    const leaseKey = this.leaseKeyFor(asOf);
    const log = this.logger.child({
      run_id: runId,
      as_of_ts: asOf.toISOString(),
      rule_version: request.ruleVersion,
      dry_run: dryRun,
    });
    const span = startSpan('eligibility.publish', {
      'eligibility.run_id': runId,
      'eligibility.as_of_ts': asOf.toISOString(),
      'eligibility.rule_version': request.ruleVersion,
      'eligibility.dry_run': String(dryRun),
    });

    const run: PublishRun = {
      run_id: runId,
      as_of_ts: asOf,
      rule_version: request.ruleVersion,
      status: 'RUNNING',
      snapshot_id: null,
      message: null,
      metrics: {},
      started_at: this.now(),
      ended_at: null,
    };

    const cycle = new PublishCycle();
    let leaseHeld = false;
    let committedSnapshotId: string | null = null;

    try {
      if (!dryRun) {
        const lease = await this.store.acquireLease(leaseKey, runId, this.config.leaseTtlMs);
        if (!lease.acquired) {
          log.warn({ lease_key: leaseKey, held_by: lease.held_by }, 'publish already in flight');
          throw new ConcurrentPublishConflictError(leaseKey, lease.held_by);
        }
        leaseHeld = true;
        await this.store.recordRun(run);
      }

      // unknown versions abort before any input is read
      this.registry.get(request.ruleVersion);

      const draft = await withTimeout(this.buildDraft(request), this.config.draftTimeoutMs);
      run.metrics = {
        line_count: draft.lines.length,
        ready_count: draft.lines.filter((line) => line.ready_to_invoice_flg).length,
        issues: countIssuesByKind(draft.issues),
      };
      log.info(
        { line_count: draft.lines.length, issues: draft.issues.length, content_hash: draft.contentHash },
        'draft computed',
      );

      if (dryRun) {
        const result = this.draftResult(runId, request, draft, 'DRY_RUN');
        log.info({ metrics: run.metrics }, 'dry run completed');
        endSpan(span);
        return result;
      }

      if (request.skipIfUnchanged) {
        const unchanged = await this.findUnchanged(request, draft.contentHash);
        if (unchanged) {
          log.info({ snapshot_id: unchanged.snapshot_id }, 'content unchanged, publish skipped');
          const result: PublishResult = {
            ...this.draftResult(runId, request, draft, 'UNCHANGED'),
            snapshot_id: unchanged.snapshot_id,
            short_circuited: true,
            summary_status: unchanged.summary_status,
          };
          await this.finishRun(run, 'SUCCEEDED', unchanged.snapshot_id, 'unchanged');
          endSpan(span);
          return result;
        }
      }

      cycle.transition('COMMITTING');
      const snapshotId = generateId();
      const lines: SnapshotLine[] = draft.lines.map((line) => ({ snapshot_id: snapshotId, ...line }));
      const snapshot: Snapshot = {
        snapshot_id: snapshotId,
        as_of_ts: asOf,
        rule_version: request.ruleVersion,
        status: 'COMMITTING',
        content_hash: draft.contentHash,
        line_count: lines.length,
        summary_status: 'PENDING',
        created_at: this.now(),
        published_at: null,
        failure_message: null,
      };

      const commitSpan = startSpan('eligibility.publish.commit', { 'eligibility.snapshot_id': snapshotId });
      try {
        await this.store.commitSnapshot(snapshot, lines);
        endSpan(commitSpan);
      } catch (error: unknown) {
        endSpan(commitSpan, toError(error));
        throw error;
      }
      committedSnapshotId = snapshotId;
      run.snapshot_id = snapshotId;

      const summaries = await this.writeSummaries(snapshotId, lines, log);

      const outcome = await this.store.publishSnapshot(snapshotId);
      cycle.transition('PUBLISHED');
      if (!outcome.pointer_advanced) {
        log.warn(
          { snapshot_id: snapshotId, current_snapshot_id: outcome.pointer?.snapshot_id },
          'published snapshot is older than the current one; pointer left in place',
        );
      }
      log.info(
        { snapshot_id: snapshotId, pointer_advanced: outcome.pointer_advanced },
        'snapshot published',
      );

      // the snapshot is live; a run-log failure must not fail the cycle
      await this.finishRun(run, 'SUCCEEDED', snapshotId, null).catch((recordError: unknown) => {
        log.error({ err: recordError, snapshot_id: snapshotId }, 'failed to record publish run');
      });
      endSpan(span);
      return {
        run_id: runId,
        snapshot_id: snapshotId,
        status: 'PUBLISHED',
        as_of_ts: asOf,
        rule_version: request.ruleVersion,
        content_hash: draft.contentHash,
        line_count: lines.length,
        lines,
        summaries: summaries ?? [],
        issues: draft.issues,
        short_circuited: false,
        pointer_advanced: outcome.pointer_advanced,
        summary_status: summaries ? 'COMPLETE' : 'PENDING',
      };
    } catch (error: unknown) {
      const err = toError(error);
      const failedWhileCommitting = cycle.status === 'COMMITTING';
      if (!isTerminal(cycle.status)) cycle.transition('FAILED');
      if (failedWhileCommitting && committedSnapshotId) {
        await this.markFailed(committedSnapshotId, err.message, log);
      }
      log.error({ err }, 'publish failed');
      if (!dryRun) {
        await this.finishRun(run, 'FAILED', committedSnapshotId, err.message).catch(
          (recordError: unknown) => {
            log.error({ err: recordError }, 'failed to record publish run');
          },
        );
      }
      endSpan(span, err);
      throw error;
    } finally {
      if (leaseHeld) {
        await this.store.releaseLease(leaseKey, runId).catch((releaseError: unknown) => {
          log.warn({ err: releaseError, lease_key: leaseKey }, 'failed to release publish lease');
        });
      }
    }
  }

  /** Recompute summaries of a committed snapshot whose summary step failed. */
  async regenerateSummaries(snapshotId: string): Promise<SnapshotSummary[]> {
    const snapshot = await this.getSnapshot(snapshotId);
    if (snapshot.summary_status === 'COMPLETE') {
      return this.store.getSummaries(snapshotId);
    }
    if (snapshot.status !== 'PUBLISHED' && snapshot.status !== 'COMMITTING') {
      throw new ValidationError(
        `Snapshot ${snapshotId} is ${snapshot.status}; only committed snapshots have summaries`,
        'snapshot_id',
      );
    }

    const lines = await this.store.getLines(snapshotId);
    const summaries = summarize(snapshotId, lines);
    await this.store.writeSummaries(snapshotId, summaries);
    this.logger.info({ snapshot_id: snapshotId, summaries: summaries.length }, 'summaries regenerated');
    return summaries;
  }

  async getCurrent(): Promise<{ pointer: CurrentPointer; snapshot: Snapshot } | null> {
    const pointer = await this.store.getCurrentPointer();
    if (!pointer) return null;
    return { pointer, snapshot: await this.getSnapshot(pointer.snapshot_id) };
  }

  async getSnapshot(snapshotId: string): Promise<Snapshot> {
    const snapshot = await this.store.getSnapshot(snapshotId);
    if (!snapshot) throw new EntityNotFoundError('snapshot', snapshotId);
    return snapshot;
  }

  async getLines(snapshotId: string): Promise<SnapshotLine[]> {
    await this.getSnapshot(snapshotId);
    return this.store.getLines(snapshotId);
  }

  async getSummaries(snapshotId: string): Promise<SnapshotSummary[]> {
    await this.getSnapshot(snapshotId);
    return this.store.getSummaries(snapshotId);
  }

  async listSnapshots(): Promise<Snapshot[]> {
    return this.store.listSnapshots();
  }

  async listRuns(limit?: number): Promise<PublishRun[]> {
    return this.store.listRuns(limit);
  }

  private async buildDraft(request: PublishRequest): Promise<Draft> {
    const asOf = request.asOf;
    const span = startSpan('eligibility.publish.draft');
    try {
      const inputs = await this.source.load(asOf);

      const grain = resolveGrain({
        packages: inputs.packages,
        lines: inputs.lines,
        intervals: inputs.intervals,
        asOf,
        scopePackageIds: request.scopePackageIds,
      });
      const evidence = reconcileEvidence(grain.spine, inputs.evidence, asOf);
      const billing = reconcileBilling(evidence.rows, inputs.invoices, inputs.reversals, asOf);

      const lines = billing.rows.map((row): DraftLine => {
        const decision = this.registry.evaluate(
          request.ruleVersion,
          row.evidence,
          row.assignment_status,
          row.billing,
        );
        return {
          scope_package_id: row.scope_package_id,
          floc_id: row.floc_id,
          vendor: row.vendor,
          assignment_status: row.assignment_status,
          ready_to_invoice_flg: decision.ready_to_invoice_flg,
          invoiced_flg: row.billing.invoiced_flg,
          paid_flg: row.billing.paid_flg,
          blocker_codes: decision.blocker_codes,
          invoice_ids: row.billing.invoice_ids,
          as_of_ts: asOf,
          rule_version: request.ruleVersion,
        };
      });

      const reversedKeys = new Set(
        billing.rows
          .filter((row) => row.billing.reversed_invoice_ids.length > 0)
          .map((row) => lineKey(row.scope_package_id, row.floc_id)),
      );
      const regressions = await this.checkInvoicedMonotonicity(asOf, lines, reversedKeys);

      const draft: Draft = {
        lines,
        issues: [...grain.issues, ...evidence.issues, ...billing.issues, ...regressions],
        contentHash: computeContentHash(lines),
      };
      endSpan(span);
      return draft;
    } catch (error: unknown) {
      endSpan(span, toError(error));
      throw error;
    }
  }

  /**
   * A line invoiced in the current snapshot must stay invoiced unless a reversal
   * fact cancels it. Only compared against a current snapshot at or before as_of.
   */
  private async checkInvoicedMonotonicity(
    asOf: Date,
    lines: DraftLine[],
    reversedKeys: Set<string>,
  ): Promise<DataQualityIssue[]> {
    const pointer = await this.store.getCurrentPointer();
    if (!pointer || pointer.as_of_ts.getTime() > asOf.getTime()) return [];

    const now = new Map(lines.map((line) => [lineKey(line.scope_package_id, line.floc_id), line]));
    const issues: DataQualityIssue[] = [];
    for (const previous of await this.store.getLines(pointer.snapshot_id)) {
      if (!previous.invoiced_flg) continue;
      const key = lineKey(previous.scope_package_id, previous.floc_id);
      const current = now.get(key);
      if (!current || current.invoiced_flg || reversedKeys.has(key)) continue;
      issues.push({
        kind: 'INVOICE_REGRESSION',
        message: `(${previous.scope_package_id}, ${previous.floc_id}) was invoiced in snapshot ${pointer.snapshot_id} and is no longer invoiced, with no reversal`,
        source: 'invoices',
        scope_package_id: previous.scope_package_id,
        floc_id: previous.floc_id,
      });
    }
    return issues;
  }

  private async findUnchanged(request: PublishRequest, contentHash: string): Promise<Snapshot | null> {
    const pointer = await this.store.getCurrentPointer();
    if (!pointer) return null;
    const current = await this.store.getSnapshot(pointer.snapshot_id);
    if (
      current &&
      current.as_of_ts.getTime() === request.asOf.getTime() &&
      current.rule_version === request.ruleVersion &&
      current.content_hash === contentHash
    ) {
      return current;
    }
    return null;
  }

  /** Summary failures leave the snapshot publishable with summary_status PENDING. */
  private async writeSummaries(
    snapshotId: string,
    lines: SnapshotLine[],
    log: Logger,
  ): Promise<SnapshotSummary[] | null> {
    try {
      const summaries = summarize(snapshotId, lines);
      await this.store.writeSummaries(snapshotId, summaries);
      return summaries;
    } catch (error: unknown) {
      log.warn({ err: error, snapshot_id: snapshotId }, 'summary write failed; marked pending');
      await this.store.markSummaryPending(snapshotId).catch((markError: unknown) => {
        log.error({ err: markError, snapshot_id: snapshotId }, 'failed to mark summary pending');
      });
      return null;
    }
  }

  private async markFailed(snapshotId: string, message: string, log: Logger): Promise<void> {
    try {
      await this.store.markFailed(snapshotId, message);
    } catch (error: unknown) {
      log.error({ err: error, snapshot_id: snapshotId }, 'failed to mark snapshot FAILED');
    }
  }

  private draftResult(
    runId: string,
    request: PublishRequest,
    draft: Draft,
    status: 'DRY_RUN' | 'UNCHANGED',
  ): PublishResult {
    return {
      run_id: runId,
      snapshot_id: null,
      status,
      as_of_ts: request.asOf,
      rule_version: request.ruleVersion,
      content_hash: draft.contentHash,
      line_count: draft.lines.length,
      lines: draft.lines,
      summaries: summarizeDraft(draft.lines),
      issues: draft.issues,
      short_circuited: false,
      pointer_advanced: false,
      summary_status: null,
    };
  }

  private async finishRun(
    run: PublishRun,
    status: 'SUCCEEDED' | 'FAILED',
    snapshotId: string | null,
    message: string | null,
  ): Promise<void> {
    run.status = status;
    run.snapshot_id = snapshotId;
    run.message = message;
    run.ended_at = this.now();
    await this.store.recordRun({ ...run });
  }
}
