import { GrainViolationError } from '../shared/errors.js';
import type { DataQualityIssue } from '../shared/data-quality.js';
import { lineKey } from '../inputs/types.js';
import type { AssignmentInterval, ScopePackage } from '../inputs/types.js';
import type {
  AssignmentStatus,
  AssignmentTable,
  GrainResolution,
  ResolveGrainParams,
  SpineRow,
} from './types.js';

export function compareKeys(
  a: { scope_package_id: string; floc_id: string },
  b: { scope_package_id: string; floc_id: string },
): number {
  if (a.scope_package_id !== b.scope_package_id) {
    return a.scope_package_id < b.scope_package_id ? -1 : 1;
  }
  if (a.floc_id !== b.floc_id) return a.floc_id < b.floc_id ? -1 : 1;
  return 0;
}

function formatTs(ts: Date | null): string {
  return ts ? ts.toISOString() : 'open';
}

/**
 * Build the interval table, enforcing that every FLOC's intervals are well formed
 * and never overlap. Runs before every resolution.
 */
export function validateAssignmentIntervals(intervals: AssignmentInterval[]): AssignmentTable {
  const byFloc = new Map<string, AssignmentInterval[]>();
  for (const interval of intervals) {
    const end = interval.effective_end_ts;
    if (end !== null && end.getTime() <= interval.effective_start_ts.getTime()) {
      throw new GrainViolationError(
        'invalid_assignment_interval',
        `Assignment interval for FLOC ${interval.floc_id} in ${interval.scope_package_id} ends (${end.toISOString()}) at or before it starts (${interval.effective_start_ts.toISOString()})`,
        { floc_id: interval.floc_id, scope_package_id: interval.scope_package_id },
      );
    }
    const existing = byFloc.get(interval.floc_id) ?? [];
    existing.push(interval);
    byFloc.set(interval.floc_id, existing);
  }

  for (const [flocId, flocIntervals] of byFloc) {
    flocIntervals.sort(
      (a, b) => a.effective_start_ts.getTime() - b.effective_start_ts.getTime(),
    );
    for (let i = 1; i < flocIntervals.length; i++) {
      const prev = flocIntervals[i - 1];
      const next = flocIntervals[i];
      const prevEnd = prev.effective_end_ts;
      if (prevEnd === null || prevEnd.getTime() > next.effective_start_ts.getTime()) {
        throw new GrainViolationError(
          'overlapping_assignment',
          `Overlapping assignments for FLOC ${flocId}: ${prev.scope_package_id} [${prev.effective_start_ts.toISOString()}, ${formatTs(prevEnd)}) and ${next.scope_package_id} [${next.effective_start_ts.toISOString()}, ${formatTs(next.effective_end_ts)})`,
          { floc_id: flocId },
        );
      }
    }
  }

  return byFloc;
}

export function resolveAssignment(
  table: AssignmentTable,
  flocId: string,
  asOf: Date,
): AssignmentInterval | null {
  const intervals = table.get(flocId);
  if (!intervals) return null;
  const t = asOf.getTime();
  for (const interval of intervals) {
    if (interval.effective_start_ts.getTime() > t) break;
    if (interval.effective_end_ts === null || t < interval.effective_end_ts.getTime()) {
      return interval;
    }
  }
  return null;
}

function indexPackages(packages: ScopePackage[], scopePackageIds?: string[]): Map<string, ScopePackage> {
  const wanted = scopePackageIds ? new Set(scopePackageIds) : null;
  const index = new Map<string, ScopePackage>();
  for (const pkg of packages) {
    if (index.has(pkg.scope_package_id)) {
      throw new GrainViolationError(
        'duplicate_package',
        `Scope package ${pkg.scope_package_id} appears more than once`,
        { scope_package_id: pkg.scope_package_id },
      );
    }
    if (wanted && !wanted.has(pkg.scope_package_id)) continue;
    index.set(pkg.scope_package_id, pkg);
  }
  return index;
}

/**
 * Build the canonical (scope_package_id, floc_id) spine for the target packages and
 * resolve each line's assignment as of `asOf`.
 */
export function resolveGrain(params: ResolveGrainParams): GrainResolution {
  const table = validateAssignmentIntervals(params.intervals);
  const packages = indexPackages(params.packages, params.scopePackageIds);

  const seen = new Set<string>();
  const spine: SpineRow[] = [];
  const issues: DataQualityIssue[] = [];

  for (const line of params.lines) {
    const versionKey = `${lineKey(line.scope_package_id, line.floc_id)}@${line.upload_version}`;
    if (seen.has(versionKey)) {
      throw new GrainViolationError(
        'duplicate_package_line',
        `Duplicate line (${line.scope_package_id}, ${line.floc_id}) in upload version ${line.upload_version}`,
        {
          scope_package_id: line.scope_package_id,
          floc_id: line.floc_id,
          upload_version: String(line.upload_version),
        },
      );
    }
    seen.add(versionKey);

    const pkg = packages.get(line.scope_package_id);
    // Lines from earlier uploads stay in history but are not part of the spine
    if (!pkg || line.upload_version !== pkg.upload_version) continue;

    const interval = resolveAssignment(table, line.floc_id, params.asOf);
    let status: AssignmentStatus;
    if (!interval) {
      status = 'UNRESOLVED';
      issues.push({
        kind: 'ASSIGNMENT_UNRESOLVED',
        message: `No assignment interval contains ${params.asOf.toISOString()} for FLOC ${line.floc_id}`,
        scope_package_id: line.scope_package_id,
        floc_id: line.floc_id,
      });
    } else {
      status = interval.scope_package_id === line.scope_package_id ? 'CURRENT' : 'STALE';
    }

    spine.push({
      scope_package_id: line.scope_package_id,
      floc_id: line.floc_id,
      vendor: pkg.vendor,
      upload_version: line.upload_version,
      assignment_status: status,
      assigned_package_id: interval ? interval.scope_package_id : null,
      is_current_assignment: status === 'CURRENT',
      assignment_unresolved: status === 'UNRESOLVED',
    });
  }

  spine.sort(compareKeys);
  issues.sort(compareIssueKeys);
  return { spine, issues };
}

function compareIssueKeys(a: DataQualityIssue, b: DataQualityIssue): number {
  return compareKeys(
    { scope_package_id: a.scope_package_id ?? '', floc_id: a.floc_id ?? '' },
    { scope_package_id: b.scope_package_id ?? '', floc_id: b.floc_id ?? '' },
  );
}
