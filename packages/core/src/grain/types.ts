import type { DataQualityIssue } from '../shared/data-quality.js';
import type { AssignmentInterval, PackageLine, ScopePackage } from '../inputs/types.js';

/**
 * CURRENT: the interval containing as_of names this line's package.
 * STALE: the FLOC is assigned to a different package as of as_of.
 * UNRESOLVED: no interval contains as_of.
 */
export type AssignmentStatus = 'CURRENT' | 'STALE' | 'UNRESOLVED';

export interface SpineRow {
  scope_package_id: string;
  floc_id: string;
  vendor: string;
  upload_version: number;
  assignment_status: AssignmentStatus;
  /** Package the FLOC was assigned to as of the cycle, if any. */
  assigned_package_id: string | null;
  is_current_assignment: boolean;
  assignment_unresolved: boolean;
}

export interface ResolveGrainParams {
  packages: ScopePackage[];
  lines: PackageLine[];
  intervals: AssignmentInterval[];
  asOf: Date;
  /** Restrict the spine to these packages; all packages when omitted. */
  scopePackageIds?: string[];
}

export interface GrainResolution {
  spine: SpineRow[];
  issues: DataQualityIssue[];
}

/** Validated intervals per FLOC, sorted by start. */
export type AssignmentTable = ReadonlyMap<string, readonly AssignmentInterval[]>;
