export {
  resolveGrain,
  resolveAssignment,
  validateAssignmentIntervals,
  compareKeys,
} from './grain-resolver.js';
export type {
  AssignmentStatus,
  AssignmentTable,
  GrainResolution,
  ResolveGrainParams,
  SpineRow,
} from './types.js';
