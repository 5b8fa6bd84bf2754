import type { RuleVersion } from './types.js';

/**
 * Baseline: a line is ready to invoice when its assignment is current, survey and
 * images are in, and it has not been invoiced. Deliveries and paid status are
 * available to later versions.
 */
export const ELIGIBILITY_RULES_V1: RuleVersion = {
  version: 'v1',
  description: 'Current assignment, survey and images received, not yet invoiced',
  rules: [
    {
      id: 'v1-assignment-stale',
      name: 'Assignment moved to another package',
      description: 'The FLOC is assigned to a different scope package as of the snapshot',
      priority: 10,
      conditions: [{ field: 'assignment_status', operator: 'eq', value: 'STALE' }],
      blocker_code: 'ASSIGNMENT_STALE',
    },
    {
      id: 'v1-assignment-unresolved',
      name: 'No assignment as of snapshot',
      description: 'No assignment interval covers the snapshot timestamp',
      priority: 10,
      conditions: [{ field: 'assignment_status', operator: 'eq', value: 'UNRESOLVED' }],
      blocker_code: 'ASSIGNMENT_UNRESOLVED',
    },
    {
      id: 'v1-missing-survey',
      name: 'Survey evidence missing',
      description: 'No survey evidence received for the line',
      priority: 20,
      conditions: [{ field: 'survey_received', operator: 'eq', value: false }],
      blocker_code: 'MISSING_SURVEY',
    },
    {
      id: 'v1-missing-images',
      name: 'Image evidence missing',
      description: 'No image evidence received for the line',
      priority: 30,
      conditions: [{ field: 'images_received', operator: 'eq', value: false }],
      blocker_code: 'MISSING_IMAGES',
    },
    {
      id: 'v1-already-invoiced',
      name: 'Line already invoiced',
      description: 'An invoice already bills the line',
      priority: 40,
      conditions: [{ field: 'invoiced', operator: 'eq', value: true }],
      blocker_code: 'ALREADY_INVOICED',
    },
  ],
};
