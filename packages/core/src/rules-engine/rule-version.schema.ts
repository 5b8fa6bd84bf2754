import type { ConditionOperator, FactField } from './types.js';

const OPERATORS: ConditionOperator[] = [
  'eq',
  'neq',
  'not_empty',
  'in',
  'not_in',
  'exists',
  'gt',
  'lt',
  'gte',
  'lte',
  'matches',
];

const FACT_FIELDS: FactField[] = [
  'assignment_is_current',
  'assignment_status',
  'survey_received',
  'images_received',
  'images_count',
  'deliveries_received',
  'deliveries_count',
  'invoiced',
  'paid',
];

const SCALAR = { type: ['string', 'number', 'boolean', 'null'] };

export const RULE_VERSION_SCHEMA: Record<string, unknown> = {
  type: 'object',
  required: ['version', 'description', 'rules'],
  additionalProperties: false,
  properties: {
    version: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    rules: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'name', 'description', 'priority', 'conditions', 'blocker_code'],
        additionalProperties: false,
        properties: {
          id: { type: 'string', minLength: 1 },
          name: { type: 'string' },
          description: { type: 'string' },
          priority: { type: 'integer' },
          blocker_code: { type: 'string', pattern: '^[A-Z][A-Z0-9_]*$' },
          conditions: {
            type: 'array',
            minItems: 1,
            items: {
              type: 'object',
              required: ['field', 'operator'],
              additionalProperties: false,
              properties: {
                field: { enum: FACT_FIELDS },
                operator: { enum: OPERATORS },
                value: { anyOf: [SCALAR, { type: 'array', items: SCALAR }] },
              },
            },
          },
        },
      },
    },
  },
};
