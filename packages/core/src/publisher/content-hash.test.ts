import { describe, it, expect } from 'vitest';
import { computeContentHash } from './content-hash.js';
import type { DraftLine } from '../snapshot-store/types.js';

function line(flocId: string, overrides: Partial<DraftLine> = {}): DraftLine {
  return {
    scope_package_id: 'P1',
    floc_id: flocId,
    vendor: 'Acme Field Services',
    assignment_status: 'CURRENT',
    ready_to_invoice_flg: true,
    invoiced_flg: false,
    paid_flg: false,
    blocker_codes: [],
    invoice_ids: [],
    as_of_ts: new Date('2026-03-01T00:00:00Z'),
    rule_version: 'v1',
    ...overrides,
  };
}

describe('computeContentHash', () => {
  it('should ignore line order', () => {
    expect(computeContentHash([line('F1'), line('F2')])).toBe(
      computeContentHash([line('F2'), line('F1')]),
    );
  });

  it('should change when a decision changes', () => {
    const before = computeContentHash([line('F1')]);
    const after = computeContentHash([
      line('F1', { ready_to_invoice_flg: false, blocker_codes: ['MISSING_IMAGES'] }),
    ]);

    expect(after).not.toBe(before);
  });

  it('should not depend on as_of or rule version', () => {
    expect(computeContentHash([line('F1')])).toBe(
      computeContentHash([
        line('F1', { as_of_ts: new Date('2026-04-01T00:00:00Z'), rule_version: 'v2' }),
      ]),
    );
  });

  it('should hash an empty snapshot to the empty SHA-256 digest', () => {
    expect(computeContentHash([])).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
  });
});
