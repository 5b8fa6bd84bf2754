import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import type { InMemorySourceData } from '@eligibility-ledger/core';

export const RULES_DIR = join(dirname(fileURLToPath(import.meta.url)), '../../../rules');

export const JAN = new Date('2026-01-01T00:00:00Z');
export const FEB = new Date('2026-02-01T00:00:00Z');

/**
 * Two packages of one vendor programme:
 * P1 = {F1, F2, F3}, P2 = {F3, F4}. F3 moves from P1 to P2 on 2026-03-05.
 * F1 has survey, 10 images and deliveries; F2 has survey only; F4 has survey and 3 images.
 */
export function programmeData(): InMemorySourceData {
  const switchover = new Date('2026-03-05T00:00:00Z');
  return {
    packages: [
      { scope_package_id: 'P1', vendor: 'Acme Field Services', status: 'ACTIVE', upload_version: 2 },
      { scope_package_id: 'P2', vendor: 'Borealis Utilities', status: 'ACTIVE', upload_version: 1 },
    ],
    lines: [
      // upload 1 of P1 is history
      { scope_package_id: 'P1', floc_id: 'F0', upload_version: 1 },
      { scope_package_id: 'P1', floc_id: 'F1', upload_version: 2 },
      { scope_package_id: 'P1', floc_id: 'F2', upload_version: 2 },
      { scope_package_id: 'P1', floc_id: 'F3', upload_version: 2 },
      { scope_package_id: 'P2', floc_id: 'F3', upload_version: 1 },
      { scope_package_id: 'P2', floc_id: 'F4', upload_version: 1 },
    ],
    intervals: [
      { floc_id: 'F1', scope_package_id: 'P1', effective_start_ts: JAN, effective_end_ts: null },
      { floc_id: 'F2', scope_package_id: 'P1', effective_start_ts: JAN, effective_end_ts: null },
      { floc_id: 'F3', scope_package_id: 'P1', effective_start_ts: JAN, effective_end_ts: switchover },
      { floc_id: 'F3', scope_package_id: 'P2', effective_start_ts: switchover, effective_end_ts: null },
      { floc_id: 'F4', scope_package_id: 'P2', effective_start_ts: JAN, effective_end_ts: null },
    ],
    evidence: {
      survey: [
        { scope_package_id: 'P1', floc_id: 'F1', evidence_type: 'survey', received_flg: true, evidence_ts: FEB, count: 1 },
        { scope_package_id: 'P1', floc_id: 'F2', evidence_type: 'survey', received_flg: true, evidence_ts: FEB, count: 1 },
        { scope_package_id: 'P2', floc_id: 'F4', evidence_type: 'survey', received_flg: true, evidence_ts: FEB, count: 1 },
      ],
      images: [
        { scope_package_id: 'P1', floc_id: 'F1', evidence_type: 'images', received_flg: true, evidence_ts: FEB, count: 10 },
        { scope_package_id: 'P2', floc_id: 'F4', evidence_type: 'images', received_flg: true, evidence_ts: FEB, count: 3 },
      ],
      deliveries: [
        { scope_package_id: 'P1', floc_id: 'F1', evidence_type: 'deliveries', received_flg: true, evidence_ts: FEB, count: 2 },
      ],
    },
    invoices: [],
    reversals: [],
  };
}
