/**
 * @fileoverview Approval-year filter over a drug stream.
 * @module src/services/drug-targets/core/date-filter
 */
import type { DrugRecord } from '../types.js';

export function isApprovedSince(drug: DrugRecord, minYear: number): boolean {
  return drug.firstApprovalYear !== null && drug.firstApprovalYear >= minYear;
}

/**
 * Yields the records first approved in `minYear` or later.
 * Records without an approval year are dropped.
 */
export async function* filterApprovedSince(
  drugs: AsyncIterable<DrugRecord>,
  minYear: number,
): AsyncGenerator<DrugRecord, void, undefined> {
  for await (const drug of drugs) {
    if (isApprovedSince(drug, minYear)) {
      yield drug;
    }
  }
}
