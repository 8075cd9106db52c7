import type { UnifiedCounts } from "../core/types.js";

export interface OverlapReport {
  /** terms present in both tables */
  shared: number;
  /** terms present in either table */
  union: number;
  /** shared / union, 0 for two empty tables */
  ratio: number;
  /** shared terms whose counts differ between the tables */
  differing: number;
}

/**
 * Compares the vocabularies of two partial tables of one corpus.
 * A high ratio with few differing counts suggests overlapping coverage
 * (EXCLUSIVE_PREFERRED); near-zero overlap suggests ADDITIVE.
 */
export function computeOverlap(a: UnifiedCounts, b: UnifiedCounts): OverlapReport {
  let shared = 0;
  let differing = 0;
  for (const [key, left] of a) {
    const right = b.get(key);
    if (!right) continue;
    shared++;
    if (right.count !== left.count) differing++;
  }
  const union = a.size + b.size - shared;
  return { shared, union, ratio: union === 0 ? 0 : shared / union, differing };
}
