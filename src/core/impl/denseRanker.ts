import { InvalidCapError } from "../errors.js";
import type { TopKSelector } from "../heap.js";
import { compareIdentity } from "../identity.js";
import { DEFAULT_RANK_CAP, type RankOptions, type Ranker } from "../ranker.js";
import type { RankedEntry, UnifiedCount, UnifiedCounts } from "../types.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";

/** Count descending, then surface ascending, then reading (absent first). */
export function compareByFrequency(a: UnifiedCount, b: UnifiedCount): number {
  return b.count - a.count || compareIdentity(a.identity, b.identity);
}

/**
 * Dense ranker: sorted position i (1-based) gets rank i.
 *
 * Equal counts get distinct consecutive ranks in surface order. This is a
 * reproducible ordering, not a statistical tie rank.
 */
export class DenseRanker implements Ranker {
  constructor(private readonly topK: TopKSelector<UnifiedCount> = new MinHeapTopKSelector<UnifiedCount>()) {}

  rank(counts: UnifiedCounts, options?: RankOptions): RankedEntry[] {
    const cap = options?.cap ?? DEFAULT_RANK_CAP;
    if (!Number.isSafeInteger(cap) || cap <= 0) throw new InvalidCapError(cap);

    const best = this.topK.topK(counts.values(), cap, compareByFrequency);

    return best.map((u, i) => Object.freeze({ identity: u.identity, totalCount: u.count, rank: i + 1 }));
  }
}
