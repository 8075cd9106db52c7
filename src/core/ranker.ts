import type { RankedEntry, UnifiedCounts } from "./types.js";

export const DEFAULT_RANK_CAP = 50_000;

export interface RankOptions {
  /** Maximum number of entries kept. Defaults to {@link DEFAULT_RANK_CAP}. */
  cap?: number;
}

/**
 * Orders unified counts and assigns ranks.
 *
 * Contract notes:
 * - ranks are dense: 1..n, no gaps and no shared values
 * - output is fully determined by the counts (no reliance on map order)
 */
export interface Ranker {
  rank(counts: UnifiedCounts, options?: RankOptions): RankedEntry[];
}
