import { toExportEntries } from "./export.js";
import { DenseRanker, MinHeapTopKSelector, PolicyMerger } from "./impl/index.js";
import type { Merger } from "./merger.js";
import type { MergePolicy } from "./policy.js";
import type { Ranker } from "./ranker.js";
import type { ExportEntry, RankedEntry, SourceTable, UnifiedCount, UnifiedCounts } from "./types.js";

export interface FrequencyEngine {
  merge(policy: MergePolicy, tables: readonly SourceTable[]): UnifiedCounts;
  rank(counts: UnifiedCounts, cap?: number): RankedEntry[];
  /** merge, rank and strip counts in one call */
  run(policy: MergePolicy, tables: readonly SourceTable[], cap?: number): ExportEntry[];
}

export interface EngineDeps {
  merger: Merger;
  ranker: Ranker;
}

export function createFrequencyEngine(deps?: Partial<EngineDeps>): FrequencyEngine {
  const merger = deps?.merger ?? new PolicyMerger();
  const ranker = deps?.ranker ?? new DenseRanker(new MinHeapTopKSelector<UnifiedCount>());

  return {
    merge(policy, tables) {
      return merger.merge(policy, tables);
    },
    rank(counts, cap) {
      return ranker.rank(counts, cap === undefined ? undefined : { cap });
    },
    run(policy, tables, cap) {
      return toExportEntries(this.rank(this.merge(policy, tables), cap));
    },
  };
}
