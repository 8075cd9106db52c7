import type { MergePolicy } from "./policy.js";
import type { SourceTable, UnifiedCounts } from "./types.js";

/**
 * Collapses partial frequency tables into one count per term.
 *
 * Contract notes:
 * - pure: inputs are never mutated
 * - output depends only on the records and the policy, not on table order
 */
export interface Merger {
  merge(policy: MergePolicy, tables: readonly SourceTable[]): UnifiedCounts;
}
