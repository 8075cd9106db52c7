import { InvalidPolicyConfigurationError, NegativeCountError } from "../errors.js";
import type { Merger } from "../merger.js";
import type { ObservationIndex } from "../observations.js";
import { validatePolicy, type MergePolicy } from "../policy.js";
import type { SourceTable, SourceTag, UnifiedCounts } from "../types.js";
import { MemoryObservationIndex } from "./memoryObservationIndex.js";

export interface PolicyMergerDeps {
  /** Factory so every merge starts from an empty index. */
  createIndex?: () => ObservationIndex;
}

/**
 * Applies a declared merge policy to a corpus's partial tables.
 *
 * Two phases:
 * - validate the policy against the table tags, then index every record
 *   (tag and count checks happen here, before anything is combined)
 * - resolve each identity's per-source counts into one count
 */
export class PolicyMerger implements Merger {
  private readonly createIndex: () => ObservationIndex;

  constructor(deps: PolicyMergerDeps = {}) {
    this.createIndex = deps.createIndex ?? (() => new MemoryObservationIndex());
  }

  merge(policy: MergePolicy, tables: readonly SourceTable[]): UnifiedCounts {
    validatePolicy(
      policy,
      tables.map((t) => t.source),
    );

    const index = this.createIndex();
    for (const table of tables) {
      for (const record of table.records) {
        if (record.source !== table.source) {
          throw new InvalidPolicyConfigurationError(
            `record for "${record.identity.surface}" is tagged "${record.source}" but belongs to table "${table.source}"`,
          );
        }
        if (!Number.isSafeInteger(record.count) || record.count < 0) {
          throw new NegativeCountError(record.source, record.identity.surface, record.count);
        }
        index.add(record);
      }
    }

    const resolve = resolver(policy);
    const out: UnifiedCounts = new Map();
    for (const [key, obs] of index.entries()) {
      out.set(key, { identity: obs.identity, count: resolve(obs.bySource) });
    }
    return out;
  }
}

type Resolver = (bySource: Map<SourceTag, number>) => number;

function resolver(policy: MergePolicy): Resolver {
  switch (policy.mode) {
    case "ADDITIVE":
    case "SINGLE":
      // SINGLE has one source after validation, so the sum is the sole count.
      return sumCounts;
    case "EXCLUSIVE_PREFERRED": {
      const priority = policy.priority;
      return (bySource) => {
        for (const tag of priority) {
          const count = bySource.get(tag);
          if (count !== undefined) return count;
        }
        // unreachable: every tag was checked against the priority order
        throw new InvalidPolicyConfigurationError(`no prioritized source among [${[...bySource.keys()].join(", ")}]`);
      };
    }
  }
}

function sumCounts(bySource: Map<SourceTag, number>): number {
  let total = 0;
  for (const c of bySource.values()) total += c;
  return total;
}
