import { InvalidPolicyConfigurationError } from "./errors.js";
import type { SourceTag } from "./types.js";

/** Partial tables are disjoint samples of one population: counts are summed. */
export interface AdditivePolicy {
  mode: "ADDITIVE";
}

/**
 * Partial tables overlap in coverage: for each term only the count of the
 * highest-priority table that observed it is kept.
 */
export interface ExclusivePreferredPolicy {
  mode: "EXCLUSIVE_PREFERRED";
  /** Highest priority first. */
  priority: readonly SourceTag[];
}

/** Exactly one partial table. */
export interface SinglePolicy {
  mode: "SINGLE";
}

export type MergePolicy = AdditivePolicy | ExclusivePreferredPolicy | SinglePolicy;

export type MergeMode = MergePolicy["mode"];

export const MERGE_MODES: readonly MergeMode[] = ["ADDITIVE", "EXCLUSIVE_PREFERRED", "SINGLE"];

export function isMergeMode(v: unknown): v is MergeMode {
  return typeof v === "string" && (MERGE_MODES as readonly string[]).includes(v);
}

/**
 * Checks a policy against the source tags it will be applied to.
 *
 * Used twice: at configuration time with the declared sources, and by the
 * merger with the tags actually present in the data.
 * - EXCLUSIVE_PREFERRED needs a non-empty priority without duplicates that
 *   names every tag in `tags`; with `exhaustive` it must name nothing else.
 * - SINGLE accepts at most one distinct tag.
 */
export function validatePolicy(policy: MergePolicy, tags: Iterable<SourceTag>, exhaustive = false): void {
  const distinct = new Set(tags);

  switch (policy.mode) {
    case "ADDITIVE":
      return;
    case "SINGLE":
      if (distinct.size > 1) {
        throw new InvalidPolicyConfigurationError(
          `SINGLE policy expects one source table, got ${distinct.size}: ${[...distinct].join(", ")}`,
        );
      }
      return;
    case "EXCLUSIVE_PREFERRED": {
      const priority = policy.priority;
      if (!priority || priority.length === 0) {
        throw new InvalidPolicyConfigurationError("EXCLUSIVE_PREFERRED policy requires a priority order");
      }
      const declared = new Set(priority);
      if (declared.size !== priority.length) {
        throw new InvalidPolicyConfigurationError(`priority order lists a source more than once: ${priority.join(", ")}`);
      }
      for (const tag of distinct) {
        if (!declared.has(tag)) {
          throw new InvalidPolicyConfigurationError(`source "${tag}" is not in the priority order [${priority.join(", ")}]`);
        }
      }
      if (exhaustive) {
        for (const tag of priority) {
          if (!distinct.has(tag)) {
            throw new InvalidPolicyConfigurationError(`priority order names unknown source "${tag}"`);
          }
        }
      }
      return;
    }
  }
}
