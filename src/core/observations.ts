import type { FrequencyRecord, SourceTag, TermIdentity, TermKey } from "./types.js";

export interface Observation {
  identity: TermIdentity;
  /** source -> count observed by that source, repeated rows already summed */
  bySource: Map<SourceTag, number>;
}

/**
 * Groups records by term identity.
 *
 * Contract notes:
 * - grouping uses exact identity equality only
 * - several records for the same identity and source add up
 */
export interface ObservationIndex {
  add(record: FrequencyRecord): void;
  get(key: TermKey): Observation | undefined;
  entries(): IterableIterator<[TermKey, Observation]>;
  /** distinct sources seen so far */
  sources(): Set<SourceTag>;
  size(): number;
}
