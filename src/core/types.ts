/** Shared core types used by module contracts. */

/** Tag naming the partial table a record came from, e.g. "SUW" or "LUW". */
export type SourceTag = string;

/** Composite grouping key derived from a {@link TermIdentity}. */
export type TermKey = string;

/**
 * The value used to recognize "the same term" across partial tables.
 * `reading` is absent when the corpus has no reliable reading for the term.
 */
export interface TermIdentity {
  readonly surface: string;
  readonly reading?: string;
}

/** One normalized observation handed over by the ingestion layer. */
export interface FrequencyRecord {
  readonly identity: TermIdentity;
  /** Non-negative integer occurrence count. */
  readonly count: number;
  readonly source: SourceTag;
}

/** All records observed in one partial table. */
export interface SourceTable {
  source: SourceTag;
  records: Iterable<FrequencyRecord>;
}

export interface UnifiedCount {
  identity: TermIdentity;
  count: number;
}

/** Merge output: one unified count per identity. */
export type UnifiedCounts = Map<TermKey, UnifiedCount>;

export interface RankedEntry {
  readonly identity: TermIdentity;
  readonly totalCount: number;
  /** 1-based dense rank. */
  readonly rank: number;
}

/** What the archive packager receives: counts are not exposed downstream. */
export interface ExportEntry {
  surface: string;
  reading?: string;
  rank: number;
}
