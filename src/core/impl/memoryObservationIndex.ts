import { termKey } from "../identity.js";
import type { Observation, ObservationIndex } from "../observations.js";
import type { FrequencyRecord, SourceTag, TermKey } from "../types.js";

/**
 * Simple in-memory observation index.
 *
 * Data structure:
 * - identity key -> { identity, source -> count }
 *
 * Memory is O(distinct terms x sources that observed them).
 */
export class MemoryObservationIndex implements ObservationIndex {
  private readonly byKey = new Map<TermKey, Observation>();
  private readonly seenSources = new Set<SourceTag>();

  add(record: FrequencyRecord): void {
    this.seenSources.add(record.source);

    const key = termKey(record.identity);
    let obs = this.byKey.get(key);
    if (!obs) {
      obs = { identity: record.identity, bySource: new Map() };
      this.byKey.set(key, obs);
    }
    obs.bySource.set(record.source, (obs.bySource.get(record.source) ?? 0) + record.count);
  }

  get(key: TermKey): Observation | undefined {
    return this.byKey.get(key);
  }

  entries(): IterableIterator<[TermKey, Observation]> {
    return this.byKey.entries();
  }

  sources(): Set<SourceTag> {
    return new Set(this.seenSources);
  }

  size(): number {
    return this.byKey.size;
  }
}
