import type { FrequencyRecord, SourceTag, TermIdentity, TermKey } from "./types.js";

export function termIdentity(surface: string, reading?: string): TermIdentity {
  return Object.freeze(reading === undefined ? { surface } : { surface, reading });
}

/** Injective over identities: an absent reading encodes as a one-element array. */
export function termKey(identity: TermIdentity): TermKey {
  return JSON.stringify(identity.reading === undefined ? [identity.surface] : [identity.surface, identity.reading]);
}

export function sameTerm(a: TermIdentity, b: TermIdentity): boolean {
  return a.surface === b.surface && a.reading === b.reading;
}

export function frequencyRecord(identity: TermIdentity, count: number, source: SourceTag): FrequencyRecord {
  return Object.freeze({ identity, count, source });
}

/** Drops the reading when a corpus does not use it for identity. */
export function withoutReading(identity: TermIdentity): TermIdentity {
  return identity.reading === undefined ? identity : termIdentity(identity.surface);
}

/**
 * Total order over identities: surface ascending by code unit, then reading
 * ascending with an absent reading first.
 */
export function compareIdentity(a: TermIdentity, b: TermIdentity): number {
  if (sameTerm(a, b)) return 0;
  if (a.surface !== b.surface) return a.surface < b.surface ? -1 : 1;
  if (a.reading === undefined) return -1;
  if (b.reading === undefined) return 1;
  return a.reading < b.reading ? -1 : 1;
}
