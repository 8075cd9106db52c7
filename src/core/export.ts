import type { ExportEntry, RankedEntry } from "./types.js";

/** Strips counts: only surface, reading and rank cross the export boundary. */
export function toExportEntries(ranked: readonly RankedEntry[]): ExportEntry[] {
  return ranked.map(({ identity, rank }) =>
    identity.reading === undefined ? { surface: identity.surface, rank } : { surface: identity.surface, reading: identity.reading, rank },
  );
}
