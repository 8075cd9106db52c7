import { readArchiveFile } from "../archive/reader.js";
import { writeArchive } from "../archive/writer.js";
import type { DictionaryMetadata } from "../archive/format.js";
import { InvalidCapError } from "../core/errors.js";
import { DEFAULT_RANK_CAP } from "../core/ranker.js";
import type { ExportEntry } from "../core/types.js";
import { silentLogger, type Logger } from "../logger.js";

export interface ConvertOptions {
  cap?: number;
  /** Replaces fields of the source archive's metadata. */
  metadata?: Partial<DictionaryMetadata>;
  logger?: Logger;
}

/**
 * Keeps the `cap` best-ranked entries and renumbers them 1..n.
 * Entries sharing a rank keep their archive order.
 */
export function recapEntries(entries: readonly ExportEntry[], cap: number = DEFAULT_RANK_CAP): ExportEntry[] {
  if (!Number.isSafeInteger(cap) || cap <= 0) throw new InvalidCapError(cap);
  return entries
    .map((e, i) => ({ e, i }))
    .sort((a, b) => a.e.rank - b.e.rank || a.i - b.i)
    .slice(0, cap)
    .map(({ e }, i) => ({ ...e, rank: i + 1 }));
}

/** Re-packages an existing rank-based archive under a new cap. */
export async function convertArchive(input: string, output: string, options: ConvertOptions = {}): Promise<number> {
  const log = options.logger ?? silentLogger;
  const { metadata, entries } = await readArchiveFile(input);
  const kept = recapEntries(entries, options.cap);
  const bytes = await writeArchive(output, { ...metadata, ...options.metadata }, kept);
  log.info(`converted ${input}: kept ${kept.length} of ${entries.length} entries, wrote ${output} (${bytes} bytes)`);
  return kept.length;
}
