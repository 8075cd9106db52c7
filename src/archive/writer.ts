import { writeFile } from "node:fs/promises";
import JSZip from "jszip";

import type { ExportEntry } from "../core/types.js";
import {
  INDEX_FILE,
  MAX_TERM_BANK_SIZE,
  termMetaBankName,
  type DictionaryIndex,
  type DictionaryMetadata,
  type TermMetaEntry,
} from "./format.js";

export function buildIndex(meta: DictionaryMetadata): DictionaryIndex {
  const index: DictionaryIndex = {
    title: meta.title,
    format: 3,
    revision: meta.revision,
    sequenced: false,
    frequencyMode: "rank-based",
  };
  // optional fields only when set
  if (meta.author) index.author = meta.author;
  if (meta.url) index.url = meta.url;
  if (meta.description) index.description = meta.description;
  if (meta.attribution) index.attribution = meta.attribution;
  return index;
}

export function toTermMetaEntry(entry: ExportEntry): TermMetaEntry {
  return entry.reading
    ? [entry.surface, "freq", { frequency: entry.rank, reading: entry.reading }]
    : [entry.surface, "freq", entry.rank];
}

/** Splits entries, in rank order, into banks of at most `size`. */
export function toTermMetaBanks(entries: readonly ExportEntry[], size = MAX_TERM_BANK_SIZE): TermMetaEntry[][] {
  const banks: TermMetaEntry[][] = [];
  for (let i = 0; i < entries.length; i += size) {
    banks.push(entries.slice(i, i + size).map(toTermMetaEntry));
  }
  return banks;
}

export function createArchive(meta: DictionaryMetadata, entries: readonly ExportEntry[]): JSZip {
  const zip = new JSZip();
  zip.file(INDEX_FILE, JSON.stringify(buildIndex(meta)));
  toTermMetaBanks(entries).forEach((bank, i) => {
    zip.file(termMetaBankName(i + 1), JSON.stringify(bank));
  });
  return zip;
}

export function packArchive(meta: DictionaryMetadata, entries: readonly ExportEntry[]): Promise<Buffer> {
  return createArchive(meta, entries).generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
}

/** Writes the archive and resolves to its size in bytes. */
export async function writeArchive(path: string, meta: DictionaryMetadata, entries: readonly ExportEntry[]): Promise<number> {
  const data = await packArchive(meta, entries);
  await writeFile(path, data);
  return data.byteLength;
}
