import { readFile } from "node:fs/promises";
import JSZip from "jszip";

import { ArchiveFormatError } from "../core/errors.js";
import type { ExportEntry } from "../core/types.js";
import { asInt, asNonEmptyString, asString, isRecord } from "../validation.js";
import { INDEX_FILE, TERM_META_BANK, type DictionaryMetadata } from "./format.js";

export interface ArchiveContents {
  metadata: DictionaryMetadata;
  /** Frequency entries in bank order. */
  entries: ExportEntry[];
}

export interface ReadArchiveOptions {
  maxEntries?: number;
}

export async function readArchiveFile(path: string, options?: ReadArchiveOptions): Promise<ArchiveContents> {
  return readArchive(await readFile(path), options);
}

/**
 * Reads a rank-based frequency dictionary.
 *
 * Accepted payloads: `12`, `{ value: 12, displayValue? }` and
 * `{ reading, frequency }` where frequency is either of the former.
 * Rows whose mode is not "freq" are skipped.
 */
export async function readArchive(data: Uint8Array, options: ReadArchiveOptions = {}): Promise<ArchiveContents> {
  const maxEntries = options.maxEntries ?? Infinity;

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (e) {
    throw new ArchiveFormatError(`not a zip archive: ${e instanceof Error ? e.message : String(e)}`);
  }

  const indexFile = zip.file(INDEX_FILE);
  if (!indexFile) throw new ArchiveFormatError(`missing ${INDEX_FILE}`);
  const metadata = parseMetadata(parseJson(INDEX_FILE, await indexFile.async("string")));

  const banks = zip
    .file(TERM_META_BANK)
    .map((f) => ({ file: f, n: bankNumber(f.name) }))
    .sort((a, b) => a.n - b.n);

  const entries: ExportEntry[] = [];
  for (const { file } of banks) {
    const bank = parseJson(file.name, await file.async("string"));
    if (!Array.isArray(bank)) throw new ArchiveFormatError(`${file.name}: expected an array`);

    for (let i = 0; i < bank.length; i++) {
      if (entries.length >= maxEntries) return { metadata, entries };
      const entry = parseEntry(bank[i]);
      if (entry === null) continue;
      if (entry instanceof Error) throw new ArchiveFormatError(`${file.name}[${i}]: ${entry.message}`);
      entries.push(entry);
    }
  }
  return { metadata, entries };
}

function bankNumber(name: string): number {
  const m = TERM_META_BANK.exec(name);
  return m ? Number(m[1]) : Number.MAX_SAFE_INTEGER;
}

function parseJson(name: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new ArchiveFormatError(`${name}: invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
}

function parseMetadata(v: unknown): DictionaryMetadata {
  if (!isRecord(v)) throw new ArchiveFormatError(`${INDEX_FILE}: expected an object`);
  const title = asString(v.title);
  const revision = asString(v.revision);
  if (title === undefined || revision === undefined) {
    throw new ArchiveFormatError(`${INDEX_FILE}: title and revision are required`);
  }

  const meta: DictionaryMetadata = { title, revision };
  const author = asNonEmptyString(v.author);
  const url = asNonEmptyString(v.url);
  const description = asNonEmptyString(v.description);
  const attribution = asNonEmptyString(v.attribution);
  if (author) meta.author = author;
  if (url) meta.url = url;
  if (description) meta.description = description;
  if (attribution) meta.attribution = attribution;
  return meta;
}

/** null: not a frequency row. Error: malformed frequency row. */
function parseEntry(v: unknown): ExportEntry | Error | null {
  if (!Array.isArray(v) || v.length < 3) return new Error("expected [term, mode, payload]");
  const term: unknown = v[0];
  const payload: unknown = v[2];
  if (v[1] !== "freq") return null;

  const surface = asNonEmptyString(term);
  if (!surface) return new Error("term must be a non-empty string");

  if (isRecord(payload) && "reading" in payload) {
    const reading = asNonEmptyString(payload.reading);
    const rank = rankOf(payload.frequency);
    if (!reading) return new Error("reading must be a non-empty string");
    if (rank === undefined) return new Error("frequency must be a positive integer");
    return { surface, reading, rank };
  }

  const rank = rankOf(payload);
  if (rank === undefined) return new Error("frequency must be a positive integer");
  return { surface, rank };
}

function rankOf(v: unknown): number | undefined {
  const n = isRecord(v) ? asInt(v.value) : asInt(v);
  return n !== undefined && n > 0 ? n : undefined;
}
