import { isAbsolute, join } from "node:path";
import { glob, hasMagic } from "glob";

import { writeArchive as writeArchiveFile } from "../archive/writer.js";
import type { DictionaryMetadata } from "../archive/format.js";
import type { CorpusConfig, SourceConfig } from "../config/corpora.js";
import { createFrequencyEngine, type FrequencyEngine } from "../core/engine.js";
import { CorpusBuildError, InvalidCapError, InvalidConfigurationError, type PipelineStage } from "../core/errors.js";
import { toExportEntries } from "../core/export.js";
import { frequencyRecord, termKey } from "../core/identity.js";
import { validatePolicy } from "../core/policy.js";
import type { ExportEntry, FrequencyRecord, SourceTable, SourceTag, TermKey } from "../core/types.js";
import { toFrequencyRecord } from "../ingest/adapter.js";
import { readTable, type TableLayout, type TableRow } from "../ingest/table.js";
import { silentLogger, type Logger } from "../logger.js";

export interface PipelineIO {
  /** Paths matching a glob pattern, relative to `cwd`. */
  match(pattern: string, cwd: string): Promise<string[]>;
  readTable(path: string, layout: TableLayout): AsyncIterable<TableRow>;
  /** Resolves to the number of bytes written. */
  writeArchive(path: string, meta: DictionaryMetadata, entries: readonly ExportEntry[]): Promise<number>;
}

export const fileIO: PipelineIO = {
  match: (pattern, cwd) => glob(pattern, { cwd, nodir: true }),
  readTable,
  writeArchive: writeArchiveFile,
};

export interface BuildCorpusOptions {
  /** Input path per source tag; missing tags fall back to the configured file. */
  files?: ReadonlyMap<SourceTag, string>;
  /** Overrides the corpus cap. */
  cap?: number;
  /** Base directory of configured source files. Default: working directory. */
  inputDir?: string;
  outDir?: string;
  engine?: FrequencyEngine;
  io?: PipelineIO;
  logger?: Logger;
}

export interface BuildResult {
  corpus: string;
  output: string;
  entries: number;
  vocabulary: number;
  bytes: number;
}

/**
 * Runs one corpus end to end: ingest, merge, rank, package.
 * Any failure is rethrown as a CorpusBuildError naming the stage; nothing is
 * written unless every earlier stage succeeded.
 */
export async function buildCorpus(corpus: CorpusConfig, options: BuildCorpusOptions = {}): Promise<BuildResult> {
  const engine = options.engine ?? createFrequencyEngine();
  const io = options.io ?? fileIO;
  const log = (options.logger ?? silentLogger).child(corpus.id);

  const plan = await stage(corpus, "configure", async () => {
    const cap = options.cap ?? corpus.cap;
    if (!Number.isSafeInteger(cap) || cap <= 0) throw new InvalidCapError(cap);
    validatePolicy(
      corpus.policy,
      corpus.sources.map((s) => s.tag),
      true,
    );
    const known = new Set(corpus.sources.map((s) => s.tag));
    for (const tag of options.files?.keys() ?? []) {
      if (!known.has(tag)) throw new InvalidConfigurationError(`corpus ${corpus.id} has no source "${tag}"`);
    }
    const inputs: Array<{ source: SourceConfig; path: string }> = [];
    for (const source of corpus.sources) {
      const explicit = options.files?.get(source.tag);
      const path = explicit ?? (await resolveInput(io, source.file, options.inputDir ?? "."));
      inputs.push({ source, path });
    }
    return { cap, inputs };
  });

  const tables = await stage(corpus, "ingest", async () => {
    const out: SourceTable[] = [];
    for (const { source, path } of plan.inputs) {
      const records = await loadSource(io, source, path, corpus.useReading);
      log.debug(`${source.tag} read ${path}: ${records.length} distinct term(s)`);
      out.push({ source: source.tag, records });
    }
    return out;
  });

  const counts = await stage(corpus, "merge", () => engine.merge(corpus.policy, tables));
  log.info(`merged ${tables.length} table(s) into ${counts.size} terms (${corpus.policy.mode})`);

  const ranked = await stage(corpus, "rank", () => engine.rank(counts, plan.cap));

  const output = options.outDir ? join(options.outDir, corpus.output) : corpus.output;
  const bytes = await stage(corpus, "package", () => io.writeArchive(output, corpus.metadata, toExportEntries(ranked)));
  log.info(`wrote ${ranked.length} entries to ${output} (${bytes} bytes)`);

  return { corpus: corpus.id, output, entries: ranked.length, vocabulary: counts.size, bytes };
}

export type SettledBuild =
  | { corpus: string; ok: true; result: BuildResult }
  | { corpus: string; ok: false; error: CorpusBuildError };

/** Builds corpora concurrently; one failure does not affect the others. */
export async function buildCorpora(
  corpora: readonly CorpusConfig[],
  options: (corpus: CorpusConfig) => BuildCorpusOptions = () => ({}),
): Promise<SettledBuild[]> {
  const settled = await Promise.allSettled(corpora.map((c) => buildCorpus(c, options(c))));
  return settled.map((s, i): SettledBuild => {
    const corpus = corpora[i]!.id;
    if (s.status === "fulfilled") return { corpus, ok: true, result: s.value };
    const error = s.reason instanceof CorpusBuildError ? s.reason : new CorpusBuildError(corpus, "configure", s.reason);
    return { corpus, ok: false, error };
  });
}

/**
 * Streams one partial table and folds repeated rows per identity as they
 * arrive, so memory grows with the vocabulary rather than the file.
 * Negative counts are kept unfolded for the merger to reject.
 */
export async function loadSource(io: PipelineIO, source: SourceConfig, path: string, useReading: boolean): Promise<FrequencyRecord[]> {
  const options = { file: path, source: source.tag, columns: source.columns, useReading };
  const totals = new Map<TermKey, FrequencyRecord>();
  const negative: FrequencyRecord[] = [];

  for await (const row of io.readTable(path, source.layout)) {
    const record = toFrequencyRecord(row, options);
    if (!record) continue;
    if (record.count < 0) {
      negative.push(record);
      continue;
    }
    const key = termKey(record.identity);
    const seen = totals.get(key);
    totals.set(key, seen ? frequencyRecord(seen.identity, seen.count + record.count, seen.source) : record);
  }
  return [...negative, ...totals.values()];
}

/**
 * Configured file names may be glob patterns (source releases rename their
 * files); a pattern must match exactly one file.
 */
export async function resolveInput(io: PipelineIO, file: string, inputDir: string): Promise<string> {
  if (!hasMagic(file)) return isAbsolute(file) ? file : join(inputDir, file);
  const matches = await io.match(file, inputDir);
  if (matches.length !== 1) {
    throw new InvalidConfigurationError(
      `pattern ${file} matched ${matches.length} files in ${inputDir}${matches.length ? `: ${matches.join(", ")}` : ""}`,
    );
  }
  return join(inputDir, matches[0]!);
}

async function stage<T>(corpus: CorpusConfig, name: PipelineStage, fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    throw new CorpusBuildError(corpus.id, name, e);
  }
}
