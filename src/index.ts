export * from "./core/types.js";
export * from "./core/errors.js";
export * from "./core/identity.js";
export * from "./core/policy.js";
export type { Merger } from "./core/merger.js";
export type { Observation, ObservationIndex } from "./core/observations.js";
export { DEFAULT_RANK_CAP, type RankOptions, type Ranker } from "./core/ranker.js";
export type { Heap, TopKSelector } from "./core/heap.js";
export { toExportEntries } from "./core/export.js";
export { createFrequencyEngine, type EngineDeps, type FrequencyEngine } from "./core/engine.js";
export * from "./core/impl/index.js";

export { parseTable, readTable, type TableEncoding, type TableLayout, type TableRow } from "./ingest/table.js";
export { toFrequencyRecord, toFrequencyRecords, type AdapterOptions, type ColumnLayout } from "./ingest/adapter.js";
export { classifyText, readingFor, type TextKind } from "./ingest/japanese.js";

export * from "./archive/format.js";
export { buildIndex, createArchive, packArchive, toTermMetaBanks, toTermMetaEntry, writeArchive } from "./archive/writer.js";
export { readArchive, readArchiveFile, type ArchiveContents, type ReadArchiveOptions } from "./archive/reader.js";

export {
  DEFAULT_CONFIG_PATH,
  findCorpus,
  loadCorpusConfig,
  parseCorpusConfig,
  type CorpusConfig,
  type SourceConfig,
} from "./config/corpora.js";
export { readEnv, type Env } from "./config/env.js";
export { createLogger, isLogLevel, silentLogger, type LogLevel, type Logger, type LoggerOptions, type LogSink } from "./logger.js";

export {
  buildCorpora,
  buildCorpus,
  fileIO,
  loadSource,
  type BuildCorpusOptions,
  type BuildResult,
  type PipelineIO,
  type SettledBuild,
} from "./pipeline/buildCorpus.js";
export { computeOverlap, type OverlapReport } from "./pipeline/overlap.js";
export { convertArchive, recapEntries, type ConvertOptions } from "./pipeline/convert.js";
