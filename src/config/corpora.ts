import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import type { DictionaryMetadata } from "../archive/format.js";
import { FreqDictError, InvalidConfigurationError, type FieldError } from "../core/errors.js";
import { isMergeMode, validatePolicy, type MergePolicy } from "../core/policy.js";
import { DEFAULT_RANK_CAP } from "../core/ranker.js";
import type { ColumnLayout } from "../ingest/adapter.js";
import type { TableEncoding, TableLayout } from "../ingest/table.js";
import { asBoolean, asInt, asNonEmptyString, asString, asStringArray, isRecord, pushErr } from "../validation.js";

export interface SourceConfig {
  tag: string;
  /** Default input path, relative to the working directory. */
  file: string;
  layout: TableLayout;
  columns: ColumnLayout;
}

export interface CorpusConfig {
  id: string;
  metadata: DictionaryMetadata;
  output: string;
  cap: number;
  useReading: boolean;
  policy: MergePolicy;
  sources: SourceConfig[];
}

export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL("../../config/corpora.json", import.meta.url));

const ENCODINGS: readonly TableEncoding[] = ["utf-8", "utf-16le"];

export async function loadCorpusConfig(path: string = DEFAULT_CONFIG_PATH): Promise<CorpusConfig[]> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (e) {
    throw new InvalidConfigurationError(`cannot read ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (e) {
    throw new InvalidConfigurationError(`${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseCorpusConfig(value);
}

/** Validates the whole file and reports every problem at once. */
export function parseCorpusConfig(value: unknown): CorpusConfig[] {
  const errors: FieldError[] = [];
  if (!isRecord(value) || !Array.isArray(value.corpora)) {
    throw new InvalidConfigurationError("invalid corpus configuration", [{ path: "$.corpora", message: "must be an array" }]);
  }

  const corpora: CorpusConfig[] = [];
  const ids = new Set<string>();
  value.corpora.forEach((item: unknown, i: number) => {
    const corpus = parseCorpus(item, `$.corpora[${i}]`, errors);
    if (!corpus) return;
    if (ids.has(corpus.id)) {
      pushErr(errors, `$.corpora[${i}].id`, `duplicate corpus id "${corpus.id}"`);
      return;
    }
    ids.add(corpus.id);
    corpora.push(corpus);
  });

  if (errors.length) throw new InvalidConfigurationError("invalid corpus configuration", errors);
  return corpora;
}

export function findCorpus(corpora: readonly CorpusConfig[], id: string): CorpusConfig | undefined {
  return corpora.find((c) => c.id === id);
}

function parseCorpus(v: unknown, path: string, errors: FieldError[]): CorpusConfig | undefined {
  if (!isRecord(v)) {
    pushErr(errors, path, "must be an object");
    return undefined;
  }
  const before = errors.length;

  const id = asNonEmptyString(v.id);
  if (!id) pushErr(errors, `${path}.id`, "must be a non-empty string");
  const title = asNonEmptyString(v.title);
  if (!title) pushErr(errors, `${path}.title`, "must be a non-empty string");
  const revision = asNonEmptyString(v.revision);
  if (!revision) pushErr(errors, `${path}.revision`, "must be a non-empty string");
  const output = asNonEmptyString(v.output);
  if (!output) pushErr(errors, `${path}.output`, "must be a non-empty string");

  const metadata: DictionaryMetadata = { title: title ?? "", revision: revision ?? "" };
  for (const field of ["author", "url", "description", "attribution"] as const) {
    if (v[field] === undefined) continue;
    const s = asString(v[field]);
    if (s === undefined) pushErr(errors, `${path}.${field}`, "must be a string");
    else if (s) metadata[field] = s;
  }

  const cap = v.cap === undefined ? DEFAULT_RANK_CAP : asInt(v.cap);
  if (cap === undefined || cap <= 0) pushErr(errors, `${path}.cap`, "must be a positive integer");

  let useReading = true;
  if (v.identity !== undefined) {
    const flag = isRecord(v.identity) ? asBoolean(v.identity.useReading) : undefined;
    if (flag === undefined) pushErr(errors, `${path}.identity.useReading`, "must be a boolean");
    else useReading = flag;
  }

  const sources: SourceConfig[] = [];
  if (!Array.isArray(v.sources) || v.sources.length === 0) {
    pushErr(errors, `${path}.sources`, "must be a non-empty array");
  } else {
    v.sources.forEach((s: unknown, i: number) => {
      const source = parseSource(s, `${path}.sources[${i}]`, errors);
      if (source) sources.push(source);
    });
    const tags = sources.map((s) => s.tag);
    if (new Set(tags).size !== tags.length) pushErr(errors, `${path}.sources`, "source tags must be unique");
  }

  const policy = parsePolicy(v.policy, `${path}.policy`, errors);
  if (policy && sources.length) {
    try {
      validatePolicy(
        policy,
        sources.map((s) => s.tag),
        true,
      );
    } catch (e) {
      if (!(e instanceof FreqDictError)) throw e;
      pushErr(errors, `${path}.policy`, e.message);
    }
  }

  if (errors.length > before || !id || !output || !policy || cap === undefined) return undefined;
  return { id, metadata, output, cap, useReading, policy, sources };
}

function parsePolicy(v: unknown, path: string, errors: FieldError[]): MergePolicy | undefined {
  if (!isRecord(v) || !isMergeMode(v.mode)) {
    pushErr(errors, `${path}.mode`, "must be one of: ADDITIVE, EXCLUSIVE_PREFERRED, SINGLE");
    return undefined;
  }
  switch (v.mode) {
    case "ADDITIVE":
      return { mode: "ADDITIVE" };
    case "SINGLE":
      return { mode: "SINGLE" };
    case "EXCLUSIVE_PREFERRED": {
      const priority = asStringArray(v.priority);
      if (!priority || priority.length === 0) {
        pushErr(errors, `${path}.priority`, "must be a non-empty array of source tags");
        return undefined;
      }
      return { mode: "EXCLUSIVE_PREFERRED", priority };
    }
  }
}

function parseSource(v: unknown, path: string, errors: FieldError[]): SourceConfig | undefined {
  if (!isRecord(v)) {
    pushErr(errors, path, "must be an object");
    return undefined;
  }
  const before = errors.length;

  const tag = asNonEmptyString(v.tag);
  if (!tag) pushErr(errors, `${path}.tag`, "must be a non-empty string");
  const file = asNonEmptyString(v.file);
  if (!file) pushErr(errors, `${path}.file`, "must be a non-empty string");

  const layout: TableLayout = {};
  if (v.separator !== undefined) {
    const sep = asNonEmptyString(v.separator);
    if (!sep) pushErr(errors, `${path}.separator`, "must be a non-empty string");
    else layout.separator = sep;
  }
  if (v.skipLines !== undefined) {
    const n = asInt(v.skipLines);
    if (n === undefined || n < 0) pushErr(errors, `${path}.skipLines`, "must be a non-negative integer");
    else layout.skipLines = n;
  }
  if (v.encoding !== undefined) {
    const enc = ENCODINGS.find((e) => e === v.encoding);
    if (!enc) pushErr(errors, `${path}.encoding`, `must be one of: ${ENCODINGS.join(", ")}`);
    else layout.encoding = enc;
  }

  const columns = parseColumns(v.columns, `${path}.columns`, errors);

  if (errors.length > before || !tag || !file || !columns) return undefined;
  return { tag, file, layout, columns };
}

function parseColumns(v: unknown, path: string, errors: FieldError[]): ColumnLayout | undefined {
  if (!isRecord(v)) {
    pushErr(errors, path, "must be an object");
    return undefined;
  }
  const index = (key: string): number | undefined => {
    const n = asInt(v[key]);
    if (n === undefined || n < 0) pushErr(errors, `${path}.${key}`, "must be a non-negative integer");
    return n !== undefined && n >= 0 ? n : undefined;
  };

  const text = index("text");
  const count = index("count");
  const reading = v.reading === undefined ? undefined : index("reading");
  if (text === undefined || count === undefined) return undefined;
  if (v.reading !== undefined && reading === undefined) return undefined;
  return reading === undefined ? { text, count } : { text, reading, count };
}
