import { MalformedRowError } from "../core/errors.js";
import { frequencyRecord, termIdentity, withoutReading } from "../core/identity.js";
import type { FrequencyRecord, SourceTag } from "../core/types.js";
import { classifyText, readingFor } from "./japanese.js";
import type { TableRow } from "./table.js";

/** Zero-based column indices of one partial table. */
export interface ColumnLayout {
  text: number;
  reading?: number;
  count: number;
}

export interface AdapterOptions {
  /** File name used in error messages. */
  file: string;
  source: SourceTag;
  columns: ColumnLayout;
  /** When false the reading is dropped from the identity. Default: true. */
  useReading?: boolean;
}

const INTEGER = /^-?\d+$/;

/**
 * Turns one raw table row into a frequency record.
 *
 * Rows whose text has neither kanji nor kana yield undefined. Negative counts
 * are passed through untouched; rejecting them is the merger's job.
 */
export function toFrequencyRecord(row: TableRow, options: AdapterOptions): FrequencyRecord | undefined {
  const { columns, source, file } = options;
  const width = Math.max(columns.text, columns.count, columns.reading ?? 0) + 1;

  if (row.fields.length < width) {
    throw new MalformedRowError(file, row.line, `expected at least ${width} columns, got ${row.fields.length}`);
  }
  const text = (row.fields[columns.text] ?? "").trim();
  if (classifyText(text) === "other") return undefined;

  const rawCount = (row.fields[columns.count] ?? "").trim();
  if (!INTEGER.test(rawCount)) {
    throw new MalformedRowError(file, row.line, `count "${rawCount}" is not an integer`);
  }

  const annotated = columns.reading === undefined ? undefined : row.fields[columns.reading]?.trim();
  const identity = termIdentity(text, readingFor(text, annotated));

  return frequencyRecord((options.useReading ?? true) ? identity : withoutReading(identity), Number.parseInt(rawCount, 10), source);
}

export function* toFrequencyRecords(rows: Iterable<TableRow>, options: AdapterOptions): Iterable<FrequencyRecord> {
  for (const row of rows) {
    const record = toFrequencyRecord(row, options);
    if (record) yield record;
  }
}
