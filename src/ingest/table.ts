import { open } from "node:fs/promises";
import { createInterface } from "node:readline";

export type TableEncoding = "utf-8" | "utf-16le";

export interface TableLayout {
  /** Field separator. Default: tab. */
  separator?: string;
  /** Header lines to skip. Default: 1. */
  skipLines?: number;
  encoding?: TableEncoding;
}

export interface TableRow {
  /** 1-based line number in the source file. */
  line: number;
  fields: string[];
}

const BOM = "\uFEFF";

function toRow(raw: string, line: number, layout: TableLayout): TableRow | undefined {
  if (line <= (layout.skipLines ?? 1)) return undefined;
  const text = line === 1 && raw.startsWith(BOM) ? raw.slice(BOM.length) : raw;
  if (!text) return undefined;
  return { line, fields: text.split(layout.separator ?? "\t") };
}

export function* parseTable(text: string, layout: TableLayout = {}): Iterable<TableRow> {
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const row = toRow(lines[i] ?? "", i + 1, layout);
    if (row) yield row;
  }
}

/** Streams rows line by line; the file is never held in memory whole. */
export async function* readTable(path: string, layout: TableLayout = {}): AsyncIterable<TableRow> {
  const encoding = layout.encoding === "utf-16le" ? "utf16le" : "utf8";
  const file = await open(path);
  const input = file.createReadStream({ encoding });
  const lines = createInterface({ input, crlfDelay: Infinity });

  try {
    let line = 0;
    for await (const raw of lines) {
      const row = toRow(raw, ++line, layout);
      if (row) yield row;
    }
  } finally {
    lines.close();
    input.destroy();
  }
}
