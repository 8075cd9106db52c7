import { beforeAll, describe, expect, it } from "vitest";
import type { DictionaryMetadata } from "../../archive/format.js";
import { DEFAULT_CONFIG_PATH, loadCorpusConfig, type CorpusConfig } from "../../config/corpora.js";
import type { ExportEntry } from "../../core/types.js";
import type { TableRow } from "../../ingest/table.js";
import type { PipelineIO } from "../../pipeline/buildCorpus.js";
import { parseArgs, USAGE, UsageError } from "../args.js";
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, main, planBuild } from "../commands.js";

function buildCommand(argv: string[]) {
  const { command } = parseArgs(argv);
  if (command.kind !== "build") throw new Error(`not a build command: ${command.kind}`);
  return command;
}

/** A CHJ-shaped row: reading, text, count in column 16. */
const chjRow = (reading: string, text: string, count: number): string[] => {
  const fields = Array.from({ length: 17 }, () => "");
  fields[0] = reading;
  fields[1] = text;
  fields[16] = String(count);
  return fields;
};

function harness(tables: Record<string, string[][]>) {
  const out: string[] = [];
  const logs: string[] = [];
  const written: Array<{ path: string; meta: DictionaryMetadata; entries: readonly ExportEntry[] }> = [];
  const io: PipelineIO = {
    match: async () => [],
    async *readTable(path) {
      const rows = tables[path];
      if (!rows) throw new Error(`ENOENT: ${path}`);
      yield* rows.map((fields, i): TableRow => ({ line: i + 2, fields }));
    },
    writeArchive: async (path, meta, entries) => {
      written.push({ path, meta, entries });
      return 1;
    },
  };
  const ctx = {
    configPath: DEFAULT_CONFIG_PATH,
    logLevel: "error" as const,
    logSink: (line: string) => logs.push(line),
    print: (line: string) => out.push(line),
    io,
  };
  return { out, logs, written, run: (argv: string[]) => main(argv, ctx) };
}

describe("planBuild", () => {
  let corpora: CorpusConfig[];

  beforeAll(async () => {
    corpora = await loadCorpusConfig();
  });

  it("binds positional paths to sources in declared order", () => {
    const { targets, files } = planBuild(buildCommand(["build", "chj-premodern", "suw.csv", "luw.csv"]), corpora);
    expect(targets.map((c) => c.id)).toEqual(["chj-premodern"]);
    expect(files).toEqual(
      new Map([
        ["SUW", "suw.csv"],
        ["LUW", "luw.csv"],
      ]),
    );
  });

  it("combines positional paths with --file", () => {
    const { files } = planBuild(buildCommand(["build", "chj-premodern", "suw.csv", "--file", "LUW=l.csv"]), corpora);
    expect(files).toEqual(
      new Map([
        ["LUW", "l.csv"],
        ["SUW", "suw.csv"],
      ]),
    );
  });

  it("selects several corpora or all of them", () => {
    expect(planBuild(buildCommand(["build", "nwjc", "csj"]), corpora).targets.map((c) => c.id)).toEqual(["nwjc", "csj"]);
    expect(planBuild(buildCommand(["build", "--all"]), corpora).targets).toHaveLength(5);
  });

  it.each([
    [["build", "ghost"], "unknown corpus: ghost"],
    [["build", "nwjc", "csj", "a.tsv"], "input paths can only be given when building a single corpus"],
    [["build", "nwjc", "a.tsv", "b.tsv"], "corpus nwjc has 1 source table(s), got 2 paths"],
    [["build", "nwjc", "a.tsv", "--file", "SUW=b.tsv"], "source SUW given both by position and by --file"],
  ])("rejects %j", (argv, message) => {
    expect(() => planBuild(buildCommand(argv), corpora)).toThrow(new UsageError(message));
  });
});

describe("main", () => {
  it("prints usage and exits 2 on a usage error", async () => {
    const h = harness({});
    expect(await h.run(["publish"])).toBe(EXIT_USAGE);
    expect(h.out).toEqual([USAGE]);
    expect(h.logs).toEqual(["[freqdict] ERROR unknown command: publish"]);
  });

  it("lets --log-level override the context's level", async () => {
    const quiet = harness({ "list.tsv": [["", "", "ホン", "", "", "", "3"]] });
    expect(await quiet.run(["build", "bccwj", "list.tsv"])).toBe(EXIT_OK);
    expect(quiet.logs).toEqual([]);

    const h = harness({ "list.tsv": [["", "", "ホン", "", "", "", "3"]] });
    expect(await h.run(["--log-level", "debug", "build", "bccwj", "list.tsv"])).toBe(EXIT_OK);
    expect(h.logs).toContain("[freqdict] DEBUG [bccwj] SUW read list.tsv: 1 distinct term(s)");
    expect(h.logs).toContain("[freqdict] INFO [bccwj] wrote 1 entries to BCCWJ.zip (1 bytes)");
  });

  it("lists the configured corpora", async () => {
    const h = harness({});
    expect(await h.run(["list"])).toBe(EXIT_OK);
    expect(h.out[0]).toBe("nwjc\tウェブ\tSINGLE\tSUW");
    expect(h.out[4]).toBe("chj-premodern\t奈良〜江戸\tEXCLUSIVE_PREFERRED\tSUW,LUW");
  });

  it("builds a corpus from a positional path", async () => {
    const h = harness({ "list.tsv": [["", "", "ホン", "", "", "", "3"]] });
    expect(await h.run(["build", "bccwj", "list.tsv"])).toBe(EXIT_OK);
    expect(h.out).toEqual(["bccwj\tBCCWJ.zip\t1"]);
    expect(h.written[0]?.entries).toEqual([{ surface: "ホン", reading: "ホン", rank: 1 }]);
  });

  it("exits 1 when a corpus fails and still builds the others", async () => {
    const h = harness({ "BCCWJ_frequencylist_suw_ver1_1.tsv": [["", "", "ホン", "", "", "", "3"]] });
    expect(await h.run(["build", "nwjc", "bccwj"])).toBe(EXIT_FAILURE);
    expect(h.out).toEqual(["bccwj\tBCCWJ.zip\t1"]);
    expect(h.logs).toHaveLength(1);
    expect(h.logs[0]).toMatch(/^\[freqdict\] ERROR corpus nwjc failed at configure: pattern NWJC_frequencylist_suw_\*/);
  });

  it("exits 2 when a source is given twice", async () => {
    const h = harness({});
    expect(await h.run(["build", "bccwj", "list.tsv", "--file", "SUW=other.tsv"])).toBe(EXIT_USAGE);
    expect(h.logs).toEqual(["[freqdict] ERROR source SUW given both by position and by --file"]);
  });

  it("reports vocabulary overlap of two partial tables", async () => {
    const h = harness({
      "nonmag.csv": [chjRow("ホン", "本", 5), chjRow("イエ", "家", 3)],
      "mag.csv": [chjRow("ホン", "本", 5), chjRow("キ", "木", 1)],
    });
    expect(await h.run(["overlap", "chj-modern", "nonmag.csv", "mag.csv"])).toBe(EXIT_OK);
    expect(h.out).toEqual(["shared\t1", "union\t3", "ratio\t0.3333", "differing\t0"]);
  });

  it("exits 1 on overlap for a single-table corpus", async () => {
    const h = harness({});
    expect(await h.run(["overlap", "nwjc", "a.tsv", "b.tsv"])).toBe(EXIT_FAILURE);
    expect(h.logs).toEqual(["[freqdict] ERROR corpus nwjc declares fewer than two source tables"]);
  });
});
