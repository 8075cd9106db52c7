import { isLogLevel, type LogLevel } from "../logger.js";

export interface GlobalOptions {
  configPath?: string;
  logLevel?: LogLevel;
}

export type Command =
  | { kind: "help" }
  | { kind: "list" }
  | {
      kind: "build";
      /** corpus ids followed by input paths; split once the config is known */
      positionals: string[];
      all: boolean;
      files: Map<string, string>;
      cap?: number;
      inputDir?: string;
      outDir?: string;
    }
  | { kind: "overlap"; corpus: string; paths: [string, string] }
  | { kind: "convert"; input: string; output: string; cap?: number; title?: string; revision?: string };

export interface ParsedArgs {
  command: Command;
  options: GlobalOptions;
}

export class UsageError extends Error {
  name = "UsageError";
}

export const USAGE = `Usage:
  freqdict list
  freqdict build <corpus> [path...] [options]
  freqdict build <corpus> <corpus>... [options]
  freqdict build --all [options]
  freqdict overlap <corpus> <pathA> <pathB>
  freqdict convert <in.zip> <out.zip> [--cap <n>] [--title <t>] [--revision <r>]

Build options:
  --file <TAG=path>       Input file for one source table (repeatable)
  --cap <n>               Keep the top n terms (default: per corpus, 50000)
  --input-dir <dir>       Base directory of the configured source files (default: .)
  --out-dir <dir>         Directory for the archives (default: .)
  --all                   Build every configured corpus

Global options:
  --config <path>         Corpus configuration file
  --log-level <level>     debug, info, warn or error (default: info)

Positional paths are bound to the corpus's source tables in declared order.`;

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const options: GlobalOptions = {};
  const positionals: string[] = [];
  const files = new Map<string, string>();
  let cap: number | undefined;
  let inputDir: string | undefined;
  let outDir: string | undefined;
  let title: string | undefined;
  let revision: string | undefined;
  let all = false;

  const value = (i: number, flag: string): string => {
    const v = argv[i];
    if (v === undefined || v.startsWith("--")) throw new UsageError(`${flag} needs a value`);
    return v;
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i]!;
    if (arg.startsWith("--")) {
      switch (arg) {
        case "--help":
          return { command: { kind: "help" }, options };
        case "--config":
          options.configPath = value(++i, arg);
          break;
        case "--log-level": {
          const level = value(++i, arg);
          if (!isLogLevel(level)) throw new UsageError(`unknown log level: ${level}`);
          options.logLevel = level;
          break;
        }
        case "--cap":
          cap = parseCap(value(++i, arg));
          break;
        case "--input-dir":
          inputDir = value(++i, arg);
          break;
        case "--out-dir":
          outDir = value(++i, arg);
          break;
        case "--file": {
          const pair = value(++i, arg);
          const eq = pair.indexOf("=");
          if (eq <= 0 || eq === pair.length - 1) throw new UsageError(`--file expects TAG=path, got "${pair}"`);
          files.set(pair.slice(0, eq), pair.slice(eq + 1));
          break;
        }
        case "--title":
          title = value(++i, arg);
          break;
        case "--revision":
          revision = value(++i, arg);
          break;
        case "--all":
          all = true;
          break;
        default:
          throw new UsageError(`unknown option: ${arg}`);
      }
    } else {
      positionals.push(arg);
    }
    i++;
  }

  const [cmd, ...rest] = positionals;
  switch (cmd) {
    case undefined:
    case "help":
      return { command: { kind: "help" }, options };
    case "list":
      return { command: { kind: "list" }, options };
    case "build":
      if (!all && rest.length === 0) throw new UsageError("build needs a corpus or --all");
      if (all && rest.length > 0) throw new UsageError("--all takes no corpus or paths");
      return { command: { kind: "build", positionals: rest, all, files, cap, inputDir, outDir }, options };
    case "overlap": {
      const [corpus, a, b] = rest;
      if (corpus === undefined || a === undefined || b === undefined || rest.length > 3) {
        throw new UsageError("overlap needs <corpus> <pathA> <pathB>");
      }
      return { command: { kind: "overlap", corpus, paths: [a, b] }, options };
    }
    case "convert": {
      const [input, output] = rest;
      if (input === undefined || output === undefined || rest.length > 2) {
        throw new UsageError("convert needs <in.zip> <out.zip>");
      }
      return { command: { kind: "convert", input, output, cap, title, revision }, options };
    }
    default:
      throw new UsageError(`unknown command: ${cmd}`);
  }
}

function parseCap(raw: string): number {
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) throw new UsageError(`--cap must be a positive integer, got "${raw}"`);
  return Number(raw);
}
