import type { DictionaryMetadata } from "../archive/format.js";
import { findCorpus, loadCorpusConfig, type CorpusConfig } from "../config/corpora.js";
import { createFrequencyEngine } from "../core/engine.js";
import { FreqDictError, InvalidConfigurationError } from "../core/errors.js";
import { createLogger, type Logger, type LogLevel, type LogSink } from "../logger.js";
import { buildCorpora, fileIO, loadSource, type PipelineIO } from "../pipeline/buildCorpus.js";
import { convertArchive } from "../pipeline/convert.js";
import { computeOverlap } from "../pipeline/overlap.js";
import { parseArgs, USAGE, UsageError, type Command, type ParsedArgs } from "./args.js";

export interface CliContext {
  configPath: string;
  /** Used unless --log-level is given. Default: info. */
  logLevel?: LogLevel;
  /** Default: stderr. */
  logSink?: LogSink;
  /** stdout writer */
  print: (line: string) => void;
  io?: PipelineIO;
}

export interface CommandContext {
  configPath: string;
  logger: Logger;
  print: (line: string) => void;
  io?: PipelineIO;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Parses argv and runs the command. Resolves to the process exit code. */
export async function main(argv: readonly string[], ctx: CliContext): Promise<number> {
  const parsed = tryParse(argv);
  const level = (parsed instanceof UsageError ? undefined : parsed.options.logLevel) ?? ctx.logLevel;
  const logger = createLogger({ level, sink: ctx.logSink });

  if (parsed instanceof UsageError) {
    logger.error(parsed.message);
    ctx.print(USAGE);
    return EXIT_USAGE;
  }

  const configPath = parsed.options.configPath ?? ctx.configPath;
  try {
    return await runCommand(parsed.command, { configPath, logger, print: ctx.print, io: ctx.io });
  } catch (e) {
    if (e instanceof UsageError) {
      logger.error(e.message);
      return EXIT_USAGE;
    }
    if (e instanceof FreqDictError) {
      logger.error(e.message);
      return EXIT_FAILURE;
    }
    throw e;
  }
}

function tryParse(argv: readonly string[]): ParsedArgs | UsageError {
  try {
    return parseArgs(argv);
  } catch (e) {
    if (e instanceof UsageError) return e;
    throw e;
  }
}

export async function runCommand(command: Command, ctx: CommandContext): Promise<number> {
  switch (command.kind) {
    case "help":
      ctx.print(USAGE);
      return EXIT_OK;
    case "list": {
      const corpora = await loadCorpusConfig(ctx.configPath);
      for (const c of corpora) {
        ctx.print(`${c.id}\t${c.metadata.title}\t${c.policy.mode}\t${c.sources.map((s) => s.tag).join(",")}`);
      }
      return EXIT_OK;
    }
    case "build":
      return runBuild(command, ctx);
    case "overlap":
      return runOverlap(command, ctx);
    case "convert": {
      const metadata: Partial<DictionaryMetadata> = {};
      if (command.title !== undefined) metadata.title = command.title;
      if (command.revision !== undefined) metadata.revision = command.revision;
      await convertArchive(command.input, command.output, { cap: command.cap, metadata, logger: ctx.logger });
      return EXIT_OK;
    }
  }
}

/**
 * Leading positionals naming configured corpora are corpora, the rest are
 * input paths bound in declared source order (only with a single corpus).
 */
export function planBuild(
  command: Extract<Command, { kind: "build" }>,
  corpora: readonly CorpusConfig[],
): { targets: CorpusConfig[]; files: Map<string, string> } {
  if (command.all) return { targets: [...corpora], files: new Map() };

  const targets: CorpusConfig[] = [];
  let i = 0;
  for (; i < command.positionals.length; i++) {
    const corpus = findCorpus(corpora, command.positionals[i]!);
    if (!corpus) break;
    targets.push(corpus);
  }
  const paths = command.positionals.slice(i);

  if (targets.length === 0) throw new UsageError(`unknown corpus: ${command.positionals[0] ?? ""}`);
  if (targets.length > 1 && (paths.length > 0 || command.files.size > 0)) {
    throw new UsageError("input paths can only be given when building a single corpus");
  }

  const files = new Map(command.files);
  const corpus = targets[0]!;
  if (paths.length > corpus.sources.length) {
    throw new UsageError(`corpus ${corpus.id} has ${corpus.sources.length} source table(s), got ${paths.length} paths`);
  }
  paths.forEach((path, j) => {
    const tag = corpus.sources[j]!.tag;
    if (files.has(tag)) throw new UsageError(`source ${tag} given both by position and by --file`);
    files.set(tag, path);
  });
  return { targets, files };
}

async function runBuild(command: Extract<Command, { kind: "build" }>, ctx: CommandContext): Promise<number> {
  const corpora = await loadCorpusConfig(ctx.configPath);
  const { targets, files } = planBuild(command, corpora);

  const results = await buildCorpora(targets, () => ({
    files,
    cap: command.cap,
    inputDir: command.inputDir,
    outDir: command.outDir,
    io: ctx.io,
    logger: ctx.logger,
  }));

  let failed = 0;
  for (const r of results) {
    if (r.ok) {
      ctx.print(`${r.corpus}\t${r.result.output}\t${r.result.entries}`);
    } else {
      failed++;
      ctx.logger.error(r.error.message);
    }
  }
  return failed > 0 ? EXIT_FAILURE : EXIT_OK;
}

async function runOverlap(command: Extract<Command, { kind: "overlap" }>, ctx: CommandContext): Promise<number> {
  const corpora = await loadCorpusConfig(ctx.configPath);
  const corpus = findCorpus(corpora, command.corpus);
  if (!corpus) throw new UsageError(`unknown corpus: ${command.corpus}`);
  const [first, second] = corpus.sources;
  if (!first || !second) {
    throw new InvalidConfigurationError(`corpus ${corpus.id} declares fewer than two source tables`);
  }

  const io = ctx.io ?? fileIO;
  const engine = createFrequencyEngine();
  const [a, b] = await Promise.all([
    loadSource(io, first, command.paths[0], corpus.useReading),
    loadSource(io, second, command.paths[1], corpus.useReading),
  ]);
  const report = computeOverlap(
    engine.merge({ mode: "SINGLE" }, [{ source: first.tag, records: a }]),
    engine.merge({ mode: "SINGLE" }, [{ source: second.tag, records: b }]),
  );

  ctx.print(`shared\t${report.shared}`);
  ctx.print(`union\t${report.union}`);
  ctx.print(`ratio\t${report.ratio.toFixed(4)}`);
  ctx.print(`differing\t${report.differing}`);
  return EXIT_OK;
}
