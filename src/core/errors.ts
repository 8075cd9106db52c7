export interface FieldError {
  path: string;
  message: string;
}

export type ErrorCode =
  | "INVALID_POLICY_CONFIGURATION"
  | "NEGATIVE_COUNT"
  | "INVALID_CAP"
  | "INVALID_CONFIGURATION"
  | "MALFORMED_ROW"
  | "ARCHIVE_FORMAT"
  | "CORPUS_BUILD_FAILED";

export type PipelineStage = "configure" | "ingest" | "merge" | "rank" | "package";

/** Base class of every failure this package reports. */
export abstract class FreqDictError extends Error {
  abstract readonly code: ErrorCode;

  get title(): string {
    return codeToTitle(this.code);
  }
}

export class InvalidPolicyConfigurationError extends FreqDictError {
  readonly code = "INVALID_POLICY_CONFIGURATION";
  name = "InvalidPolicyConfigurationError";
}

export class NegativeCountError extends FreqDictError {
  readonly code = "NEGATIVE_COUNT";
  name = "NegativeCountError";

  constructor(
    readonly source: string,
    readonly surface: string,
    readonly count: number,
  ) {
    super(`source ${source} reports count ${count} for "${surface}"`);
  }
}

export class InvalidCapError extends FreqDictError {
  readonly code = "INVALID_CAP";
  name = "InvalidCapError";

  constructor(readonly cap: number) {
    super(`rank cap must be a positive integer, got ${cap}`);
  }
}

export class InvalidConfigurationError extends FreqDictError {
  readonly code = "INVALID_CONFIGURATION";
  name = "InvalidConfigurationError";

  constructor(
    message: string,
    readonly errors: FieldError[] = [],
  ) {
    super(errors.length ? `${message}: ${errors.map((e) => `${e.path} ${e.message}`).join("; ")}` : message);
  }
}

export class MalformedRowError extends FreqDictError {
  readonly code = "MALFORMED_ROW";
  name = "MalformedRowError";

  constructor(
    readonly file: string,
    readonly line: number,
    detail: string,
  ) {
    super(`${file}:${line}: ${detail}`);
  }
}

export class ArchiveFormatError extends FreqDictError {
  readonly code = "ARCHIVE_FORMAT";
  name = "ArchiveFormatError";
}

/** Labeled failure of one corpus run; `cause` holds the underlying error. */
export class CorpusBuildError extends FreqDictError {
  readonly code = "CORPUS_BUILD_FAILED";
  name = "CorpusBuildError";

  constructor(
    readonly corpus: string,
    readonly stage: PipelineStage,
    cause: unknown,
  ) {
    super(`corpus ${corpus} failed at ${stage}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

function codeToTitle(code: ErrorCode): string {
  switch (code) {
    case "INVALID_POLICY_CONFIGURATION":
      return "Invalid merge policy configuration";
    case "NEGATIVE_COUNT":
      return "Negative count";
    case "INVALID_CAP":
      return "Invalid rank cap";
    case "INVALID_CONFIGURATION":
      return "Invalid configuration";
    case "MALFORMED_ROW":
      return "Malformed row";
    case "ARCHIVE_FORMAT":
      return "Invalid archive";
    case "CORPUS_BUILD_FAILED":
      return "Corpus build failed";
  }
}
