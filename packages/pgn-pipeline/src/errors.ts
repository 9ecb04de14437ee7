/**
 * Error taxonomy for the ingest pipeline.
 *
 * Every failure the pipeline raises carries a stable `code` so the CLI (and
 * anything wrapping the pipeline) can tell an aborted run apart from a bug.
 */

export type PipelineErrorCode =
  | "INVALID_INPUT_FORMAT"
  | "DECOMPRESSION_FAILED"
  | "MALFORMED_GAME"
  | "SCHEMA_VIOLATION"
  | "EMPTY_SCHEMA"
  | "DUPLICATE_IDENTIFIER"
  | "RECORD_WRITE_FAILED"
  | "RECORD_READ_FAILED"
  | "ARCHIVE_FETCH_FAILED"
  | "MANIFEST_MISSING"
  | "CONFIG_INVALID";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Input is not a zstd container. Raised before any output is produced. */
export class InvalidInputFormatError extends PipelineError {
  constructor(readonly path: string, reason: string) {
    super("INVALID_INPUT_FORMAT", `${path} is not a zstd archive: ${reason}`);
  }
}

export class DecompressionError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("DECOMPRESSION_FAILED", message, { cause });
  }
}

export class MalformedGameError extends PipelineError {
  constructor(readonly reason: string, readonly excerpt: string) {
    super("MALFORMED_GAME", `Malformed game (${reason}): ${excerpt}`);
  }
}

export class SchemaViolationError extends PipelineError {
  constructor(
    readonly gameId: string,
    readonly missing: string[],
    readonly extra: string[],
  ) {
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`missing [${missing.join(", ")}]`);
    if (extra.length > 0) parts.push(`unexpected [${extra.join(", ")}]`);
    if (parts.length === 0) parts.push("fields out of order");
    super("SCHEMA_VIOLATION", `Game ${gameId} does not match the run schema: ${parts.join(", ")}`);
  }
}

export class EmptySchemaError extends PipelineError {
  constructor() {
    super("EMPTY_SCHEMA", "No games available to infer a schema from");
  }
}

export class DuplicateIdentifierError extends PipelineError {
  constructor(readonly gameId: string, readonly path: string) {
    super("DUPLICATE_IDENTIFIER", `Record ${gameId} already exists at ${path}`);
  }
}

export class RecordWriteError extends PipelineError {
  constructor(readonly path: string, cause: unknown) {
    super("RECORD_WRITE_FAILED", `Failed to write ${path}: ${describe(cause)}`, { cause });
  }
}

export class RecordReadError extends PipelineError {
  constructor(readonly path: string, reason: string, cause?: unknown) {
    super("RECORD_READ_FAILED", `Failed to read ${path}: ${reason}`, { cause });
  }
}

export class ArchiveFetchError extends PipelineError {
  constructor(readonly url: string, reason: string, cause?: unknown) {
    super("ARCHIVE_FETCH_FAILED", `Failed to download ${url}: ${reason}`, { cause });
  }
}

export class ManifestMissingError extends PipelineError {
  constructor(readonly path: string) {
    super("MANIFEST_MISSING", `No committed manifest at ${path} (run incomplete or never started)`);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

/** Human-readable message for anything thrown. */
export function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node's system errors carry a string `code` (ENOENT, EEXIST, ...). */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}
