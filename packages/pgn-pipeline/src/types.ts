/**
 * Types for the PGN ingest pipeline: archive → games → Avro records + manifest.
 */

/** One game after tag and move extraction. */
export interface ParsedGame {
  gameId: string; // UUID string, unique per run
  tags: Map<string, string>; // first-encounter order, last value wins
  moves: string; // raw move text, result token included
}

/** Reserved record fields appended after the tags. */
export const MOVES_FIELD = "moves";
export const GAME_ID_FIELD = "game_id";

export type FieldType = "text";

export interface SchemaField {
  name: string;
  type: FieldType;
}

/** Shared record shape for one run. Inferred from the first game and frozen. */
export interface Schema {
  name: string; // "Game"
  namespace: string;
  fields: readonly SchemaField[];
}

/** Source of game identifiers. Swappable for deterministic ids in tests. */
export interface IdSource {
  next(): string;
}

/** What to do with a malformed game that is not the first one. */
export type MalformedPolicy = "abort" | "skip";

/** Whether a new run replaces or extends the manifest already in the output directory. */
export type ManifestMode = "truncate" | "append";

/** When manifest entries hit the disk: once at commit, or as each record completes. */
export type ManifestFlush = "end" | "incremental";

export interface PipelineOptions {
  input: string; // path to the .pgn.zst archive
  outDir: string;
  concurrency?: number;
  onMalformed?: MalformedPolicy;
  manifestMode?: ManifestMode;
  manifestFlush?: ManifestFlush;
  ids?: IdSource;
  onProgress?: (records: number) => void;
}

export interface RunSummary {
  records: number;
  skippedMalformed: number;
  droppedUnterminated: number;
  manifestPath: string;
  outDir: string;
  schema: Schema;
  elapsedMs: number;
}
