export * from "./errors";
export * from "./types";
export { createSequentialIdSource, randomIdSource } from "./id-source";
export { CHUNK_SIZE, assertZstdArchive, decodeText, decompress, decompressFile, openArchive } from "./decompress";
export { GameSplitter, START_TOKEN, TERMINAL_TOKENS, splitGames, splitPGN, terminalEnd, type SplitStats } from "./splitter";
export { extractMoves, extractTags, parseGame, recordKeys, toRecord } from "./parser";
export { SCHEMA_NAME, SCHEMA_NAMESPACE, assertConforms, inferSchema, toAvroSchema } from "./schema";
export { RECORD_EXTENSION, avroType, readRecord, recordPath, writeRecord } from "./serializer";
export { MANIFEST_FILENAME, ManifestWriter, PARTIAL_SUFFIX, readManifest, type ManifestOptions } from "./manifest";
export { DEFAULT_CONCURRENCY, runPipeline } from "./pipeline";
export { DEFAULT_ARCHIVE_BASE_URL, archiveFileName, archiveUrl, downloadArchive, type DownloadOptions } from "./download";
export {
  DEFAULT_LOAD_BATCH,
  DEFAULT_LOAD_TABLE,
  loadRecords,
  type BatchInserter,
  type LoadOptions,
  type LoadResult,
  type LoadRow,
} from "./load";
export { connectWarehouse, type Warehouse } from "./db";
export { loadConfig, type PipelineConfig } from "./config";
