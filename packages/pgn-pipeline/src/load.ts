/**
 * Load a finished run's record files into Postgres.
 *
 * The manifest is the index: only ids listed in a committed `games` file are
 * loaded, so records left behind by an aborted run are never picked up. Each
 * record file is decoded with its own embedded schema and stored as JSON.
 *
 * The target table must already exist:
 *   CREATE TABLE <table> (game_id TEXT PRIMARY KEY, record JSONB NOT NULL)
 */

import { connectWarehouse, type BatchInserter, type LoadRow } from "./db";
import { readManifest } from "./manifest";
import { readRecord, recordPath } from "./serializer";

export type { BatchInserter, LoadRow } from "./db";

export const DEFAULT_LOAD_TABLE = "raw_games";
export const DEFAULT_LOAD_BATCH = 500;

export interface LoadOptions {
  table?: string;
  batchSize?: number;
  databaseUrl?: string; // used when no insertBatch is given
  insertBatch?: BatchInserter;
  onProgress?: (count: number, inserted: number) => void;
}

export interface LoadResult {
  total: number;
  inserted: number;
  skipped: number; // already present in the table
}

export async function loadRecords(outDir: string, opts?: LoadOptions): Promise<LoadResult> {
  const table = opts?.table ?? DEFAULT_LOAD_TABLE;
  const batchSize = opts?.batchSize ?? DEFAULT_LOAD_BATCH;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }
  if (opts?.insertBatch) {
    return loadInto(outDir, table, batchSize, opts.insertBatch, opts.onProgress);
  }

  const warehouse = connectWarehouse(opts?.databaseUrl);
  try {
    return await loadInto(outDir, table, batchSize, warehouse.insertBatch, opts?.onProgress);
  } finally {
    await warehouse.close();
  }
}

async function loadInto(
  outDir: string,
  table: string,
  batchSize: number,
  insertBatch: BatchInserter,
  onProgress: LoadOptions["onProgress"],
): Promise<LoadResult> {
  let total = 0;
  let inserted = 0;
  let batch: LoadRow[] = [];

  const flush = async () => {
    if (batch.length === 0) return;
    inserted += await insertBatch(table, batch);
    total += batch.length;
    batch = [];
    onProgress?.(total, inserted);
  };

  for await (const gameId of readManifest(outDir)) {
    const record = await readRecord(recordPath(outDir, gameId));
    batch.push({ gameId, record });
    if (batch.length >= batchSize) await flush();
  }
  await flush();

  return { total, inserted, skipped: total - inserted };
}
