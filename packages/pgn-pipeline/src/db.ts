/**
 * Postgres sink for the warehouse loader.
 *
 * One multi-row INSERT per batch, so a batch lands whole or not at all.
 * Rows already present (same game_id) are left untouched and not counted.
 */

import postgres from "postgres";
import { ConfigError } from "./errors";

export interface LoadRow {
  gameId: string;
  record: Record<string, string>;
}

/** Inserts one batch and returns how many rows were new. */
export type BatchInserter = (table: string, rows: LoadRow[]) => Promise<number>;

export interface Warehouse {
  insertBatch: BatchInserter;
  close(): Promise<void>;
}

export function connectWarehouse(databaseUrl: string | undefined): Warehouse {
  if (!databaseUrl) {
    throw new ConfigError("DATABASE_URL is not configured (needed by load)");
  }
  const sql = postgres(databaseUrl, { max: 1, connect_timeout: 10 });

  return {
    insertBatch: async (table, rows) => {
      if (rows.length === 0) return 0;
      const values = rows.map((row) => ({ game_id: row.gameId, record: JSON.stringify(row.record) }));
      const inserted = await sql`
        INSERT INTO ${sql(table)} ${sql(values, "game_id", "record")}
        ON CONFLICT (game_id) DO NOTHING
        RETURNING game_id
      `;
      return inserted.length;
    },
    close: () => sql.end(),
  };
}
