/**
 * One Avro object container file per game, named `<game_id>.avro`.
 *
 * The writer schema travels in each file's header, so the loader (or anyone
 * else) can read a single game without the run's schema at hand.
 */

import { createReadStream, createWriteStream } from "node:fs";
import { join } from "node:path";
import { pipeline } from "node:stream/promises";
import avro, { type Type } from "avsc";
import {
  DuplicateIdentifierError,
  RecordReadError,
  RecordWriteError,
  describe,
  errnoCode,
} from "./errors";
import { toRecord } from "./parser";
import { toAvroSchema } from "./schema";
import type { ParsedGame, Schema } from "./types";

export const RECORD_EXTENSION = ".avro";

const typeCache = new WeakMap<Schema, Type>();

export function avroType(schema: Schema): Type {
  let type = typeCache.get(schema);
  if (!type) {
    type = avro.Type.forSchema(toAvroSchema(schema));
    typeCache.set(schema, type);
  }
  return type;
}

export function recordPath(outDir: string, gameId: string): string {
  return join(outDir, `${gameId}${RECORD_EXTENSION}`);
}

/**
 * Write one game under the run schema. Never overwrites: an existing file
 * with the same id means the id source repeated itself.
 */
export async function writeRecord(outDir: string, game: ParsedGame, schema: Schema): Promise<string> {
  const path = recordPath(outDir, game.gameId);
  try {
    const encoder = new avro.streams.BlockEncoder(avroType(schema));
    encoder.end(toRecord(game));
    await pipeline(encoder, createWriteStream(path, { flags: "wx" }));
  } catch (err) {
    if (errnoCode(err) === "EEXIST") throw new DuplicateIdentifierError(game.gameId, path);
    throw new RecordWriteError(path, err);
  }
  return path;
}

/** Read back the single record in a record file, using only its embedded schema. */
export async function readRecord(path: string): Promise<Record<string, string>> {
  const values: unknown[] = [];
  const decoder = new avro.streams.BlockDecoder();
  const source = createReadStream(path);
  // pipe() does not forward source errors
  source.on("error", (err) => decoder.destroy(err));
  source.pipe(decoder);
  try {
    for await (const value of decoder) values.push(value);
  } catch (err) {
    throw new RecordReadError(path, describe(err), err);
  }
  if (values.length !== 1) {
    throw new RecordReadError(path, `expected 1 record, found ${values.length}`);
  }

  const value = values[0];
  if (typeof value !== "object" || value === null) {
    throw new RecordReadError(path, "record is not an object");
  }
  const record: Record<string, string> = {};
  for (const [name, field] of Object.entries(value)) {
    if (typeof field !== "string") {
      throw new RecordReadError(path, `field ${name} is not a string`);
    }
    record[name] = field;
  }
  return record;
}
