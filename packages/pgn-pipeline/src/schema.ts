/**
 * One schema per run, taken from the first game.
 *
 * Later games are held to it exactly (same fields, same order). An archive
 * whose tag sets drift mid-way fails the run instead of producing records
 * that disagree with each other.
 */

import { EmptySchemaError, SchemaViolationError } from "./errors";
import { recordKeys } from "./parser";
import type { ParsedGame, Schema } from "./types";

export const SCHEMA_NAME = "Game";
export const SCHEMA_NAMESPACE = "pgn.ingest";

export function inferSchema(games: readonly ParsedGame[]): Schema {
  const first = games[0];
  if (!first) throw new EmptySchemaError();

  const fields = recordKeys(first).map((name) => Object.freeze({ name, type: "text" as const }));
  return Object.freeze({
    name: SCHEMA_NAME,
    namespace: SCHEMA_NAMESPACE,
    fields: Object.freeze(fields),
  });
}

export function assertConforms(schema: Schema, game: ParsedGame): void {
  const keys = recordKeys(game);
  const expected = schema.fields.map((f) => f.name);
  if (keys.length === expected.length && keys.every((k, i) => k === expected[i])) return;

  const have = new Set(keys);
  const want = new Set(expected);
  throw new SchemaViolationError(
    game.gameId,
    expected.filter((name) => !have.has(name)),
    keys.filter((name) => !want.has(name)),
  );
}

/** Avro record schema for the run; every text field is an Avro string. */
export function toAvroSchema(schema: Schema) {
  return {
    type: "record" as const,
    name: schema.name,
    namespace: schema.namespace,
    fields: schema.fields.map((f) => ({ name: f.name, type: "string" as const })),
  };
}
