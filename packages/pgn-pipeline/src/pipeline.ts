/**
 * Preprocess one archive: decompress → split → parse → serialize → manifest.
 *
 * Decompression and splitting run as a single producer because the stream
 * can only be read in order. The first game is handled alone so the schema is
 * fixed before anything else runs; later games go through a bounded pool of
 * parse+write tasks. Ids reach the manifest in completion order.
 *
 * Any fatal error stops intake, lets in-flight writes settle, aborts the
 * manifest (no `games` file) and rethrows. Records already written stay on
 * disk.
 */

import { mkdir } from "node:fs/promises";
import { assertZstdArchive, decodeText, decompress, openArchive } from "./decompress";
import { EmptySchemaError, MalformedGameError, describe } from "./errors";
import { randomIdSource } from "./id-source";
import { ManifestWriter } from "./manifest";
import { parseGame } from "./parser";
import { assertConforms, inferSchema } from "./schema";
import { writeRecord } from "./serializer";
import { GameSplitter, splitGames } from "./splitter";
import type { ParsedGame, PipelineOptions, RunSummary, Schema } from "./types";

export const DEFAULT_CONCURRENCY = 8;

export async function runPipeline(options: PipelineOptions): Promise<RunSummary> {
  const start = Date.now();
  const {
    input,
    outDir,
    concurrency = DEFAULT_CONCURRENCY,
    onMalformed = "abort",
    ids = randomIdSource,
    onProgress,
  } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  // Rejects non-zstd input before any output exists
  await assertZstdArchive(input);

  await mkdir(outDir, { recursive: true });
  const manifest = new ManifestWriter(outDir, {
    mode: options.manifestMode,
    flush: options.manifestFlush,
  });
  await manifest.open();

  const splitter = new GameSplitter();
  let schema: Schema | null = null;
  let skippedMalformed = 0;
  let segmentIndex = 0;

  const recordId = async (gameId: string) => {
    const pending = manifest.record(gameId);
    const count = manifest.count; // this id's position, read before any drain wait
    await pending;
    onProgress?.(count);
  };

  const processSegment = async (segment: string, n: number, runSchema: Schema) => {
    let game: ParsedGame;
    try {
      game = parseGame(segment, ids);
    } catch (err) {
      if (err instanceof MalformedGameError && onMalformed === "skip") {
        skippedMalformed++;
        console.warn(`  Skipping game #${n}: ${err.message}`);
        return;
      }
      throw err;
    }
    assertConforms(runSchema, game);
    await writeRecord(outDir, game, runSchema);
    await recordId(game.gameId);
  };

  const inFlight = new Set<Promise<void>>();
  const failures: unknown[] = [];

  try {
    const segments = splitGames(decodeText(decompress(openArchive(input))), splitter);

    for await (const segment of segments) {
      segmentIndex++;

      if (!schema) {
        // First game: always fatal if malformed, and it fixes the schema
        const first = parseGame(segment, ids);
        schema = inferSchema([first]);
        await writeRecord(outDir, first, schema);
        await recordId(first.gameId);
        continue;
      }

      const task: Promise<void> = processSegment(segment, segmentIndex, schema)
        .catch((error: unknown) => {
          failures.push(error);
        })
        .finally(() => {
          inFlight.delete(task);
        });
      inFlight.add(task);

      if (inFlight.size >= concurrency) await Promise.race(inFlight);
      if (failures.length > 0) break;
    }

    await Promise.all(inFlight);
    if (failures.length > 0) throw failures[0];
    if (!schema) throw new EmptySchemaError();

    const manifestPath = await manifest.commit();
    return {
      records: manifest.count,
      skippedMalformed,
      droppedUnterminated: splitter.stats.droppedUnterminated,
      manifestPath,
      outDir,
      schema,
      elapsedMs: Date.now() - start,
    };
  } catch (err) {
    await Promise.allSettled(inFlight);
    try {
      await manifest.abort();
    } catch (abortErr) {
      console.error(`  Failed to close partial manifest: ${describe(abortErr)}`);
    }
    throw err;
  }
}
