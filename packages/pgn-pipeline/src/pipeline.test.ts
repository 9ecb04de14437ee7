import { existsSync } from "node:fs";
import { readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DecompressionError,
  DuplicateIdentifierError,
  EmptySchemaError,
  InvalidInputFormatError,
  MalformedGameError,
  SchemaViolationError,
} from "./errors";
import { createSequentialIdSource } from "./id-source";
import { runPipeline } from "./pipeline";
import { readRecord, recordPath } from "./serializer";
import { GAME_ONE, GAME_TWO, makeTempDir, removeDir, writeArchive, zstdFrame } from "./test-helpers";

const ID_1 = "00000000-0000-4000-8000-000000000001";
const ID_2 = "00000000-0000-4000-8000-000000000002";

function gameNumber(n: number): string {
  const result = n % 2 === 0 ? "1-0" : "0-1";
  return [
    `[Event "Game ${n}"]`,
    '[Site "Local"]',
    '[White "Alpha"]',
    '[Black "Beta"]',
    `[Result "${result}"]`,
    "",
    `1. e4 e5 2. Nf3 Nc6 ${result}`,
  ].join("\n");
}

async function manifestLines(outDir: string): Promise<string[]> {
  const text = await readFile(join(outDir, "games"), "utf-8");
  return text.split("\n").filter(Boolean);
}

describe("runPipeline", () => {
  let dir: string;
  let outDir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    outDir = join(dir, "out");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it("turns a one-game archive into one record and a one-line manifest", async () => {
    const input = await writeArchive(dir, `${GAME_ONE}\n`);

    const summary = await runPipeline({ input, outDir, ids: createSequentialIdSource() });

    expect(summary.records).toBe(1);
    expect(summary.manifestPath).toBe(join(outDir, "games"));
    expect(await manifestLines(outDir)).toEqual([ID_1]);
    expect(await readdir(outDir)).toEqual(expect.arrayContaining([`${ID_1}.avro`, "games"]));
    expect((await readRecord(recordPath(outDir, ID_1))).Event).toBe("Test Game");
  });

  it("writes one independently readable record per game", async () => {
    const input = await writeArchive(dir, `${GAME_ONE}\n\n\n${GAME_TWO}\n`);

    const summary = await runPipeline({ input, outDir, ids: createSequentialIdSource() });

    expect(summary.records).toBe(2);
    const ids = await manifestLines(outDir);
    expect([...ids].sort()).toEqual([ID_1, ID_2]);
    expect((await readRecord(recordPath(outDir, ID_1))).Result).toBe("1-0");
    expect((await readRecord(recordPath(outDir, ID_2))).Result).toBe("0-1");
    expect(summary.schema.fields.map((f) => f.name)).toEqual([
      "Event",
      "Site",
      "White",
      "Black",
      "Result",
      "moves",
      "game_id",
    ]);
  });

  it("fails on a first game without header tags and writes no manifest", async () => {
    const input = await writeArchive(dir, "[Event Test Game\n\n1. e4 e5 1-0\n");

    await expect(runPipeline({ input, outDir })).rejects.toBeInstanceOf(MalformedGameError);
    expect(existsSync(join(outDir, "games"))).toBe(false);
  });

  it("rejects input that is not a zstd archive before writing anything", async () => {
    const input = join(dir, "plain.pgn");
    await writeFile(input, `${GAME_ONE}\n`);

    await expect(runPipeline({ input, outDir })).rejects.toBeInstanceOf(InvalidInputFormatError);
    expect(existsSync(outDir)).toBe(false);
  });

  it("fails with an empty schema when the archive holds no games", async () => {
    const input = await writeArchive(dir, "no games in here\n");

    await expect(runPipeline({ input, outDir })).rejects.toBeInstanceOf(EmptySchemaError);
    expect(existsSync(join(outDir, "games"))).toBe(false);
  });

  it("aborts on a later malformed game by default", async () => {
    const input = await writeArchive(dir, `${GAME_ONE}\n\n[Event Broken\n\n1. e4 1-0\n\n${GAME_TWO}\n`);

    await expect(runPipeline({ input, outDir, ids: createSequentialIdSource() })).rejects.toThrow(
      "Malformed game (no header tags): [Event Broken",
    );
    expect(existsSync(join(outDir, "games"))).toBe(false);
  });

  it("skips later malformed games when asked to", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const input = await writeArchive(dir, `${GAME_ONE}\n\n[Event Broken\n\n1. e4 1-0\n\n${GAME_TWO}\n`);

    const summary = await runPipeline({
      input,
      outDir,
      onMalformed: "skip",
      ids: createSequentialIdSource(),
    });

    expect(summary.records).toBe(2);
    expect(summary.skippedMalformed).toBe(1);
    expect([...(await manifestLines(outDir))].sort()).toEqual([ID_1, ID_2]);
    expect(warn).toHaveBeenCalledWith("  Skipping game #2: Malformed game (no header tags): [Event Broken");
  });

  it("fails when a later game has different tags", async () => {
    const input = await writeArchive(dir, `${GAME_ONE}\n\n[Event "Odd"]\n[Site "Local"]\n\n1. d4 1-0\n`);

    await expect(runPipeline({ input, outDir, ids: createSequentialIdSource() })).rejects.toBeInstanceOf(
      SchemaViolationError,
    );
    expect(existsSync(join(outDir, "games"))).toBe(false);
  });

  it("fails loudly when the id source repeats itself", async () => {
    const input = await writeArchive(dir, `${GAME_ONE}\n\n${GAME_TWO}\n`);

    await expect(runPipeline({ input, outDir, ids: { next: () => ID_1 } })).rejects.toBeInstanceOf(
      DuplicateIdentifierError,
    );
    expect(existsSync(join(outDir, "games"))).toBe(false);
    expect((await readRecord(recordPath(outDir, ID_1))).Event).toBe("Test Game");
  });

  it("counts games dropped for lack of a result", async () => {
    const unfinished = '[Event "Open"]\n[Site "Local"]\n[White "A"]\n[Black "B"]\n[Result "*"]\n\n1. e4 *';
    const input = await writeArchive(dir, `${GAME_ONE}\n\n${unfinished}\n\n${GAME_TWO}\n`);

    const summary = await runPipeline({ input, outDir, ids: createSequentialIdSource() });

    expect(summary.records).toBe(2);
    expect(summary.droppedUnterminated).toBe(1);
  });

  it("writes every game of a larger archive under bounded concurrency", async () => {
    const games = Array.from({ length: 25 }, (_, i) => gameNumber(i + 1));
    const input = await writeArchive(dir, `${games.join("\n\n")}\n`);
    const progress: number[] = [];

    const summary = await runPipeline({
      input,
      outDir,
      concurrency: 3,
      manifestFlush: "incremental",
      onProgress: (n) => progress.push(n),
    });

    expect(summary.records).toBe(25);
    const ids = await manifestLines(outDir);
    expect(new Set(ids).size).toBe(25);
    expect([...progress].sort((a, b) => a - b)).toEqual(Array.from({ length: 25 }, (_, i) => i + 1));

    const events = await Promise.all(ids.map(async (id) => (await readRecord(recordPath(outDir, id))).Event));
    expect([...events].sort()).toEqual([...games.map((_, i) => `Game ${i + 1}`)].sort());
  });

  it("replaces the manifest on a rerun unless appending", async () => {
    const input = await writeArchive(dir, `${GAME_ONE}\n`);

    await runPipeline({ input, outDir, ids: createSequentialIdSource(1) });
    await runPipeline({ input, outDir, ids: createSequentialIdSource(2) });
    expect(await manifestLines(outDir)).toEqual([ID_2]);

    await runPipeline({ input, outDir, ids: createSequentialIdSource(3), manifestMode: "append" });
    expect(await manifestLines(outDir)).toEqual([ID_2, "00000000-0000-4000-8000-000000000003"]);
  });

  it("keeps a failed append run from looking finished", async () => {
    const good = await writeArchive(dir, `${GAME_ONE}\n`, "good.pgn.zst");
    await runPipeline({ input: good, outDir, ids: createSequentialIdSource(1) });
    const bad = await writeArchive(dir, `${GAME_ONE}\n\n[Event "Odd"]\n[Site "Local"]\n\n1. d4 1-0\n`, "bad.pgn.zst");

    await expect(
      runPipeline({ input: bad, outDir, ids: createSequentialIdSource(2), manifestMode: "append" }),
    ).rejects.toBeInstanceOf(SchemaViolationError);

    expect(existsSync(join(outDir, "games"))).toBe(false);
    expect(await readFile(join(outDir, "games.partial"), "utf-8")).toBe(`${ID_1}\n`);
  });

  it("fails on a truncated archive without publishing a manifest", async () => {
    const frame = zstdFrame(`${GAME_ONE}\n\n${GAME_TWO}\n`);
    const input = join(dir, "truncated.pgn.zst");
    await writeFile(input, frame.subarray(0, Math.floor(frame.length / 2)));

    await expect(runPipeline({ input, outDir, ids: createSequentialIdSource() })).rejects.toBeInstanceOf(
      DecompressionError,
    );
    expect(existsSync(join(outDir, "games"))).toBe(false);
  });

  it("replaces a game_id tag carried by the archive with a generated id", async () => {
    const input = await writeArchive(dir, '[Event "E"]\n[game_id "lichess-abc"]\n\n1. e4 e5 1-0\n');

    const summary = await runPipeline({ input, outDir, ids: createSequentialIdSource() });

    expect(summary.records).toBe(1);
    expect(await manifestLines(outDir)).toEqual([ID_1]);
    expect(await readRecord(recordPath(outDir, ID_1))).toEqual({
      Event: "E",
      moves: "1. e4 e5 1-0",
      game_id: ID_1,
    });
  });

  it("rejects a concurrency below one", async () => {
    const input = await writeArchive(dir, `${GAME_ONE}\n`);
    await expect(runPipeline({ input, outDir, concurrency: 0 })).rejects.toThrow(RangeError);
  });
});
