/**
 * Fixtures for tests: zstd frames built from raw (stored) blocks, and
 * throwaway directories.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

const MAX_BLOCK = 128 * 1024;

/**
 * One zstd frame holding `data` uncompressed: single-segment header with a
 * 4-byte content size, then raw blocks of at most 128 KiB.
 */
export function zstdFrame(data: string | Uint8Array): Uint8Array {
  const bytes = typeof data === "string" ? new TextEncoder().encode(data) : data;
  const parts: number[] = [0x28, 0xb5, 0x2f, 0xfd, 0xa0];
  const size = bytes.length;
  parts.push(size & 0xff, (size >>> 8) & 0xff, (size >>> 16) & 0xff, (size >>> 24) & 0xff);

  let offset = 0;
  do {
    const blockSize = Math.min(MAX_BLOCK, size - offset);
    const last = offset + blockSize >= size ? 1 : 0;
    const header = (blockSize << 3) | last; // block type 0: raw
    parts.push(header & 0xff, (header >>> 8) & 0xff, (header >>> 16) & 0xff);
    for (let i = offset; i < offset + blockSize; i++) parts.push(bytes[i]);
    offset += blockSize;
  } while (offset < size);

  return Uint8Array.from(parts);
}

/** Several frames back to back, as multi-frame archives are laid out. */
export function zstdFrames(...texts: string[]): Uint8Array {
  const frames = texts.map((t) => zstdFrame(t));
  const out = new Uint8Array(frames.reduce((n, f) => n + f.length, 0));
  let offset = 0;
  for (const frame of frames) {
    out.set(frame, offset);
    offset += frame.length;
  }
  return out;
}

export async function makeTempDir(prefix = "pgn-pipeline-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Write `pgn` as a single-frame archive and return its path. */
export async function writeArchive(dir: string, pgn: string, name = "games.pgn.zst"): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, zstdFrame(pgn));
  return path;
}

/** Async iterable over fixed chunks, for feeding streaming functions. */
export async function* chunksOf<T>(items: readonly T[]): AsyncGenerator<T> {
  for (const item of items) yield item;
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

export const GAME_ONE = [
  '[Event "Test Game"]',
  '[Site "Local"]',
  '[White "Alpha"]',
  '[Black "Beta"]',
  '[Result "1-0"]',
  "",
  "1. e4 e5 2. Qh5 Nc6 3. Bc4 Nf6 4. Qxf7# 1-0",
].join("\n");

export const GAME_TWO = [
  '[Event "Second Game"]',
  '[Site "Local"]',
  '[White "Gamma"]',
  '[Black "Delta"]',
  '[Result "0-1"]',
  "",
  "1. f3 e5 2. g4 Qh4# 0-1",
].join("\n");
