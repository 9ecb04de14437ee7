/**
 * Streaming zstd decompression for monthly game archives.
 *
 * Archives run to tens of gigabytes, so nothing here holds more than a chunk
 * or two: each compressed chunk is pushed into the decompressor and every
 * decompressed chunk it produces is yielded before the next read. Archives
 * made of several concatenated frames decode as one logical stream.
 */

import { createReadStream, createWriteStream } from "node:fs";
import { open, type FileHandle } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { Decompress } from "fzstd";
import { DecompressionError, InvalidInputFormatError, describe, errnoCode } from "./errors";

export const CHUNK_SIZE = 16 * 1024;

const ZSTD_MAGIC = [0x28, 0xb5, 0x2f, 0xfd];

/** Skippable frames: 0x184D2A50–0x184D2A5F, little-endian. */
function isSkippableMagic(b: Uint8Array): boolean {
  return (b[0] & 0xf0) === 0x50 && b[1] === 0x2a && b[2] === 0x4d && b[3] === 0x18;
}

function isZstdMagic(b: Uint8Array): boolean {
  return ZSTD_MAGIC.every((byte, i) => b[i] === byte);
}

/**
 * Check that `path` starts with a zstd (or skippable) frame header.
 * Throws InvalidInputFormatError for anything else, including missing files.
 */
export async function assertZstdArchive(path: string): Promise<void> {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (err) {
    const code = errnoCode(err);
    throw new InvalidInputFormatError(path, code === "ENOENT" ? "file not found" : describe(err));
  }
  try {
    const header = new Uint8Array(4);
    const { bytesRead } = await handle.read(header, 0, 4, 0);
    if (bytesRead < 4) {
      throw new InvalidInputFormatError(path, bytesRead === 0 ? "file is empty" : "file too short");
    }
    if (!isZstdMagic(header) && !isSkippableMagic(header)) {
      throw new InvalidInputFormatError(path, "missing zstd frame magic");
    }
  } finally {
    await handle.close();
  }
}

/** Read stream over the compressed archive in CHUNK_SIZE pieces. */
export function openArchive(path: string): Readable {
  return createReadStream(path, { highWaterMark: CHUNK_SIZE });
}

function toUint8Array(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  if (typeof chunk === "string") return new TextEncoder().encode(chunk);
  if (chunk instanceof ArrayBuffer) return new Uint8Array(chunk);
  throw new DecompressionError(`Unsupported chunk type from archive source: ${typeof chunk}`);
}

/** Decompress a zstd byte source, yielding chunks as soon as they are produced. */
export async function* decompress(source: AsyncIterable<unknown>): AsyncGenerator<Uint8Array> {
  const pending: Uint8Array[] = [];
  const decompressor = new Decompress((chunk) => {
    // copied: the decompressor may reuse its window buffer on the next push
    if (chunk.length > 0) pending.push(chunk.slice());
  });

  const push = (chunk: Uint8Array, final: boolean) => {
    try {
      decompressor.push(chunk, final);
    } catch (err) {
      throw new DecompressionError(`Corrupt zstd stream: ${describe(err)}`, err);
    }
  };

  let sawInput = false;
  for await (const raw of source) {
    const chunk = toUint8Array(raw);
    if (chunk.length === 0) continue;
    sawInput = true;
    push(chunk, false);
    while (pending.length > 0) {
      const next = pending.shift();
      if (next) yield next;
    }
  }

  if (!sawInput) {
    throw new DecompressionError("Compressed stream is empty");
  }
  push(new Uint8Array(0), true);
  while (pending.length > 0) {
    const next = pending.shift();
    if (next) yield next;
  }
}

/** UTF-8 decode a byte stream without splitting multi-byte characters across chunks. */
export async function* decodeText(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder("utf-8");
  for await (const bytes of chunks) {
    const text = decoder.decode(bytes, { stream: true });
    if (text) yield text;
  }
  const tail = decoder.decode();
  if (tail) yield tail;
}

/**
 * Decompress an archive to a plain .pgn file on disk.
 * Returns the number of decompressed bytes written.
 */
export async function decompressFile(input: string, output: string): Promise<number> {
  await assertZstdArchive(input);
  let written = 0;
  const counted = async function* (chunks: AsyncIterable<Uint8Array>) {
    for await (const chunk of chunks) {
      written += chunk.length;
      yield chunk;
    }
  };
  await pipeline(Readable.from(counted(decompress(openArchive(input)))), createWriteStream(output));
  return written;
}
