/**
 * Run manifest: the list of every game_id a run produced, one per line.
 *
 * Entries go to `games.partial` while the run is in progress and are renamed
 * to `games` only by commit(). A directory without `games` therefore never
 * passes for a finished run, whichever flush mode was used.
 */

import { createReadStream, createWriteStream, existsSync, type WriteStream } from "node:fs";
import { appendFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createInterface } from "node:readline";
import { once } from "node:events";
import { finished } from "node:stream/promises";
import { ManifestMissingError } from "./errors";
import type { ManifestFlush, ManifestMode } from "./types";

export const MANIFEST_FILENAME = "games";
export const PARTIAL_SUFFIX = ".partial";

export interface ManifestOptions {
  mode?: ManifestMode;
  flush?: ManifestFlush;
}

export class ManifestWriter {
  readonly path: string;
  readonly partialPath: string;
  readonly mode: ManifestMode;
  readonly flush: ManifestFlush;

  private ids: string[] = [];
  private stream: WriteStream | null = null;
  private written = 0;
  private streamError: unknown = null;
  private state: "idle" | "open" | "committed" | "aborted" = "idle";

  constructor(outDir: string, opts?: ManifestOptions) {
    this.path = join(outDir, MANIFEST_FILENAME);
    this.partialPath = this.path + PARTIAL_SUFFIX;
    this.mode = opts?.mode ?? "truncate";
    this.flush = opts?.flush ?? "end";
  }

  /** Number of ids recorded in this run. */
  get count(): number {
    return this.written;
  }

  async open(): Promise<void> {
    if (this.state !== "idle") throw new Error(`Manifest already ${this.state}`);

    await rm(this.partialPath, { force: true });
    if (this.mode === "truncate") {
      // A stale manifest from an earlier run must not outlive a failed rerun
      await rm(this.path, { force: true });
      await writeFile(this.partialPath, "");
    } else if (existsSync(this.path)) {
      // Moved, not copied: until commit there is no `games`, even when appending
      await rename(this.path, this.partialPath);
    } else {
      await writeFile(this.partialPath, "");
    }

    if (this.flush === "incremental") {
      this.stream = createWriteStream(this.partialPath, { flags: "a" });
      this.stream.on("error", (err) => {
        this.streamError ??= err;
      });
      await once(this.stream, "open");
    }
    this.state = "open";
  }

  /**
   * Single writer for the run: callers never touch the file directly. In
   * incremental mode the returned promise waits for the stream to drain.
   */
  async record(gameId: string): Promise<void> {
    if (this.state !== "open") throw new Error(`Cannot record into manifest (${this.state})`);
    if (this.streamError) throw this.streamError;
    this.written++;
    if (!this.stream) {
      this.ids.push(gameId);
      return;
    }
    if (!this.stream.write(`${gameId}\n`)) await once(this.stream, "drain");
  }

  /** Flush everything and publish the manifest under its final name. */
  async commit(): Promise<string> {
    if (this.state !== "open") throw new Error(`Cannot commit manifest (${this.state})`);
    if (this.stream) {
      await this.closeStream();
    } else if (this.ids.length > 0) {
      await appendFile(this.partialPath, this.ids.join("\n") + "\n");
      this.ids = [];
    }
    await rename(this.partialPath, this.path);
    this.state = "committed";
    return this.path;
  }

  /**
   * Stop without publishing. Whatever reached `games.partial` stays on disk
   * for inspection (in append mode, after the previous run's ids); `games` is
   * not recreated.
   */
  async abort(): Promise<void> {
    if (this.state !== "open") return;
    if (this.stream) await this.closeStream();
    this.ids = [];
    this.state = "aborted";
  }

  private async closeStream(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    this.stream = null;
    stream.end();
    await finished(stream);
    if (this.streamError) throw this.streamError;
  }
}

/** Stream the ids of a committed manifest. */
export async function* readManifest(outDir: string): AsyncGenerator<string> {
  const path = join(outDir, MANIFEST_FILENAME);
  if (!existsSync(path)) throw new ManifestMissingError(path);

  const rl = createInterface({ input: createReadStream(path, "utf-8"), crlfDelay: Infinity });
  for await (const line of rl) {
    const id = line.trim();
    if (id) yield id;
  }
}
