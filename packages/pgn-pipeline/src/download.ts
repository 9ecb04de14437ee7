/**
 * Download monthly rated-game archives.
 *
 * URL pattern: {base}/lichess_db_standard_rated_{YYYY}-{MM}.pgn.zst
 * Archives are written to `{dataDir}/lichess_{YYYY}-{MM}.pgn.zst` and reused
 * when already present. No retries: a failed download is reported and left
 * for the caller to rerun.
 */

import { createWriteStream, existsSync, mkdirSync } from "node:fs";
import { rename, rm } from "node:fs/promises";
import { join } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { ArchiveFetchError, describe } from "./errors";

export const DEFAULT_ARCHIVE_BASE_URL = "https://database.lichess.org/standard";

export interface DownloadOptions {
  dataDir: string;
  baseUrl?: string;
  force?: boolean; // Re-download even if the archive is cached
  onProgress?: (received: number, total: number | null) => void;
}

function yearMonth(year: number, month: number): string {
  if (!Number.isInteger(year) || year < 2013 || year > 9999) {
    throw new RangeError(`Invalid archive year: ${year}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`Invalid archive month: ${month}`);
  }
  return `${year}-${String(month).padStart(2, "0")}`;
}

export function archiveFileName(year: number, month: number): string {
  return `lichess_${yearMonth(year, month)}.pgn.zst`;
}

export function archiveUrl(year: number, month: number, baseUrl = DEFAULT_ARCHIVE_BASE_URL): string {
  return `${baseUrl.replace(/\/+$/, "")}/lichess_db_standard_rated_${yearMonth(year, month)}.pgn.zst`;
}

/** Download one month's archive. Returns the local path. */
export async function downloadArchive(year: number, month: number, opts: DownloadOptions): Promise<string> {
  const url = archiveUrl(year, month, opts.baseUrl);
  const filePath = join(opts.dataDir, archiveFileName(year, month));

  if (existsSync(filePath) && !opts.force) {
    console.log(`  Using cached archive ${filePath}`);
    return filePath;
  }
  if (!existsSync(opts.dataDir)) {
    mkdirSync(opts.dataDir, { recursive: true });
  }

  const partPath = `${filePath}.part`;
  console.log(`  Downloading ${url}...`);

  let res: Response;
  try {
    res = await fetch(url);
  } catch (err) {
    throw new ArchiveFetchError(url, describe(err), err);
  }
  if (!res.ok) throw new ArchiveFetchError(url, `HTTP ${res.status}`);
  if (!res.body) throw new ArchiveFetchError(url, "empty response body");

  const header = res.headers.get("content-length");
  const total = header ? parseInt(header, 10) : null;
  let received = 0;
  let nextReport = 0.1;

  const body = Readable.fromWeb(res.body);
  body.on("data", (chunk: Buffer) => {
    received += chunk.length;
    opts.onProgress?.(received, total);
    if (total && received / total >= nextReport) {
      const mb = (received / 1024 / 1024).toFixed(1);
      console.log(`  ${Math.floor((received / total) * 100)}% (${mb} MB)`);
      while (received / total >= nextReport) nextReport += 0.1;
    }
  });

  try {
    await pipeline(body, createWriteStream(partPath));
    await rename(partPath, filePath);
  } catch (err) {
    await rm(partPath, { force: true });
    throw new ArchiveFetchError(url, describe(err), err);
  }

  const sizeMB = (received / 1024 / 1024).toFixed(1);
  console.log(`  Saved ${sizeMB} MB to ${filePath}`);
  return filePath;
}
