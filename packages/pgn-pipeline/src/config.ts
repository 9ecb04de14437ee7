/**
 * Environment + defaults for the CLI. Flags passed on the command line win
 * over anything read here.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_ARCHIVE_BASE_URL } from "./download";
import { ConfigError } from "./errors";
import { DEFAULT_LOAD_BATCH, DEFAULT_LOAD_TABLE } from "./load";
import { DEFAULT_CONCURRENCY } from "./pipeline";
import type { MalformedPolicy, ManifestFlush, ManifestMode } from "./types";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PACKAGE_ROOT = join(__dirname, "..");
const REPO_ROOT = join(PACKAGE_ROOT, "..", "..");

export interface PipelineConfig {
  dataDir: string; // archives land here, run output goes under {dataDir}/records
  concurrency: number;
  onMalformed: MalformedPolicy;
  manifestMode: ManifestMode;
  manifestFlush: ManifestFlush;
  archiveBaseUrl: string;
  loadTable: string;
  loadBatchSize: number;
  databaseUrl: string | undefined; // only the load command needs it
}

// ─── .env files ──────────────────────────────────────────────────────────────

const ENV_LINE = /^\s*([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*?)\s*$/;

/** KEY=VALUE pairs of an env file; `#` lines are comments, matching quotes are stripped. */
export function parseEnvLines(content: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const line of content.split(/\r?\n/)) {
    if (line.trimStart().startsWith("#")) continue;
    const match = ENV_LINE.exec(line);
    if (!match) continue;
    const value = match[2];
    const quoted = value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0]);
    pairs.push([match[1], quoted ? value.slice(1, -1) : value]);
  }
  return pairs;
}

/** Fill unset variables from `.env`, then `.env.local`. Variables already set win. */
export function loadEnvFile(root: string = REPO_ROOT, env: NodeJS.ProcessEnv = process.env): void {
  for (const name of [".env", ".env.local"]) {
    const envPath = join(root, name);
    if (!existsSync(envPath)) continue;
    for (const [key, value] of parseEnvLines(readFileSync(envPath, "utf-8"))) {
      if (!env[key]) env[key] = value;
    }
  }
}

function oneOf<T extends string>(name: string, value: string | undefined, allowed: readonly T[], fallback: T): T {
  if (value === undefined || value === "") return fallback;
  const match = allowed.find((a) => a === value);
  if (!match) throw new ConfigError(`${name} must be one of ${allowed.join(", ")}, got "${value}"`);
  return match;
}

export function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  return n;
}

export const MALFORMED_POLICIES = ["abort", "skip"] as const;
export const MANIFEST_MODES = ["truncate", "append"] as const;
export const MANIFEST_FLUSHES = ["end", "incremental"] as const;

export function parseMalformedPolicy(value: string | undefined, fallback: MalformedPolicy = "abort"): MalformedPolicy {
  return oneOf("on-malformed", value, MALFORMED_POLICIES, fallback);
}

export function parseManifestMode(value: string | undefined, fallback: ManifestMode = "truncate"): ManifestMode {
  return oneOf("manifest mode", value, MANIFEST_MODES, fallback);
}

export function parseManifestFlush(value: string | undefined, fallback: ManifestFlush = "end"): ManifestFlush {
  return oneOf("manifest flush", value, MANIFEST_FLUSHES, fallback);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  return {
    dataDir: env.PGN_DATA_DIR || join(PACKAGE_ROOT, "data"),
    concurrency: parsePositiveInt("PGN_CONCURRENCY", env.PGN_CONCURRENCY, DEFAULT_CONCURRENCY),
    onMalformed: parseMalformedPolicy(env.PGN_ON_MALFORMED),
    manifestMode: parseManifestMode(env.PGN_MANIFEST_MODE),
    manifestFlush: parseManifestFlush(env.PGN_MANIFEST_FLUSH),
    archiveBaseUrl: env.PGN_ARCHIVE_BASE_URL || DEFAULT_ARCHIVE_BASE_URL,
    loadTable: env.PGN_LOAD_TABLE || DEFAULT_LOAD_TABLE,
    loadBatchSize: parsePositiveInt("PGN_LOAD_BATCH", env.PGN_LOAD_BATCH, DEFAULT_LOAD_BATCH),
    databaseUrl: env.DATABASE_URL || undefined,
  };
}
