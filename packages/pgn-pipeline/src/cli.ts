/**
 * PGN pipeline CLI: fetch monthly archives, preprocess them into per-game
 * Avro records + manifest, load finished runs into Postgres.
 */

import { Command } from "commander";
import { basename, join } from "node:path";
import {
  loadConfig,
  loadEnvFile,
  parseMalformedPolicy,
  parseManifestFlush,
  parseManifestMode,
  parsePositiveInt,
  type PipelineConfig,
} from "./config";
import { decompressFile } from "./decompress";
import { downloadArchive } from "./download";
import { PipelineError, describe } from "./errors";
import { loadRecords } from "./load";
import { runPipeline } from "./pipeline";
import type { RunSummary } from "./types";

loadEnvFile();

const program = new Command()
  .name("pgn-pipeline")
  .description("Turn compressed PGN archives into per-game Avro records for warehouse loading")
  .version("0.1.0");

// ─── Shared helpers ──────────────────────────────────────────────────────────

function config(): PipelineConfig {
  return loadConfig();
}

function fail(err: unknown, note?: string): never {
  if (err instanceof PipelineError) {
    console.error(`\n  ✗ ${err.code}: ${err.message}`);
  } else {
    console.error(`\n  ✗ ${describe(err)}`);
  }
  if (note) console.error(`  ${note}`);
  console.error("");
  process.exit(1);
}

const RUN_ABORTED = "Run aborted: no manifest was committed for it.";

/** Default run directory for an archive: {dataDir}/records/{archive stem}. */
function defaultOutDir(cfg: PipelineConfig, archive: string): string {
  return join(cfg.dataDir, "records", basename(archive).replace(/\.pgn\.zst$|\.zst$/, ""));
}

interface PreprocessFlags {
  out?: string;
  concurrency?: string;
  onMalformed?: string;
  manifest?: string;
  manifestFlush?: string;
}

async function preprocess(archive: string, flags: PreprocessFlags, cfg: PipelineConfig): Promise<RunSummary> {
  const outDir = flags.out ?? defaultOutDir(cfg, archive);
  const concurrency = parsePositiveInt("--concurrency", flags.concurrency, cfg.concurrency);

  console.log(`\nPreprocessing ${archive}`);
  console.log(`  Output: ${outDir} (concurrency ${concurrency})\n`);

  const summary = await runPipeline({
    input: archive,
    outDir,
    concurrency,
    onMalformed: parseMalformedPolicy(flags.onMalformed, cfg.onMalformed),
    manifestMode: parseManifestMode(flags.manifest, cfg.manifestMode),
    manifestFlush: parseManifestFlush(flags.manifestFlush, cfg.manifestFlush),
    onProgress: (records) => {
      if (records % 10000 === 0) console.log(`  ${records} records written`);
    },
  });

  const secs = (summary.elapsedMs / 1000).toFixed(1);
  console.log(`\n─── Run Summary ───`);
  console.log(`  Records:              ${summary.records}`);
  console.log(`  Schema fields:        ${summary.schema.fields.map((f) => f.name).join(", ")}`);
  console.log(`  Skipped (malformed):  ${summary.skippedMalformed}`);
  console.log(`  Dropped (no result):  ${summary.droppedUnterminated}`);
  console.log(`  Manifest:             ${summary.manifestPath}`);
  console.log(`  Elapsed:              ${secs}s\n`);
  return summary;
}

function addPreprocessOptions(cmd: Command): Command {
  return cmd
    .option("-o, --out <dir>", "Output directory for record files + manifest")
    .option("-c, --concurrency <n>", "Parallel parse/write tasks")
    .option("--on-malformed <policy>", "abort | skip (later malformed games)")
    .option("--manifest <mode>", "truncate | append an existing manifest")
    .option("--manifest-flush <when>", "end | incremental");
}

// ─── fetch ────────────────────────────────────────────────────────────────────

program
  .command("fetch")
  .description("Download one month's compressed PGN archive")
  .requiredOption("--year <n>", "Archive year (e.g. 2024)")
  .requiredOption("--month <n>", "Archive month (1-12)")
  .option("--force", "Re-download even if the archive is cached")
  .action(async (opts) => {
    const cfg = config();
    try {
      const path = await downloadArchive(parseInt(opts.year, 10), parseInt(opts.month, 10), {
        dataDir: cfg.dataDir,
        baseUrl: cfg.archiveBaseUrl,
        force: Boolean(opts.force),
      });
      console.log(`\nArchive ready: ${path}\n`);
    } catch (err) {
      fail(err);
    }
  });

// ─── decompress ───────────────────────────────────────────────────────────────

program
  .command("decompress")
  .description("Decompress an archive to a plain .pgn file")
  .argument("<archive>", "Path to a .pgn.zst archive")
  .option("-o, --output <file>", "Output .pgn path (default: archive name without .zst)")
  .action(async (archive: string, opts) => {
    const output: string = opts.output ?? (archive.endsWith(".zst") ? archive.slice(0, -4) : `${archive}.pgn`);
    try {
      const bytes = await decompressFile(archive, output);
      const sizeMB = (bytes / 1024 / 1024).toFixed(1);
      console.log(`\n  Wrote ${sizeMB} MB to ${output}\n`);
    } catch (err) {
      fail(err);
    }
  });

// ─── preprocess ───────────────────────────────────────────────────────────────

addPreprocessOptions(
  program
    .command("preprocess")
    .description("Split, parse and serialize an archive into per-game Avro records + manifest")
    .argument("<archive>", "Path to a .pgn.zst archive"),
).action(async (archive: string, flags: PreprocessFlags) => {
  try {
    await preprocess(archive, flags, config());
  } catch (err) {
    fail(err, RUN_ABORTED);
  }
});

// ─── load ─────────────────────────────────────────────────────────────────────

program
  .command("load")
  .description("Insert a finished run's records into Postgres (DATABASE_URL)")
  .argument("<dir>", "Run output directory containing the manifest")
  .option("--table <name>", "Existing target table (game_id TEXT PRIMARY KEY, record JSONB)")
  .option("--batch <n>", "Rows per transaction")
  .action(async (dir: string, opts) => {
    try {
      const cfg = config();
      const result = await loadRecords(dir, {
        table: opts.table ?? cfg.loadTable,
        batchSize: parsePositiveInt("--batch", opts.batch, cfg.loadBatchSize),
        databaseUrl: cfg.databaseUrl,
        onProgress: (count, inserted) => console.log(`  Loaded ${count} (${inserted} new)`),
      });
      console.log(`\n  ${result.total} records: ${result.inserted} inserted, ${result.skipped} already present\n`);
    } catch (err) {
      fail(err);
    }
  });

// ─── run ──────────────────────────────────────────────────────────────────────

addPreprocessOptions(
  program
    .command("run")
    .description("Fetch + preprocess one month end to end")
    .requiredOption("--year <n>", "Archive year")
    .requiredOption("--month <n>", "Archive month (1-12)"),
).action(async (flags: PreprocessFlags & { year: string; month: string }) => {
  const cfg = config();
  try {
    console.log("Step 1: Fetch");
    const archive = await downloadArchive(parseInt(flags.year, 10), parseInt(flags.month, 10), {
      dataDir: cfg.dataDir,
      baseUrl: cfg.archiveBaseUrl,
    });
    console.log("\nStep 2: Preprocess");
    await preprocess(archive, flags, cfg);
  } catch (err) {
    fail(err, RUN_ABORTED);
  }
});

program.parseAsync().catch((err: unknown) => fail(err));
