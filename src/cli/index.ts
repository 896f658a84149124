#!/usr/bin/env node

/**
 * CLI for the transcript reconciler.
 * Extracts cached TTML transcripts with library metadata and searches the results.
 */

import { Command } from "commander";
import { DEFAULT_OUTPUT_DIR } from "../config.js";
import { TranscriptSourceError } from "../errors.js";
import { runExtraction } from "../extract.js";
import { renderSummary } from "../reconcile/reporter.js";
import { formatSearchResults, searchTranscripts } from "../search.js";
import { createLogger } from "../utils/log.js";

function parseIntArg(value: string): number {
  const n = parseInt(value, 10);
  if (Number.isNaN(n) || n < 0) throw new Error(`Expected a non-negative number, got "${value}"`);
  return n;
}

interface ExtractCommandOptions {
  output: string;
  timestamps?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  ttmlDir?: string;
  db?: string;
  file?: string;
}

interface SearchCommandOptions {
  dir: string;
  context: number;
  limit: number;
}

const program = new Command();

program
  .name("ttml-reconcile")
  .description(
    "Extract podcast transcripts from the local TTML cache, name them after\n" +
      "their episodes, and report everything that could not be reconciled."
  )
  .version("1.0.0");

// ---- extract ----
program
  .command("extract", { isDefault: true })
  .description("Extract all cached transcripts with episode metadata")
  .option("-o, --output <dir>", "Output directory for transcripts and reports", DEFAULT_OUTPUT_DIR)
  .option("--timestamps", "Prefix each paragraph with [HH:MM:SS]")
  .option("-v, --verbose", "Trace trackid, matching and naming decisions")
  .option("--quiet", "Only print warnings, errors and the summary")
  .option("--ttml-dir <dir>", "TTML cache directory (default: the app's cache)")
  .option("--db <path>", "Library database (default: the app's MTLibrary.sqlite)")
  .option("-f, --file <path>", "Extract a single TTML file instead of the whole cache")
  .action((opts: ExtractCommandOptions) => {
    const logger = createLogger(opts.verbose ? "verbose" : opts.quiet ? "quiet" : "normal");

    try {
      const { report, outputDir } = runExtraction({
        outputDir: opts.output,
        includeTimestamps: opts.timestamps ?? false,
        ttmlDir: opts.ttmlDir,
        dbPath: opts.db,
        files: opts.file ? [opts.file] : undefined,
        logger,
      });

      console.log(`\n${renderSummary(report)}`);
      console.log(`\nOutput written to: ${outputDir}`);
    } catch (err) {
      if (err instanceof TranscriptSourceError) {
        console.error(`Error: ${err.message}`);
        console.error("\nMake sure you have:");
        console.error("1. Downloaded podcast episodes in the Podcasts app");
        console.error("2. Episodes have transcripts available");
        console.error("3. Opened/played episodes to trigger transcript download");
        process.exit(1);
      }
      throw err;
    }
  });

// ---- search ----
program
  .command("search <query>")
  .description("Search across extracted transcript text files")
  .option("--dir <dir>", "Directory containing .txt transcripts", DEFAULT_OUTPUT_DIR)
  .option("--context <n>", "Context lines before/after each match", parseIntArg, 2)
  .option("-n, --limit <n>", "Max matches to show (0 = no limit)", parseIntArg, 50)
  .action((query: string, opts: SearchCommandOptions) => {
    try {
      const results = searchTranscripts({
        dir: opts.dir,
        query,
        context: opts.context,
        limit: opts.limit,
      });
      console.log(formatSearchResults(results, query, opts.context));
    } catch (err) {
      if (err instanceof TranscriptSourceError) {
        console.error(`Error: ${err.message}`);
        console.error("Run 'extract' first, or adjust --dir.");
        process.exit(1);
      }
      throw err;
    }
  });

program.parse();
