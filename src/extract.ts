/**
 * Extraction pipeline - turns cached TTML transcripts into text files named
 * after their episode, then writes the reconciliation reports.
 *
 * Per file: parse → trackid → podcast folder → match → name → write.
 * Files are processed one at a time; a failure in one file is recorded and
 * the batch moves on.
 */

import {
  existsSync,
  mkdirSync,
  readdirSync,
  statSync,
  writeFileSync,
  type Dirent,
} from "node:fs";
import { basename, extname, join, resolve } from "node:path";
import { parseTtmlFile } from "./adapters/ttml-parser.js";
import {
  DEFAULT_OUTPUT_DIR,
  TRANSCRIPT_EXTENSION,
  getLibraryDbPath,
  getTtmlDir,
} from "./config.js";
import { TranscriptSourceError } from "./errors.js";
import type { MetadataIndex } from "./reconcile/metadata-index.js";
import { matchEpisode } from "./reconcile/matcher.js";
import { buildOutputName, formatPublishDate, resolveCollision } from "./reconcile/namer.js";
import { buildReport, writeReports, type WriteReportsResult } from "./reconcile/reporter.js";
import { ReconciliationState } from "./reconcile/state.js";
import { parsePodcastId, resolveTrackid } from "./reconcile/trackid.js";
import { loadMetadataIndex } from "./storage/database.js";
import type {
  MappingRow,
  MatchResult,
  ReconciliationReport,
  TranscriptFile,
  TranscriptSegment,
} from "./types/index.js";
import { formatTranscriptDocument } from "./utils/format-transcript.js";
import { createLogger, silentLogger, type Logger } from "./utils/log.js";

export interface ExtractOptions {
  /** Directory scanned for .ttml files (default: the app's cache) */
  ttmlDir?: string;
  /** Library database (default: the app's MTLibrary.sqlite) */
  dbPath?: string;
  /** Where transcripts and reports are written */
  outputDir?: string;
  /** Prefix each paragraph with [HH:MM:SS] */
  includeTimestamps?: boolean;
  /** Process only these files instead of scanning ttmlDir */
  files?: string[];
  logger?: Logger;
}

export interface ExtractionContext {
  index: MetadataIndex;
  state: ReconciliationState;
  outputDir: string;
  includeTimestamps: boolean;
  logger: Logger;
}

export interface ExtractionResult {
  report: ReconciliationReport;
  outputDir: string;
  reportFiles: WriteReportsResult;
}

/** Directory listing used by discovery */
export type ListDirectory = (dir: string) => Dirent[];

const listDirectory: ListDirectory = (dir) => readdirSync(dir, { withFileTypes: true });

function isTranscriptName(name: string): boolean {
  return extname(name).toLowerCase() === TRANSCRIPT_EXTENSION;
}

/**
 * All transcript documents under `dir`, recursively, in sorted path order.
 *
 * An unreadable root is a TranscriptSourceError. Unreadable subdirectories and
 * broken symlinks are warned about and skipped. Symlinked files are included;
 * symlinked directories are not descended into.
 */
export function findTranscriptFiles(
  dir: string,
  logger: Logger = silentLogger,
  list: ListDirectory = listDirectory
): string[] {
  const found: string[] = [];

  function walk(current: string): void {
    let entries: Dirent[];
    try {
      entries = list(current);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      if (current === dir) {
        throw new TranscriptSourceError(dir, `Cannot read TTML directory ${dir}: ${msg}`);
      }
      logger.warn(`Warning: skipping unreadable directory ${current}: ${msg}`);
      return;
    }

    for (const entry of entries) {
      const full = join(current, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (!isTranscriptName(entry.name)) {
        continue;
      } else if (entry.isFile()) {
        found.push(full);
      } else if (entry.isSymbolicLink()) {
        try {
          if (statSync(full).isFile()) found.push(full);
        } catch (err) {
          const msg = err instanceof Error ? err.message : String(err);
          logger.warn(`Warning: skipping broken link ${full}: ${msg}`);
        }
      }
    }
  }

  walk(dir);
  return found.sort();
}

export function toTranscriptFile(path: string): TranscriptFile {
  const fileName = basename(path);
  return { path, fileName, stem: fileName.slice(0, fileName.length - extname(fileName).length) };
}

function buildMappingRow(
  file: TranscriptFile,
  trackid: string,
  outputFile: string,
  match: MatchResult | undefined
): MappingRow {
  if (!match) {
    return { transcriptFile: file.fileName, trackid, outputFile, matched: false };
  }
  return {
    transcriptFile: file.fileName,
    trackid,
    outputFile,
    matched: true,
    podcastTitle: match.podcast.title,
    episodeTitle: match.episode.title,
    pubDate: formatPublishDate(match.episode.publishTime),
    author: match.podcast.author,
    tier: match.tier,
  };
}

/**
 * Reconcile and write a single transcript.
 * Returns the mapping row, or undefined when the document had no text.
 */
export function processTranscriptFile(
  file: TranscriptFile,
  ctx: ExtractionContext
): MappingRow | undefined {
  const { index, state, outputDir, includeTimestamps, logger } = ctx;

  let segments: TranscriptSegment[];
  try {
    segments = parseTtmlFile(file.path);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.error(`Error parsing ${file.fileName}: ${msg}`);
    state.recordEmptyDocument(file, msg);
    return undefined;
  }

  if (segments.length === 0) {
    logger.info(`No content extracted from ${file.fileName}`);
    state.recordEmptyDocument(file, "no text segments");
    return undefined;
  }

  const extraction = resolveTrackid(file, state, logger);
  const podcastId = parsePodcastId(file.path);

  // A file without a trackid cannot be reconciled, so it is never matched
  let match: MatchResult | undefined;
  if (extraction.succeeded && extraction.token) {
    state.recordTranscript(extraction.token, file);
    match = matchEpisode(podcastId, extraction.token, index);
    if (match) state.recordMatch(extraction.token);
  }

  if (match) {
    logger.debug(`  match: ${match.tier} → "${match.episode.title}" (${match.podcast.title})`);
  } else {
    logger.debug(`  match: none (podcast ${podcastId ?? "unknown"})`);
  }

  const candidate = buildOutputName(match, podcastId, file.stem);
  let outputFile = "";
  try {
    const outputPath = resolveCollision(outputDir, candidate);
    outputFile = basename(outputPath);
    if (outputFile !== candidate) logger.debug(`  name taken, using ${outputFile}`);

    writeFileSync(outputPath, formatTranscriptDocument(segments, match, includeTimestamps), "utf-8");
    logger.info(`✓ Saved: ${outputFile}`);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.error(`✗ Could not write ${outputFile || candidate}: ${msg}`);
    state.recordWriteFailure(file, msg);
    outputFile = "";
  }

  const row = buildMappingRow(file, extraction.token ?? file.stem, outputFile, match);
  state.recordMapping(row);
  return row;
}

function discoverFiles(ttmlDir: string, files: string[] | undefined, logger: Logger): string[] {
  if (files) {
    return files.map((f) => {
      const path = resolve(f);
      if (!existsSync(path)) {
        throw new TranscriptSourceError(path, `File not found: ${path}`);
      }
      return path;
    });
  }

  if (!existsSync(ttmlDir)) {
    throw new TranscriptSourceError(ttmlDir, `TTML directory not found at ${ttmlDir}`);
  }
  if (!statSync(ttmlDir).isDirectory()) {
    throw new TranscriptSourceError(ttmlDir, `TTML path is not a directory: ${ttmlDir}`);
  }
  return findTranscriptFiles(ttmlDir, logger);
}

/**
 * Run a full batch: discover, reconcile and write every transcript, then
 * write the mapping table and diagnostic logs.
 *
 * Throws TranscriptSourceError only when the transcript source itself is
 * missing; everything else is recorded in the report.
 */
export function runExtraction(options: ExtractOptions = {}): ExtractionResult {
  const logger = options.logger ?? createLogger();
  const ttmlDir = resolve(options.ttmlDir ?? getTtmlDir());
  const dbPath = resolve(options.dbPath ?? getLibraryDbPath());
  const outputDir = resolve(options.outputDir ?? DEFAULT_OUTPUT_DIR);

  const paths = discoverFiles(ttmlDir, options.files, logger);

  try {
    mkdirSync(outputDir, { recursive: true });
  } catch (err) {
    logger.error(
      `Could not create output directory ${outputDir}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const index = loadMetadataIndex(dbPath, logger);
  const state = new ReconciliationState(index.guids());
  state.discovered = paths.length;

  if (paths.length === 0) {
    logger.info("No TTML files found.");
  } else {
    logger.info(`Found ${paths.length} transcript file(s)\n`);
  }

  const ctx: ExtractionContext = {
    index,
    state,
    outputDir,
    includeTimestamps: options.includeTimestamps ?? false,
    logger,
  };

  for (const path of paths) {
    logger.debug(`Processing ${path}`);
    processTranscriptFile(toTranscriptFile(path), ctx);
  }

  const report = buildReport(state);
  const reportFiles = writeReports(report, outputDir, logger);
  return { report, outputDir, reportFiles };
}
