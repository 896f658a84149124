/**
 * Main entry point for programmatic usage.
 * Re-exports all public APIs for use as a library.
 */

export { parseTtml, parseTtmlFile, parseTimeExpression } from "./adapters/ttml-parser.js";
export { LibraryDatabase, loadMetadataIndex } from "./storage/database.js";
export { MetadataIndex } from "./reconcile/metadata-index.js";
export { extractTrackid, resolveTrackid, parsePodcastId, TRACKID_RULES } from "./reconcile/trackid.js";
export { matchEpisode } from "./reconcile/matcher.js";
export {
  buildOutputName,
  formatPublishDate,
  resolveCollision,
  sanitizeFilename,
} from "./reconcile/namer.js";
export { ReconciliationState } from "./reconcile/state.js";
export { buildReport, renderSummary, writeReports } from "./reconcile/reporter.js";
export { runExtraction, processTranscriptFile, findTranscriptFiles } from "./extract.js";
export { searchTranscripts, formatSearchResults } from "./search.js";
export { getLibraryDbPath, getTtmlDir } from "./config.js";
export { TranscriptSourceError, TtmlParseError } from "./errors.js";
export { createLogger, silentLogger } from "./utils/log.js";
export type { Logger, LogLevel } from "./utils/log.js";
export type { ExtractOptions, ExtractionResult } from "./extract.js";
export type { TrackidRule } from "./reconcile/trackid.js";
export type {
  TranscriptSegment,
  TranscriptFile,
  PodcastRecord,
  EpisodeRecord,
  TrackidExtractionResult,
  MatchResult,
  MatchTier,
  MappingRow,
  ReconciliationReport,
  ReconciliationSummary,
  SearchOptions,
  SearchMatch,
} from "./types/index.js";
