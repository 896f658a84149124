/** Core types for the transcript reconciler */

// ---- Transcript documents ----

export interface TranscriptSegment {
  /** Offset from the start of the episode, in seconds */
  readonly timestamp?: number;
  /** Paragraph text, whitespace-normalized */
  readonly text: string;
}

/** A transcript file discovered in the cache */
export interface TranscriptFile {
  /** Absolute path to the .ttml file */
  path: string;
  /** Base name including extension */
  fileName: string;
  /** Base name without extension */
  stem: string;
}

// ---- Library metadata ----

export interface PodcastRecord {
  title: string;
  author: string;
}

export interface EpisodeRecord {
  title: string;
  /** Seconds since 2001-01-01T00:00:00Z */
  publishTime?: number;
  guid?: string;
}

/** Podcast row as supplied to the index builder */
export interface PodcastInput extends PodcastRecord {
  id: number;
}

/** Episode row as supplied to the index builder */
export interface EpisodeInput extends EpisodeRecord {
  podcastId: number;
}

// ---- Reconciliation ----

export interface TrackidExtractionResult {
  token?: string;
  succeeded: boolean;
  /** Name of the rule that produced this result */
  rule: string;
  /** Accepted, but the stem was too short to be a reliable identifier */
  lowConfidence: boolean;
}

/**
 * How an episode was selected:
 * - exact: guid equals the trackid
 * - substring: one contains the other (both longer than 10 chars)
 * - recency: no guid hit, newest episode of the podcast
 * - placeholder: podcast has no episodes at all
 */
export type MatchTier = "exact" | "substring" | "recency" | "placeholder";

export interface MatchResult {
  podcast: PodcastRecord;
  episode: EpisodeRecord;
  tier: MatchTier;
}

/** One row of the transcript → output mapping table */
export interface MappingRow {
  transcriptFile: string;
  trackid: string;
  outputFile: string;
  matched: boolean;
  podcastTitle?: string;
  episodeTitle?: string;
  pubDate?: string;
  author?: string;
  /** Not part of the CSV; kept for the summary */
  tier?: MatchTier;
}

export interface UnmatchedTranscript {
  fileName: string;
  trackid: string;
  path: string;
}

export interface FileFailure {
  fileName: string;
  path: string;
  reason: string;
}

export interface ReconciliationSummary {
  discovered: number;
  processed: number;
  matched: number;
  unmatched: number;
  failedParses: number;
  unmatchedDbEntries: number;
  emptyDocuments: number;
  writeFailures: number;
  /** Matches that fell through to the newest-episode fallback */
  recencyFallbacks: number;
}

export interface ReconciliationReport {
  unmatchedTranscripts: UnmatchedTranscript[];
  unmatchedDbEntries: string[];
  failedParses: TranscriptFile[];
  mappings: MappingRow[];
  summary: ReconciliationSummary;
}

// ---- Search ----

export interface SearchOptions {
  /** Directory containing .txt transcripts */
  dir: string;
  /** Case-insensitive substring to look for */
  query: string;
  /** Lines of context either side of a hit */
  context?: number;
  /** Max hits to return, 0 for unlimited */
  limit?: number;
}

export interface SearchMatch {
  file: string;
  /** 1-based */
  lineNumber: number;
  /** Context block including the matching line */
  lines: string[];
}
