/**
 * Transcript formatting utilities.
 *
 * Turns parsed TranscriptSegment arrays into the plain-text files written to
 * the output directory, with an optional metadata header.
 */

import { formatPublishDate } from "../reconcile/namer.js";
import type { MatchResult, TranscriptSegment } from "../types/index.js";

export const HEADER_RULE = "=".repeat(70);

/** Format seconds as HH:MM:SS */
export function formatTimestamp(seconds: number): string {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  const hours = Math.floor(total / 3600);
  const mins = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return [hours, mins, secs].map((n) => n.toString().padStart(2, "0")).join(":");
}

/**
 * Join segments into paragraphs separated by a blank line.
 *
 * Example output with timestamps:
 *   [00:00:00] Hello and welcome to the show.
 *
 *   [00:00:07] Today we have a great guest.
 */
export function formatSegments(segments: TranscriptSegment[], includeTimestamps: boolean): string {
  return segments
    .map((s) => (includeTimestamps ? `[${formatTimestamp(s.timestamp ?? 0)}] ${s.text}` : s.text))
    .join("\n\n");
}

/**
 * Header block written above a matched transcript.
 *
 *   Podcast: The Show
 *   Episode: Episode 12
 *   Date: 2023-04-01
 *   ======================================================================
 */
export function formatMetadataHeader(match: MatchResult): string {
  return (
    `Podcast: ${match.podcast.title}\n` +
    `Episode: ${match.episode.title}\n` +
    `Date: ${formatPublishDate(match.episode.publishTime)}\n` +
    `${HEADER_RULE}\n\n`
  );
}

export function formatTranscriptDocument(
  segments: TranscriptSegment[],
  match: MatchResult | undefined,
  includeTimestamps: boolean
): string {
  const body = formatSegments(segments, includeTimestamps);
  return match ? formatMetadataHeader(match) + body : body;
}
