import { existsSync } from "node:fs";
import { extname, join } from "node:path";
import type { MatchResult } from "../types/index.js";

export const MAX_NAME_LENGTH = 100;
export const UNKNOWN_DATE = "UnknownDate";

/** Publish times count seconds from 2001-01-01T00:00:00Z */
const REFERENCE_EPOCH_MS = Date.UTC(2001, 0, 1);

function stripEdges(text: string): string {
  return text.replace(/^[_.]+|[_.]+$/g, "");
}

/**
 * Make a title safe to use as part of a filename.
 * Truncation counts code points, so surrogate pairs are never split.
 */
export function sanitizeFilename(text: string): string {
  let out = text
    .replace(/[<>:"/\\|?*]/g, "")
    .replace(/\s+/g, "_")
    .replace(/[\u0000-\u001f\u007f]/g, "");
  out = stripEdges(out);

  const chars = Array.from(out);
  if (chars.length > MAX_NAME_LENGTH) {
    out = stripEdges(chars.slice(0, MAX_NAME_LENGTH).join(""));
  }

  return out || "Untitled";
}

/** Render a publish time as YYYY-MM-DD, or UnknownDate when absent or out of range */
export function formatPublishDate(publishTime: number | undefined): string {
  if (publishTime === undefined || !Number.isFinite(publishTime)) return UNKNOWN_DATE;

  const date = new Date(REFERENCE_EPOCH_MS + publishTime * 1000);
  if (Number.isNaN(date.getTime())) return UNKNOWN_DATE;

  const year = date.getUTCFullYear();
  if (year < 1 || year > 9999) return UNKNOWN_DATE;

  return date.toISOString().slice(0, 10);
}

/**
 * Candidate output filename for a transcript.
 *
 * Matched: Podcast_YYYY-MM-DD_Episode.txt
 * Unmatched inside a podcast folder: Podcast_<id>_<stem>.txt
 * Otherwise: <stem>.txt
 */
export function buildOutputName(
  match: MatchResult | undefined,
  podcastId: number | undefined,
  fallbackStem: string
): string {
  if (match) {
    const podcast = sanitizeFilename(match.podcast.title);
    const episode = sanitizeFilename(match.episode.title);
    return `${podcast}_${formatPublishDate(match.episode.publishTime)}_${episode}.txt`;
  }
  if (podcastId !== undefined) {
    return `Podcast_${podcastId}_${fallbackStem}.txt`;
  }
  return `${fallbackStem}.txt`;
}

/**
 * First free path for `filename` in `dir`: the name itself, then
 * name_1, name_2, … before the extension. Never returns an existing path.
 */
export function resolveCollision(
  dir: string,
  filename: string,
  exists: (path: string) => boolean = existsSync
): string {
  const candidate = join(dir, filename);
  if (!exists(candidate)) return candidate;

  const ext = extname(filename);
  const base = filename.slice(0, filename.length - ext.length);
  for (let counter = 1; ; counter++) {
    const next = join(dir, `${base}_${counter}${ext}`);
    if (!exists(next)) return next;
  }
}
