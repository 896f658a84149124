/**
 * Trackid extraction.
 *
 * A transcript's filename stem is the only link back to its episode. The rules
 * below are tried top to bottom and the first one that applies decides the
 * result; add new filename patterns by inserting a rule.
 */

import { PODCAST_DIR_PATTERN, TRACKID_PREFIX } from "../config.js";
import type { TrackidExtractionResult, TranscriptFile } from "../types/index.js";
import type { Logger } from "../utils/log.js";
import type { ReconciliationState } from "./state.js";

/** Stems shorter than this are accepted but flagged low-confidence */
export const MIN_CONFIDENT_LENGTH = 8;

export interface TrackidRule {
  name: string;
  applies(stem: string): boolean;
  extract(stem: string): TrackidExtractionResult;
}

export const TRACKID_RULES: readonly TrackidRule[] = [
  {
    name: "prefixed",
    applies: (stem) => stem.startsWith(TRACKID_PREFIX),
    extract: (stem) => {
      const token = stem.slice(TRACKID_PREFIX.length);
      return token
        ? { token, succeeded: true, rule: "prefixed", lowConfidence: false }
        : { succeeded: false, rule: "prefixed", lowConfidence: false };
    },
  },
  {
    name: "stem",
    applies: (stem) => stem.length >= MIN_CONFIDENT_LENGTH,
    extract: (stem) => ({ token: stem, succeeded: true, rule: "stem", lowConfidence: false }),
  },
  {
    name: "short-stem",
    applies: (stem) => stem.length > 0,
    extract: (stem) => ({ token: stem, succeeded: true, rule: "short-stem", lowConfidence: true }),
  },
];

export function extractTrackid(
  stem: string,
  rules: readonly TrackidRule[] = TRACKID_RULES
): TrackidExtractionResult {
  for (const rule of rules) {
    if (rule.applies(stem)) return rule.extract(stem);
  }
  return { succeeded: false, rule: "none", lowConfidence: false };
}

/**
 * Extract the trackid for a discovered file, recording failures in the
 * batch state for the failed-parse report.
 */
export function resolveTrackid(
  file: TranscriptFile,
  state: ReconciliationState,
  logger: Logger,
  rules: readonly TrackidRule[] = TRACKID_RULES
): TrackidExtractionResult {
  const result = extractTrackid(file.stem, rules);

  if (!result.succeeded) {
    state.recordFailedParse(file);
    logger.debug(`  trackid: no token in "${file.fileName}" (rule ${result.rule})`);
  } else if (result.lowConfidence) {
    logger.debug(`  trackid: short stem "${file.stem}" accepted with low confidence`);
  } else {
    logger.debug(`  trackid: ${result.token} (rule ${result.rule})`);
  }

  return result;
}

/**
 * Podcast primary key from the nearest ancestor folder named PodcastContent<digits>.
 */
export function parsePodcastId(filePath: string): number | undefined {
  const segments = filePath.split(/[\\/]/).filter(Boolean);
  // Last segment is the file itself
  for (let i = segments.length - 2; i >= 0; i--) {
    const match = PODCAST_DIR_PATTERN.exec(segments[i]);
    if (match) {
      const id = Number(match[1]);
      // Ids past 2^53 would round to another podcast's id
      return Number.isSafeInteger(id) ? id : undefined;
    }
  }
  return undefined;
}
