import { homedir } from "node:os";
import { resolve } from "node:path";

export const DEFAULT_OUTPUT_DIR = "transcripts_with_metadata";

/** Extension of transcript documents in the cache */
export const TRANSCRIPT_EXTENSION = ".ttml";

/** Filename prefix written by the app's transcript generator */
export const TRACKID_PREFIX = "transcript_";

/** Cache folder that carries the podcast's primary key, e.g. PodcastContent42 */
export const PODCAST_DIR_PATTERN = /^PodcastContent(\d+)$/;

const GROUP_CONTAINER = "243LU875E5.groups.com.apple.podcasts";

function getGroupContainerDir(): string {
  return resolve(homedir(), "Library", "Group Containers", GROUP_CONTAINER);
}

/**
 * Directory holding cached TTML transcripts.
 * Override with TTML_RECONCILE_TTML_DIR.
 */
export function getTtmlDir(): string {
  const override = process.env.TTML_RECONCILE_TTML_DIR;
  if (override) return resolve(override);
  return resolve(getGroupContainerDir(), "Library", "Cache", "Assets", "TTML");
}

/**
 * Path to the podcast library database.
 * Override with TTML_RECONCILE_DB_PATH.
 */
export function getLibraryDbPath(): string {
  const override = process.env.TTML_RECONCILE_DB_PATH;
  if (override) return resolve(override);
  return resolve(getGroupContainerDir(), "Documents", "MTLibrary.sqlite");
}
