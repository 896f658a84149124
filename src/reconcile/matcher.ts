import type { EpisodeRecord, MatchResult } from "../types/index.js";
import type { MetadataIndex } from "./metadata-index.js";

/** Substring matching only applies when the shorter string is longer than this */
export const MIN_SUBSTRING_LENGTH = 10;

export const UNKNOWN_EPISODE: EpisodeRecord = Object.freeze({ title: "Unknown Episode" });

function findExact(episodes: readonly EpisodeRecord[], trackid: string): EpisodeRecord | undefined {
  return episodes.find((e) => e.guid !== undefined && e.guid === trackid);
}

function findSubstring(
  episodes: readonly EpisodeRecord[],
  trackid: string
): EpisodeRecord | undefined {
  return episodes.find((e) => {
    if (!e.guid) return false;
    if (Math.min(e.guid.length, trackid.length) <= MIN_SUBSTRING_LENGTH) return false;
    return e.guid.includes(trackid) || trackid.includes(e.guid);
  });
}

/** Newest dated episode (first one wins a tie), else the first in store order */
function findMostRecent(episodes: readonly EpisodeRecord[]): EpisodeRecord {
  let newest: EpisodeRecord | undefined;
  let newestTime = -Infinity;
  for (const e of episodes) {
    if (e.publishTime !== undefined && e.publishTime > newestTime) {
      newest = e;
      newestTime = e.publishTime;
    }
  }
  return newest ?? episodes[0];
}

/**
 * Pick the episode a transcript belongs to.
 *
 * Returns undefined only when the podcast id is missing or unknown. Once the
 * podcast resolves, an episode is always returned: exact guid, then substring,
 * then the newest episode, or a placeholder when the podcast has none.
 *
 * The recency tier also answers for podcasts whose episodes carry no usable
 * guid at all, so a hit there is a guess rather than a confirmed link.
 */
export function matchEpisode(
  podcastId: number | undefined,
  trackid: string | undefined,
  index: MetadataIndex
): MatchResult | undefined {
  if (podcastId === undefined) return undefined;

  const podcast = index.getPodcast(podcastId);
  if (!podcast) return undefined;

  const episodes = index.getEpisodes(podcastId);
  if (episodes.length === 0) {
    return { podcast, episode: UNKNOWN_EPISODE, tier: "placeholder" };
  }

  if (trackid) {
    const exact = findExact(episodes, trackid);
    if (exact) return { podcast, episode: exact, tier: "exact" };

    const partial = findSubstring(episodes, trackid);
    if (partial) return { podcast, episode: partial, tier: "substring" };
  }

  return { podcast, episode: findMostRecent(episodes), tier: "recency" };
}
