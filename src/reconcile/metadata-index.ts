import type {
  EpisodeInput,
  EpisodeRecord,
  PodcastInput,
  PodcastRecord,
} from "../types/index.js";

interface Slice {
  start: number;
  end: number;
}

/**
 * Read-only lookup of podcasts and their episodes.
 *
 * Episodes live in one contiguous array grouped by podcast; each podcast id
 * maps to its [start, end) slice. Within a slice, episodes keep the order they
 * were supplied in, which the matcher treats as store order.
 */
export class MetadataIndex {
  private constructor(
    private readonly podcasts: ReadonlyMap<number, PodcastRecord>,
    private readonly episodes: readonly EpisodeRecord[],
    private readonly slices: ReadonlyMap<number, Slice>
  ) {}

  static empty(): MetadataIndex {
    return new MetadataIndex(new Map(), [], new Map());
  }

  static build(podcastRows: PodcastInput[], episodeRows: EpisodeInput[]): MetadataIndex {
    const podcasts = new Map<number, PodcastRecord>();
    for (const { id, title, author } of podcastRows) {
      if (!podcasts.has(id)) podcasts.set(id, { title, author });
    }

    const grouped = new Map<number, EpisodeRecord[]>();
    for (const { podcastId, ...episode } of episodeRows) {
      let group = grouped.get(podcastId);
      if (!group) {
        group = [];
        grouped.set(podcastId, group);
      }
      group.push(episode);
    }

    const episodes: EpisodeRecord[] = [];
    const slices = new Map<number, Slice>();
    for (const [podcastId, group] of grouped) {
      const start = episodes.length;
      episodes.push(...group);
      slices.set(podcastId, { start, end: episodes.length });
    }

    return new MetadataIndex(podcasts, episodes, slices);
  }

  getPodcast(podcastId: number): PodcastRecord | undefined {
    return this.podcasts.get(podcastId);
  }

  getEpisodes(podcastId: number): readonly EpisodeRecord[] {
    const slice = this.slices.get(podcastId);
    return slice ? this.episodes.slice(slice.start, slice.end) : [];
  }

  /** Every non-empty episode guid in the index */
  guids(): Set<string> {
    const out = new Set<string>();
    for (const e of this.episodes) {
      if (e.guid) out.add(e.guid);
    }
    return out;
  }

  get podcastCount(): number {
    return this.podcasts.size;
  }

  get episodeCount(): number {
    return this.episodes.length;
  }

  get isEmpty(): boolean {
    return this.podcasts.size === 0 && this.episodes.length === 0;
  }
}
