import Database from "better-sqlite3";
import { existsSync } from "node:fs";
import { MetadataIndex } from "../reconcile/metadata-index.js";
import type { EpisodeInput, PodcastInput } from "../types/index.js";
import type { Logger } from "../utils/log.js";

/** Row shape of ZMTPODCAST (Core Data column names) */
interface PodcastRow {
  Z_PK: number;
  ZTITLE: string | null;
  ZAUTHOR: string | null;
}

/** Row shape of ZMTEPISODE */
interface EpisodeRow {
  ZPODCAST: number;
  ZTITLE: string | null;
  ZPUBDATE: number | null;
  ZGUID: string | null;
}

function rowToPodcast(row: PodcastRow): PodcastInput {
  return {
    id: row.Z_PK,
    title: row.ZTITLE || "Unknown Podcast",
    author: row.ZAUTHOR ?? "",
  };
}

function rowToEpisode(row: EpisodeRow): EpisodeInput {
  return {
    podcastId: row.ZPODCAST,
    title: row.ZTITLE || "Unknown Episode",
    publishTime:
      typeof row.ZPUBDATE === "number" && Number.isFinite(row.ZPUBDATE)
        ? Math.floor(row.ZPUBDATE)
        : undefined,
    guid: row.ZGUID || undefined,
  };
}

/**
 * Read-only view of the podcast library database.
 * The store is never written to.
 */
export class LibraryDatabase {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath, { readonly: true, fileMustExist: true });
  }

  listPodcasts(): PodcastInput[] {
    const rows = this.db
      .prepare("SELECT Z_PK, ZTITLE, ZAUTHOR FROM ZMTPODCAST ORDER BY Z_PK")
      .all() as PodcastRow[];
    return rows.map(rowToPodcast);
  }

  /** Episodes attached to a podcast, newest first; undated episodes last */
  listEpisodes(): EpisodeInput[] {
    const rows = this.db
      .prepare(
        `SELECT ZPODCAST, ZTITLE, ZPUBDATE, ZGUID FROM ZMTEPISODE
         WHERE ZPODCAST IS NOT NULL
         ORDER BY ZPODCAST, ZPUBDATE IS NULL, ZPUBDATE DESC, Z_PK`
      )
      .all() as EpisodeRow[];
    return rows.map(rowToEpisode);
  }

  buildIndex(): MetadataIndex {
    return MetadataIndex.build(this.listPodcasts(), this.listEpisodes());
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Load the metadata index from the library database.
 * A missing or unreadable store yields an empty index; every file then falls
 * back to filename-derived naming.
 */
export function loadMetadataIndex(dbPath: string, logger: Logger): MetadataIndex {
  if (!existsSync(dbPath)) {
    logger.warn(`Warning: Database not found at ${dbPath}`);
    logger.warn("Will use generic filenames instead.");
    return MetadataIndex.empty();
  }

  let db: LibraryDatabase | undefined;
  try {
    db = new LibraryDatabase(dbPath);
    const index = db.buildIndex();
    logger.info(
      `Loaded metadata for ${index.episodeCount} episodes across ${index.podcastCount} podcasts\n`
    );
    return index;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`Warning: Could not load metadata from database: ${message}`);
    logger.warn("Will use generic filenames instead.\n");
    return MetadataIndex.empty();
  } finally {
    db?.close();
  }
}
