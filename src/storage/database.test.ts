import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { LibraryDatabase, loadMetadataIndex } from "./database.js";
import type { Logger } from "../utils/log.js";

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    info: () => {},
    debug: () => {},
    warn: (...args) => warnings.push(args.join(" ")),
    error: () => {},
  };
}

function createLibrary(path: string): void {
  const db = new Database(path);
  db.exec(`
    CREATE TABLE ZMTPODCAST (Z_PK INTEGER PRIMARY KEY, ZTITLE VARCHAR, ZAUTHOR VARCHAR);
    CREATE TABLE ZMTEPISODE (
      Z_PK INTEGER PRIMARY KEY,
      ZPODCAST INTEGER,
      ZTITLE VARCHAR,
      ZPUBDATE TIMESTAMP,
      ZGUID VARCHAR
    );
    INSERT INTO ZMTPODCAST VALUES (42, 'Deep Dive', NULL);
    INSERT INTO ZMTPODCAST VALUES (43, NULL, 'Bo');
    INSERT INTO ZMTEPISODE VALUES (1, 42, 'Old', 100, 'g-old');
    INSERT INTO ZMTEPISODE VALUES (2, 42, 'New', 500.7, 'g-new');
    INSERT INTO ZMTEPISODE VALUES (3, 42, NULL, NULL, '');
    INSERT INTO ZMTEPISODE VALUES (4, NULL, 'Orphan', 50, 'orphan');
  `);
  db.close();
}

describe("loadMetadataIndex", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "library-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should load podcasts and episodes newest first", () => {
    const dbPath = join(dir, "MTLibrary.sqlite");
    createLibrary(dbPath);

    const index = loadMetadataIndex(dbPath, recordingLogger());

    expect(index.getPodcast(42)).toEqual({ title: "Deep Dive", author: "" });
    expect(index.getPodcast(43)).toEqual({ title: "Unknown Podcast", author: "Bo" });
    expect(index.getEpisodes(42)).toEqual([
      { title: "New", publishTime: 500, guid: "g-new" },
      { title: "Old", publishTime: 100, guid: "g-old" },
      { title: "Unknown Episode", publishTime: undefined, guid: undefined },
    ]);
    expect([...index.guids()].sort()).toEqual(["g-new", "g-old"]);
  });

  it("should degrade to an empty index when the store is missing", () => {
    const logger = recordingLogger();
    const index = loadMetadataIndex(join(dir, "nope.sqlite"), logger);

    expect(index.isEmpty).toBe(true);
    expect(logger.warnings[0]).toBe(`Warning: Database not found at ${join(dir, "nope.sqlite")}`);
  });

  it("should degrade to an empty index when the store cannot be read", () => {
    const dbPath = join(dir, "broken.sqlite");
    writeFileSync(dbPath, "this is not a database");
    const logger = recordingLogger();

    const index = loadMetadataIndex(dbPath, logger);

    expect(index.isEmpty).toBe(true);
    expect(logger.warnings[0]).toMatch(/^Warning: Could not load metadata from database: /);
  });

  it("should skip episodes that belong to no podcast", () => {
    const dbPath = join(dir, "MTLibrary.sqlite");
    createLibrary(dbPath);
    const library = new LibraryDatabase(dbPath);

    try {
      expect(library.listEpisodes().map((e) => e.title)).toEqual([
        "New",
        "Old",
        "Unknown Episode",
      ]);
      expect(library.listPodcasts().map((p) => p.id)).toEqual([42, 43]);
    } finally {
      library.close();
    }
  });
});
