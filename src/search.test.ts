import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { findMatchesInLines, formatSearchResults, searchTranscripts } from "./search.js";
import { TranscriptSourceError } from "./errors.js";

describe("findMatchesInLines", () => {
  const lines = ["one", "Two Machines", "three", "four machine", "five"];

  it("should match case-insensitively with context", () => {
    expect(findMatchesInLines(lines, "MACHINE", 1, "a.txt")).toEqual([
      { file: "a.txt", lineNumber: 2, lines: ["one", "Two Machines", "three"] },
      { file: "a.txt", lineNumber: 4, lines: ["three", "four machine", "five"] },
    ]);
  });

  it("should clip context at the edges", () => {
    expect(findMatchesInLines(lines, "one", 2, "a.txt")[0].lines).toEqual([
      "one",
      "Two Machines",
      "three",
    ]);
  });
});

describe("searchTranscripts", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "search-"));
    writeFileSync(join(dir, "a.txt"), "alpha\nneedle one\nbeta\n");
    mkdirSync(join(dir, "nested"));
    writeFileSync(join(dir, "nested", "b.txt"), "Needle two\nneedle three");
    writeFileSync(join(dir, "c.log"), "needle ignored");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should search every .txt file recursively", () => {
    const results = searchTranscripts({ dir, query: "needle", context: 0, limit: 0 });
    expect(results.map((r) => [r.file, r.lineNumber])).toEqual([
      [join(dir, "a.txt"), 2],
      [join(dir, "nested", "b.txt"), 1],
      [join(dir, "nested", "b.txt"), 2],
    ]);
  });

  it("should stop at the limit", () => {
    expect(searchTranscripts({ dir, query: "needle", context: 0, limit: 2 })).toHaveLength(2);
  });

  it("should throw when the directory is missing", () => {
    expect(() => searchTranscripts({ dir: join(dir, "nope"), query: "x" })).toThrow(
      TranscriptSourceError
    );
  });
});

describe("formatSearchResults", () => {
  it("should say so when nothing matched", () => {
    expect(formatSearchResults([], "zebra", 2)).toBe('No matches found for: "zebra"');
  });

  it("should print each hit with its context block", () => {
    const out = formatSearchResults(
      [{ file: "/data/out/a.txt", lineNumber: 2, lines: ["alpha", "needle one"] }],
      "needle",
      1,
      "/data"
    );
    const rule = "-".repeat(80);
    expect(out).toBe(
      [
        'Found 1 match(es) for: "needle"',
        "",
        rule,
        "[1] File: out/a.txt",
        "    Line: 2",
        "    Context (±1 lines):",
        "",
        "    alpha",
        "    needle one",
        "",
        rule,
      ].join("\n")
    );
  });
});
