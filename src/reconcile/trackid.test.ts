import { describe, it, expect } from "vitest";
import { extractTrackid, parsePodcastId, resolveTrackid, type TrackidRule } from "./trackid.js";
import { ReconciliationState } from "./state.js";
import { silentLogger } from "../utils/log.js";
import type { TranscriptFile } from "../types/index.js";

function file(stem: string): TranscriptFile {
  return { path: `/cache/TTML/PodcastContent7/${stem}.ttml`, fileName: `${stem}.ttml`, stem };
}

describe("extractTrackid", () => {
  it("should return the suffix after the transcript_ prefix", () => {
    for (const suffix of ["1000612345678", "x", "abc_def"]) {
      expect(extractTrackid(`transcript_${suffix}`)).toEqual({
        token: suffix,
        succeeded: true,
        rule: "prefixed",
        lowConfidence: false,
      });
    }
  });

  it("should fail when the prefix has nothing after it", () => {
    const result = extractTrackid("transcript_");
    expect(result.succeeded).toBe(false);
    expect(result.token).toBeUndefined();
    expect(result.rule).toBe("prefixed");
  });

  it("should use stems of 8 or more characters as-is", () => {
    expect(extractTrackid("A1B2C3D4E5F6")).toEqual({
      token: "A1B2C3D4E5F6",
      succeeded: true,
      rule: "stem",
      lowConfidence: false,
    });
    expect(extractTrackid("12345678").rule).toBe("stem");
  });

  it("should accept short stems with low confidence", () => {
    expect(extractTrackid("1234567")).toEqual({
      token: "1234567",
      succeeded: true,
      rule: "short-stem",
      lowConfidence: true,
    });
  });

  it("should fail on an empty stem", () => {
    expect(extractTrackid("")).toEqual({ succeeded: false, rule: "none", lowConfidence: false });
  });

  it("should apply custom rules in order", () => {
    const rules: TrackidRule[] = [
      {
        name: "dashed",
        applies: (stem) => stem.includes("-"),
        extract: (stem) => ({
          token: stem.split("-")[1],
          succeeded: true,
          rule: "dashed",
          lowConfidence: false,
        }),
      },
    ];
    expect(extractTrackid("ep-42", rules).token).toBe("42");
    expect(extractTrackid("plain", rules).succeeded).toBe(false);
  });
});

describe("resolveTrackid", () => {
  it("should record failed extractions in the batch state", () => {
    const state = new ReconciliationState();
    const failed = file("transcript_");

    resolveTrackid(failed, state, silentLogger);
    resolveTrackid(file("transcript_abc"), state, silentLogger);

    expect(state.failedParses).toEqual([failed]);
  });
});

describe("parsePodcastId", () => {
  it("should read the id from the nearest PodcastContent folder", () => {
    expect(parsePodcastId("/cache/TTML/PodcastContent42/transcript_abc.ttml")).toBe(42);
    expect(parsePodcastId("/cache/PodcastContent1/v4/PodcastContent99/x/a.ttml")).toBe(99);
  });

  it("should return undefined when no folder matches", () => {
    expect(parsePodcastId("/cache/TTML/Podcasts42/a.ttml")).toBeUndefined();
    expect(parsePodcastId("/cache/TTML/PodcastContent/a.ttml")).toBeUndefined();
    expect(parsePodcastId("PodcastContent42.ttml")).toBeUndefined();
  });

  it("should reject ids too large to represent exactly", () => {
    expect(parsePodcastId("/cache/PodcastContent1000000000000000000001/a.ttml")).toBeUndefined();
    expect(parsePodcastId("/cache/PodcastContent9007199254740992/a.ttml")).toBeUndefined();
    expect(parsePodcastId("/cache/PodcastContent9007199254740991/a.ttml")).toBe(9007199254740991);
  });
});
