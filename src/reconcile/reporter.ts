/**
 * End-of-batch reconciliation reports.
 *
 * Unmatched items are set differences against the *matched* trackids: a
 * library entry only counts as having a transcript when a transcript was
 * actually matched back to it, not when some file on disk happens to share
 * its token.
 */

import { writeFileSync } from "node:fs";
import { join } from "node:path";
import type {
  MappingRow,
  ReconciliationReport,
  UnmatchedTranscript,
} from "../types/index.js";
import { toCSV } from "../utils/csv.js";
import { HEADER_RULE } from "../utils/format-transcript.js";
import type { Logger } from "../utils/log.js";
import type { ReconciliationState } from "./state.js";

export const REPORT_FILES = {
  mapping: "transcript_mapping.csv",
  unmatchedTranscripts: "unmatched_transcripts.log",
  unmatchedDbEntries: "unmatched_db_entries.log",
  failedParses: "failed_trackid_parses.log",
} as const;

export const MAPPING_COLUMNS = [
  "transcript_file",
  "trackid",
  "output_file",
  "matched",
  "podcast_title",
  "episode_title",
  "pub_date",
  "author",
] as const;

function byCodePoint(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function buildReport(state: ReconciliationState): ReconciliationReport {
  const matched = state.matchedTrackids;

  const unmatchedTranscripts: UnmatchedTranscript[] = [];
  for (const trackid of [...state.transcriptTrackids.keys()].sort(byCodePoint)) {
    if (matched.has(trackid)) continue;
    for (const file of state.transcriptTrackids.get(trackid) ?? []) {
      unmatchedTranscripts.push({ fileName: file.fileName, trackid, path: file.path });
    }
  }

  const unmatchedDbEntries = [...state.databaseGuids]
    .filter((guid) => !matched.has(guid))
    .sort(byCodePoint);

  const mappings = [...state.mappings];
  const matchedRows = mappings.filter((m) => m.matched).length;

  return {
    unmatchedTranscripts,
    unmatchedDbEntries,
    failedParses: [...state.failedParses],
    mappings,
    summary: {
      discovered: state.discovered,
      processed: mappings.length,
      matched: matchedRows,
      unmatched: mappings.length - matchedRows,
      failedParses: state.failedParses.length,
      unmatchedDbEntries: unmatchedDbEntries.length,
      emptyDocuments: state.emptyDocuments.length,
      writeFailures: state.writeFailures.length,
      recencyFallbacks: mappings.filter((m) => m.tier === "recency").length,
    },
  };
}

// ---- Renderers ----

function renderLog(title: string, lines: string[]): string {
  const body = lines.length > 0 ? lines.join("\n") : "(none)";
  return `${title}\nCount: ${lines.length}\n${HEADER_RULE}\n\n${body}\n`;
}

export function renderUnmatchedTranscriptsLog(report: ReconciliationReport): string {
  return renderLog(
    "Transcripts without matching library metadata",
    report.unmatchedTranscripts.map((u) => `${u.fileName}\t${u.trackid}\t${u.path}`)
  );
}

export function renderUnmatchedDbEntriesLog(report: ReconciliationReport): string {
  return renderLog("Library episodes without a matched transcript", report.unmatchedDbEntries);
}

export function renderFailedParsesLog(report: ReconciliationReport): string {
  return renderLog(
    "Transcript files with no extractable trackid",
    report.failedParses.map((f) => `${f.fileName}\t${f.path}`)
  );
}

function mappingToRow(m: MappingRow): string[] {
  return [
    m.transcriptFile,
    m.trackid,
    m.outputFile,
    m.matched ? "true" : "false",
    m.podcastTitle ?? "",
    m.episodeTitle ?? "",
    m.pubDate ?? "",
    m.author ?? "",
  ];
}

export function renderMappingCsv(report: ReconciliationReport): string {
  return toCSV(MAPPING_COLUMNS, report.mappings.map(mappingToRow));
}

export function renderSummary(report: ReconciliationReport): string {
  const s = report.summary;
  return [
    "=== Reconciliation Summary ===",
    `Transcript files found:     ${s.discovered}`,
    `Processed:                  ${s.processed}`,
    `Matched:                    ${s.matched}`,
    `  via recency fallback:     ${s.recencyFallbacks}`,
    `Unmatched:                  ${s.unmatched}`,
    `Failed trackid parses:      ${s.failedParses}`,
    `Empty or unreadable:        ${s.emptyDocuments}`,
    `Write failures:             ${s.writeFailures}`,
    `Unmatched library entries:  ${s.unmatchedDbEntries}`,
  ].join("\n");
}

export interface WriteReportsResult {
  written: string[];
  failed: string[];
}

/**
 * Write the mapping table and the three diagnostic logs to `outputDir`.
 * A log that cannot be written is reported and skipped; the others still go out.
 */
export function writeReports(
  report: ReconciliationReport,
  outputDir: string,
  logger: Logger
): WriteReportsResult {
  const outputs: Array<[string, string]> = [
    [REPORT_FILES.mapping, renderMappingCsv(report)],
    [REPORT_FILES.unmatchedTranscripts, renderUnmatchedTranscriptsLog(report)],
    [REPORT_FILES.unmatchedDbEntries, renderUnmatchedDbEntriesLog(report)],
    [REPORT_FILES.failedParses, renderFailedParsesLog(report)],
  ];

  const result: WriteReportsResult = { written: [], failed: [] };
  for (const [name, content] of outputs) {
    const path = join(outputDir, name);
    try {
      writeFileSync(path, content, "utf-8");
      result.written.push(path);
      logger.debug(`  report: ${path}`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Could not write ${name}: ${message}`);
      result.failed.push(path);
    }
  }
  return result;
}
