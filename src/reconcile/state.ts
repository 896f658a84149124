import type { FileFailure, MappingRow, TranscriptFile } from "../types/index.js";

/**
 * Accumulators for one batch run.
 *
 * Constructed at batch start and handed to each stage explicitly; the reporter
 * reads it once every file has been processed. Updates are append-only.
 */
export class ReconciliationState {
  /** Every successfully extracted trackid, with the files that produced it */
  readonly transcriptTrackids = new Map<string, TranscriptFile[]>();
  /** Trackids whose file was matched to library metadata */
  readonly matchedTrackids = new Set<string>();
  /** Every guid present in the metadata index */
  readonly databaseGuids = new Set<string>();
  /** Files whose trackid extraction failed */
  readonly failedParses: TranscriptFile[] = [];

  readonly mappings: MappingRow[] = [];
  readonly emptyDocuments: FileFailure[] = [];
  readonly writeFailures: FileFailure[] = [];

  discovered = 0;

  constructor(databaseGuids: Iterable<string> = []) {
    for (const guid of databaseGuids) this.databaseGuids.add(guid);
  }

  recordTranscript(trackid: string, file: TranscriptFile): void {
    const files = this.transcriptTrackids.get(trackid);
    if (files) {
      files.push(file);
    } else {
      this.transcriptTrackids.set(trackid, [file]);
    }
  }

  recordMatch(trackid: string): void {
    this.matchedTrackids.add(trackid);
  }

  recordFailedParse(file: TranscriptFile): void {
    this.failedParses.push(file);
  }

  recordMapping(row: MappingRow): void {
    this.mappings.push(row);
  }

  recordEmptyDocument(file: TranscriptFile, reason: string): void {
    this.emptyDocuments.push({ fileName: file.fileName, path: file.path, reason });
  }

  recordWriteFailure(file: TranscriptFile, reason: string): void {
    this.writeFailures.push({ fileName: file.fileName, path: file.path, reason });
  }
}
