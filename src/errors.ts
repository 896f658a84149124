/** The transcript directory, or an explicitly named transcript file, does not exist */
export class TranscriptSourceError extends Error {
  constructor(readonly path: string, message?: string) {
    super(message ?? `Transcript source not found at ${path}`);
    this.name = "TranscriptSourceError";
  }
}

/** A transcript document is not well-formed XML */
export class TtmlParseError extends Error {
  constructor(message: string, readonly line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`);
    this.name = "TtmlParseError";
  }
}
