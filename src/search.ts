/**
 * Plain-text search across extracted transcripts.
 * Case-insensitive substring match with surrounding context lines.
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, relative } from "node:path";
import { TranscriptSourceError } from "./errors.js";
import type { SearchMatch, SearchOptions } from "./types/index.js";

function listTextFiles(dir: string): string[] {
  const found: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...listTextFiles(full));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith(".txt")) {
      found.push(full);
    }
  }
  return found.sort();
}

export function findMatchesInLines(
  lines: string[],
  query: string,
  context: number,
  file: string
): SearchMatch[] {
  const needle = query.toLowerCase();
  const matches: SearchMatch[] = [];

  lines.forEach((line, i) => {
    if (!line.toLowerCase().includes(needle)) return;
    const start = Math.max(0, i - context);
    const end = Math.min(lines.length, i + context + 1);
    matches.push({ file, lineNumber: i + 1, lines: lines.slice(start, end) });
  });

  return matches;
}

export function searchTranscripts(options: SearchOptions): SearchMatch[] {
  const { dir, query, context = 2, limit = 50 } = options;

  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new TranscriptSourceError(dir, `Transcripts directory not found at: ${dir}`);
  }

  const results: SearchMatch[] = [];
  for (const file of listTextFiles(dir)) {
    const lines = readFileSync(file, "utf-8").split(/\r?\n/);
    results.push(...findMatchesInLines(lines, query, context, file));
    if (limit > 0 && results.length >= limit) return results.slice(0, limit);
  }

  return results;
}

export function formatSearchResults(
  results: SearchMatch[],
  query: string,
  context: number,
  cwd: string = process.cwd()
): string {
  if (results.length === 0) return `No matches found for: "${query}"`;

  const separator = "-".repeat(80);
  const out: string[] = [`Found ${results.length} match(es) for: "${query}"`, ""];

  results.forEach((r, i) => {
    out.push(separator);
    out.push(`[${i + 1}] File: ${relative(cwd, r.file)}`);
    out.push(`    Line: ${r.lineNumber}`);
    out.push(`    Context (±${context} lines):`);
    out.push("");
    for (const line of r.lines) out.push(`    ${line}`);
    out.push("");
  });
  out.push(separator);

  return out.join("\n");
}
