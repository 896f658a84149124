import { readFileSync } from "node:fs";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { TtmlParseError } from "../errors.js";
import type { TranscriptSegment } from "../types/index.js";

const TEXT_KEY = "#text";
const ATTRS_KEY = ":@";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: TEXT_KEY,
  preserveOrder: true,
  removeNSPrefix: true,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
});

/** An element or text node in fast-xml-parser's ordered output */
type OrderedNode = Record<string, unknown>;

function isNode(value: unknown): value is OrderedNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function elementName(node: OrderedNode): string | undefined {
  return Object.keys(node).find((k) => k !== ATTRS_KEY && k !== TEXT_KEY);
}

function childNodes(node: OrderedNode, name: string): unknown[] {
  const children = node[name];
  return Array.isArray(children) ? children : [];
}

function attribute(node: OrderedNode, name: string): string | undefined {
  const attrs = node[ATTRS_KEY];
  if (!isNode(attrs)) return undefined;
  const value = attrs[`@_${name}`];
  return value === undefined ? undefined : String(value);
}

/** Depth-first collection of <p> elements; paragraphs are not searched inside */
function collectParagraphs(nodes: unknown[], out: OrderedNode[]): void {
  for (const node of nodes) {
    if (!isNode(node)) continue;
    const name = elementName(node);
    if (!name) continue;
    if (name === "p") {
      out.push(node);
    } else {
      collectParagraphs(childNodes(node, name), out);
    }
  }
}

function collectText(nodes: unknown[], out: string[]): void {
  for (const node of nodes) {
    if (!isNode(node)) continue;
    if (TEXT_KEY in node) {
      const piece = String(node[TEXT_KEY]).trim();
      if (piece) out.push(piece);
      continue;
    }
    const name = elementName(node);
    if (name) collectText(childNodes(node, name), out);
  }
}

/**
 * Parse a TTML time expression into seconds.
 * Handles offset time ("12.5", "12.5s", "800ms", "2m", "1h") and clock time
 * ("01:02:03.250", "02:03"). Anything else is treated as 0.
 */
export function parseTimeExpression(value: string | undefined): number {
  if (!value) return 0;
  const v = value.trim();

  const offset = /^(\d+(?:\.\d+)?)(h|m|s|ms)?$/.exec(v);
  if (offset) {
    const n = Number(offset[1]);
    switch (offset[2]) {
      case "h":
        return n * 3600;
      case "m":
        return n * 60;
      case "ms":
        return n / 1000;
      default:
        return n;
    }
  }

  const clock = /^(?:(\d+):)?(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/.exec(v);
  if (clock) {
    return Number(clock[1] ?? 0) * 3600 + Number(clock[2]) * 60 + Number(clock[3]);
  }

  return 0;
}

/**
 * Extract paragraph segments from a TTML document, in document order.
 * Text of nested spans is joined with single spaces; empty paragraphs are dropped.
 */
export function parseTtml(xml: string): TranscriptSegment[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new TtmlParseError(`Malformed TTML: ${validation.err.msg}`, validation.err.line);
  }

  const parsed: unknown = parser.parse(xml);
  if (!Array.isArray(parsed)) return [];

  const paragraphs: OrderedNode[] = [];
  collectParagraphs(parsed, paragraphs);

  const segments: TranscriptSegment[] = [];
  for (const p of paragraphs) {
    const pieces: string[] = [];
    collectText(childNodes(p, "p"), pieces);
    const text = pieces.join(" ");
    if (!text) continue;

    const begin = attribute(p, "begin");
    segments.push(
      begin === undefined ? { text } : { text, timestamp: parseTimeExpression(begin) }
    );
  }

  return segments;
}

export function parseTtmlFile(path: string): TranscriptSegment[] {
  return parseTtml(readFileSync(path, "utf-8"));
}
