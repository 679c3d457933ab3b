/**
 * .bbl citation parser.
 *
 * Splits a LaTeX bibliography into one block per \bibitem and pulls authors,
 * title, year and venue out of each with heuristics. Bibliography styles have
 * no fixed schema, so nothing here throws: a block that cannot be read yields
 * a reference with empty fields.
 *
 * Most styles separate the parts of an entry with \newblock:
 *
 *   \bibitem[Smith et~al.(2020)]{smith2020}
 *   A.~Smith, B.~Jones, and C.~Lee.
 *   \newblock Deep learning for things.
 *   \newblock In \emph{Proceedings of X}, pages 1--10, 2020.
 */

import { generateCitationKey } from "../citation-key.js";
import { ParseError } from "../errors.js";
import { type ExtractOptions, detexText } from "../extract/index.js";
import { recognizeIdentifiers } from "../identifiers/recognize.js";
import { validateCandidates } from "../identifiers/validate.js";
import type { Reference } from "../types.js";
import { stripLatex } from "./latex.js";

/** A raw \bibitem block. */
export interface Bibitem {
  key?: string;
  label?: string;
  /** Everything after the \bibitem header, up to the next item */
  body: string;
  /** Header and body */
  raw: string;
}

/** \bibitem as a whole control word; revtex defines \bibitemStop and \bibitemNoStop */
const BIBITEM = /\\bibitem(?![a-zA-Z@])/g;

const END_BIBLIOGRAPHY = /\\end\s*\{thebibliography\}/;

/** 1900-2099, not inside an identifier ("arXiv:1901.01234", "10.1000/x2019") */
const YEAR_PATTERN = /(?<![\w./-])(?:19|20)\d{2}(?!\d|\.\d)/g;

/** Year inside a natbib label: "Smith et~al.(2020)" or "{Smith}(2020a)" */
const LABEL_YEAR = /\(((?:19|20)\d{2})[a-z]?\)/;

function skipSpace(source: string, pos: number): number {
  while (pos < source.length && /\s/.test(source.charAt(pos))) pos++;
  return pos;
}

/**
 * End (exclusive) of the group opened at `start`, counting nested braces and
 * brackets and skipping escaped characters. -1 when the group is not closed
 * by `close`.
 */
function groupEnd(source: string, start: number, close: "]" | "}"): number {
  let depth = 0;
  for (let i = start; i < source.length; i++) {
    const ch = source.charAt(i);
    if (ch === "\\") {
      i++;
    } else if (ch === "{" || ch === "[") {
      depth++;
    } else if (ch === "}" || ch === "]") {
      depth--;
      if (depth === 0) return ch === close ? i + 1 : -1;
    }
  }
  return -1;
}

interface BibitemHeader {
  label?: string;
  key?: string;
  end: number;
}

/** Optional [label] and {key} after the \bibitem at `start`. */
function readHeader(source: string, start: number): BibitemHeader {
  let pos = skipSpace(source, start + "\\bibitem".length);
  const header: BibitemHeader = { end: pos };

  if (source.charAt(pos) === "[") {
    const end = groupEnd(source, pos, "]");
    if (end < 0) return header;
    const label = source.slice(pos + 1, end - 1).trim();
    if (label) header.label = label;
    pos = skipSpace(source, end);
    header.end = pos;
  }

  if (source.charAt(pos) === "{") {
    const end = groupEnd(source, pos, "}");
    if (end < 0) return header;
    const key = source.slice(pos + 1, end - 1).trim();
    if (key) header.key = key;
    header.end = end;
  }
  return header;
}

/**
 * Split a bibliography into \bibitem blocks, in source order.
 * Text before the first \bibitem and after \end{thebibliography} is dropped.
 */
export function splitBibitems(bbl: string): Bibitem[] {
  const end = bbl.search(END_BIBLIOGRAPHY);
  const source = end >= 0 ? bbl.slice(0, end) : bbl;
  const starts = [...source.matchAll(BIBITEM)].map((match) => match.index ?? 0);

  return starts.map((start, i) => {
    const header = readHeader(source, start);
    const bodyEnd = starts[i + 1] ?? source.length;
    const item: Bibitem = {
      body: source.slice(Math.min(header.end, bodyEnd), bodyEnd).trim(),
      raw: source.slice(start, bodyEnd).trim(),
    };
    if (header.label) item.label = header.label;
    if (header.key) item.key = header.key;
    return item;
  });
}

/** \newblock-separated parts of a block, rendered with the built-in stripper. */
function builtinBlocks(body: string): string[] {
  return body
    .split(/\\newblock\b/)
    .map((block) => stripLatex(block))
    .filter((block) => block.length > 0);
}

function trimPunctuation(value: string): string {
  return value.replace(/^[\s,.;:]+|[\s,.;:]+$/g, "");
}

/** Trim separators around a name; a final period is kept when it ends an initial ("B."). */
function trimAuthor(value: string): string {
  const trimmed = value.replace(/^[\s,;:]+|[\s,;:]+$/g, "");
  return /\b[A-Z]\.$/.test(trimmed) ? trimmed : trimmed.replace(/\.+$/, "");
}

/**
 * Split an author list.
 * "A. Smith, B. Jones, and C. Lee" → ["A. Smith", "B. Jones", "C. Lee"]
 * "Smith, A. and Jones, B."        → ["Smith, A.", "Jones, B."]
 */
export function parseAuthors(block: string): string[] {
  const cleaned = trimAuthor(block.replace(/\bet\s+al\.?/gi, ""));
  if (!cleaned) return [];

  const byAnd = cleaned.split(/\s*,?\s+and\s+|\s*&\s*|\s*;\s*/);
  const authors: string[] = [];
  for (const part of byAnd) {
    const segments = part.split(/\s*,\s*/).filter((s) => s.length > 0);
    // "Family, Given" has a one-word segment; "Given Family, Given Family" does not
    const isNameList = segments.length > 1 && segments.every((s) => /\s/.test(s.trim()));
    if (isNameList) {
      authors.push(...segments.map(trimAuthor));
    } else {
      authors.push(trimAuthor(part));
    }
  }
  return authors.filter((author) => author.length > 0);
}

/** Last plausible publication year in the label, else in the text. */
function findYear(label: string | undefined, text: string): string | undefined {
  const fromLabel = label ? LABEL_YEAR.exec(label)?.[1] : undefined;
  if (fromLabel) return fromLabel;
  const years = text.match(YEAR_PATTERN);
  return years ? years[years.length - 1] : undefined;
}

interface EntryFields {
  authors: string[];
  title?: string;
  venue?: string;
}

/**
 * Authors / title / venue from the rendered blocks.
 * A quoted title (“...”) wins; otherwise the first two \newblock parts are
 * taken as authors and title. A single block without quotes is left alone.
 */
function findFields(blocks: string[]): EntryFields {
  const text = blocks.join(" ");
  const quoted = /“([^”]+)”/.exec(text);
  if (quoted?.[1] && quoted.index !== undefined) {
    const fields: EntryFields = { authors: parseAuthors(text.slice(0, quoted.index)) };
    const title = trimPunctuation(quoted[1]);
    const venue = trimPunctuation(text.slice(quoted.index + quoted[0].length));
    if (title) fields.title = title;
    if (venue) fields.venue = venue;
    return fields;
  }

  if (blocks.length < 2) return { authors: [] };

  const fields: EntryFields = { authors: parseAuthors(blocks[0] ?? "") };
  const title = trimPunctuation(blocks[1] ?? "");
  const venue = trimPunctuation(blocks.slice(2).join(" "));
  if (title) fields.title = title;
  if (venue) fields.venue = venue;
  return fields;
}

/**
 * Build a reference from a \bibitem and its plain-text blocks.
 * The citation key is provisional until assignCitationKeys runs over the whole list.
 */
export function buildReference(item: Bibitem, blocks: string[]): Reference {
  const text = blocks.join(" ");
  const { authors, title, venue } = findFields(blocks);
  const year = findYear(item.label, text);
  const { identifiers } = validateCandidates(recognizeIdentifiers(text));

  const reference: Reference = {
    raw: item.raw,
    text,
    authors,
    identifiers,
    citationKey: generateCitationKey(authors[0], year),
  };
  if (item.key) reference.key = item.key;
  if (item.label) reference.label = stripLatex(item.label);
  if (title) reference.title = title;
  if (year) reference.year = year;
  if (venue) reference.venue = venue;
  return reference;
}

/**
 * Give every reference a unique "{family}{year}" key, suffixing collisions
 * (smith2020, smith2020a, ...) in list order.
 */
export function assignCitationKeys(references: Reference[]): Reference[] {
  const taken = new Set<string>();
  return references.map((reference) => {
    const citationKey = generateCitationKey(reference.authors[0], reference.year, taken);
    taken.add(citationKey);
    return { ...reference, citationKey };
  });
}

/**
 * Parse a .bbl into references, one per \bibitem, in source order.
 * Plain text comes from the built-in LaTeX stripper.
 */
export function parseBbl(bbl: string): Reference[] {
  const references = splitBibitems(bbl).map((item) => buildReference(item, builtinBlocks(item.body)));
  return assignCitationKeys(references);
}

/**
 * Like parseBbl, but fails on input without a single \bibitem.
 *
 * @throws ParseError
 */
export function parseBblStrict(bbl: string): Reference[] {
  const references = parseBbl(bbl);
  if (references.length === 0) {
    throw new ParseError("No \\bibitem entries found", bbl);
  }
  return references;
}

/**
 * Parse a .bbl with OpenDeTeX rendering each block: one detex run per \bibitem,
 * \newblock turned into a paragraph break so the parts stay separable.
 *
 * @throws ExtractionError when detex is missing or fails
 */
export async function parseBblWithDetex(bbl: string, options: ExtractOptions = {}): Promise<Reference[]> {
  const references: Reference[] = [];
  for (const item of splitBibitems(bbl)) {
    const plain = await detexText(item.body.replace(/\\newblock\b/g, "\n\n"), options);
    const blocks = plain
      .split(/\n\s*\n/)
      .map((block) => block.replace(/``/g, "“").replace(/''/g, "”").replace(/\s+/g, " ").trim())
      .filter((block) => block.length > 0);
    references.push(buildReference(item, blocks));
  }
  return assignCitationKeys(references);
}
