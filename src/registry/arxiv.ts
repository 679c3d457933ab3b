/**
 * arXiv API client.
 *
 * API: http://export.arxiv.org/api/query?id_list={ids}
 * Responses are Atom feeds; unknown IDs yield no entry, malformed ones an
 * entry whose id points at /api/errors.
 * Rate limit: one request every three seconds is asked of API users.
 */

import { XMLParser } from "fast-xml-parser";
import type { RegistryOptions } from "../config.js";
import { normalizeArxivId, stripArxivVersion } from "../identifiers/arxiv.js";
import { normalizeDoi } from "../identifiers/doi.js";
import { childLogger } from "../logger.js";
import { httpError, requestInit } from "./http.js";

const ARXIV_API_BASE = "http://export.arxiv.org/api/query";

/** Entry ids look like http://arxiv.org/abs/2303.12345v2 */
const ENTRY_ID_PATTERN = /arxiv\.org\/abs\/(.+)$/;

const log = childLogger("arxiv");

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (name) => ["entry", "author", "category", "link"].includes(name),
});

interface AtomEntry {
  id?: string;
  title?: string;
  summary?: string;
  published?: string;
  updated?: string;
  author?: Array<{ name?: string }>;
  category?: Array<{ "@_term"?: string }>;
  doi?: string;
  journal_ref?: string;
}

interface AtomFeed {
  feed?: { entry?: AtomEntry[] };
}

/** Metadata of one arXiv paper. */
export interface ArxivMetadata {
  /** ID with the latest version, e.g. "2303.12345v2" */
  id: string;
  /** Latest version number */
  version?: number;
  title: string;
  authors: string[];
  abstract: string;
  published: string;
  updated: string;
  /** DOI of the published version, when the authors registered one */
  doi?: string;
  journalRef?: string;
  categories: string[];
}

function collapse(value: string | undefined): string {
  return (value ?? "").replace(/\s+/g, " ").trim();
}

function toMetadata(entry: AtomEntry): ArxivMetadata | null {
  const idMatch = ENTRY_ID_PATTERN.exec(entry.id ?? "");
  if (!idMatch?.[1]) return null;

  const id = idMatch[1];
  const metadata: ArxivMetadata = {
    id,
    title: collapse(entry.title),
    authors: (entry.author ?? []).map((a) => collapse(a.name)).filter((name) => name.length > 0),
    abstract: collapse(entry.summary),
    published: entry.published ?? "",
    updated: entry.updated ?? "",
    categories: (entry.category ?? [])
      .map((c) => c["@_term"])
      .filter((term): term is string => Boolean(term)),
  };
  const version = /v(\d+)$/.exec(id)?.[1];
  if (version) metadata.version = Number.parseInt(version, 10);
  if (entry.doi) metadata.doi = normalizeDoi(collapse(entry.doi));
  if (entry.journal_ref) metadata.journalRef = collapse(entry.journal_ref);
  return metadata;
}

/**
 * Parse an arXiv Atom feed into metadata records. Error entries are skipped.
 */
export function parseArxivFeed(xml: string): ArxivMetadata[] {
  const parsed = parser.parse(xml) as AtomFeed;
  const entries = parsed.feed?.entry ?? [];
  const records: ArxivMetadata[] = [];
  for (const entry of entries) {
    const metadata = toMetadata(entry);
    if (metadata) records.push(metadata);
  }
  return records;
}

/**
 * Fetch metadata for several arXiv IDs in one request.
 *
 * @throws On HTTP errors or network errors
 */
export async function fetchArxivEntries(ids: string[], options?: RegistryOptions): Promise<ArxivMetadata[]> {
  if (ids.length === 0) return [];

  const params = new URLSearchParams({
    id_list: ids.map(normalizeArxivId).join(","),
    max_results: String(ids.length),
  });
  log.debug({ ids }, "querying arXiv API");
  const url = `${ARXIV_API_BASE}?${params.toString()}`;
  const response = await fetch(url, requestInit(options, "application/atom+xml"));
  if (!response.ok) throw httpError("arXiv API", response);

  return parseArxivFeed(await response.text());
}

/**
 * Fetch metadata for one arXiv ID.
 *
 * @returns The metadata, or null when arXiv has no such paper
 * @throws On HTTP errors or network errors
 */
export async function fetchArxivMetadata(id: string, options?: RegistryOptions): Promise<ArxivMetadata | null> {
  if (!id) return null;
  const wanted = stripArxivVersion(id);
  const records = await fetchArxivEntries([id], options);
  return records.find((record) => stripArxivVersion(record.id) === wanted) ?? null;
}

/** Whether arXiv has a paper with this ID. */
export async function arxivIdExists(id: string, options?: RegistryOptions): Promise<boolean> {
  return (await fetchArxivMetadata(id, options)) !== null;
}

/**
 * Latest version of a paper, e.g. "2303.12345" → "2303.12345v3".
 *
 * @returns null when arXiv has no such paper
 */
export async function getLatestArxivVersion(id: string, options?: RegistryOptions): Promise<string | null> {
  const metadata = await fetchArxivMetadata(stripArxivVersion(id), options);
  return metadata?.id ?? null;
}

/**
 * DOI of the published version of an arXiv paper.
 *
 * @returns null when the paper is unknown or has no DOI on record
 */
export async function arxivToDoi(id: string, options?: RegistryOptions): Promise<string | null> {
  const metadata = await fetchArxivMetadata(id, options);
  return metadata?.doi ?? null;
}
