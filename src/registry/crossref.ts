/**
 * CrossRef REST API client.
 *
 * API: https://api.crossref.org/works/{doi}, /journals/{issn}, /works?query.bibliographic=...
 * Polite pool: identify with a User-Agent carrying a mailto contact.
 */

import { parse as parseHtml } from "node-html-parser";
import type { RegistryOptions } from "../config.js";
import { normalizeDoi } from "../identifiers/doi.js";
import { formatIssn } from "../identifiers/issn.js";
import { childLogger } from "../logger.js";
import { httpError, requestInit } from "./http.js";

const CROSSREF_API_BASE = "https://api.crossref.org";

const log = childLogger("crossref");

/** Subset of a CrossRef work record this library reads */
interface CrossrefWorkMessage {
  DOI: string;
  title?: string[];
  author?: Array<{ given?: string; family?: string; name?: string }>;
  "container-title"?: string[];
  issued?: { "date-parts"?: Array<Array<number | null>> };
  type?: string;
  URL?: string;
  ISSN?: string[];
  ISBN?: string[];
  score?: number;
}

/** Bibliographic record of a DOI. */
export interface CrossrefWork {
  doi: string;
  title?: string;
  authors: string[];
  year?: string;
  containerTitle?: string;
  type?: string;
  url?: string;
  issn: string[];
  isbn: string[];
}

export interface BibliographicMatch {
  doi: string;
  score: number;
}

/** CrossRef titles may carry JATS/HTML inline markup ("<i>E. coli</i>") */
function plainText(markup: string): string {
  return parseHtml(markup).text.replace(/\s+/g, " ").trim();
}

function toWork(message: CrossrefWorkMessage): CrossrefWork {
  const work: CrossrefWork = {
    doi: normalizeDoi(message.DOI),
    authors: (message.author ?? [])
      .map((a) => a.name ?? [a.given, a.family].filter(Boolean).join(" "))
      .filter((name) => name.length > 0),
    issn: message.ISSN ?? [],
    isbn: message.ISBN ?? [],
  };
  const title = message.title?.[0];
  if (title) work.title = plainText(title);
  const year = message.issued?.["date-parts"]?.[0]?.[0];
  if (year) work.year = String(year);
  const container = message["container-title"]?.[0];
  if (container) work.containerTitle = plainText(container);
  if (message.type) work.type = message.type;
  if (message.URL) work.url = message.URL;
  return work;
}

async function getWork(doi: string, options?: RegistryOptions): Promise<Response> {
  const url = `${CROSSREF_API_BASE}/works/${encodeURIComponent(doi)}`;
  log.debug({ doi }, "looking up work");
  return fetch(url, requestInit(options));
}

/**
 * Whether CrossRef knows a DOI.
 *
 * @returns false on 404
 * @throws On rate limit (429), other HTTP errors or network errors
 */
export async function crossrefWorkExists(doi: string, options?: RegistryOptions): Promise<boolean> {
  const response = await getWork(doi, options);
  if (response.ok) return true;
  if (response.status === 404) return false;
  throw httpError("CrossRef API", response);
}

/**
 * Fetch the CrossRef record of a DOI.
 *
 * @returns The work, or null when CrossRef does not know the DOI
 * @throws On rate limit (429), other HTTP errors or network errors
 */
export async function fetchCrossrefWork(doi: string, options?: RegistryOptions): Promise<CrossrefWork | null> {
  if (!doi) return null;
  const response = await getWork(doi, options);
  if (!response.ok) {
    if (response.status === 404) return null;
    throw httpError("CrossRef API", response);
  }
  const data = (await response.json()) as { message?: CrossrefWorkMessage };
  return data.message ? toWork(data.message) : null;
}

/**
 * Whether CrossRef has a journal with this ISSN.
 *
 * @returns false on 404
 * @throws On rate limit (429), other HTTP errors or network errors
 */
export async function crossrefJournalExists(issn: string, options?: RegistryOptions): Promise<boolean> {
  const url = `${CROSSREF_API_BASE}/journals/${formatIssn(issn)}`;
  log.debug({ issn }, "looking up journal");
  const response = await fetch(url, requestInit(options));
  if (response.ok) return true;
  if (response.status === 404) return false;
  throw httpError("CrossRef API", response);
}

/**
 * Best CrossRef match for a free-text citation.
 *
 * @param citation - Plain-text reference ("A. Smith. Deep learning for things. 2020.")
 * @returns DOI and relevance score of the top hit, or null when there is none
 * @throws On rate limit (429), other HTTP errors or network errors
 */
export async function searchCrossrefBibliographic(
  citation: string,
  options?: RegistryOptions
): Promise<BibliographicMatch | null> {
  if (!citation.trim()) return null;

  const params = new URLSearchParams({
    "query.bibliographic": citation,
    rows: "1",
    select: "DOI,score",
  });
  if (options?.mailto) params.set("mailto", options.mailto);

  const response = await fetch(`${CROSSREF_API_BASE}/works?${params.toString()}`, requestInit(options));
  if (!response.ok) throw httpError("CrossRef API", response);

  const data = (await response.json()) as {
    message?: { items?: Array<Pick<CrossrefWorkMessage, "DOI" | "score">> };
  };
  const top = data.message?.items?.[0];
  if (!top?.DOI) return null;
  return { doi: normalizeDoi(top.DOI), score: top.score ?? 0 };
}
