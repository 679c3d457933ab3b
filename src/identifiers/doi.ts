/**
 * DOI recognition and normalization.
 *
 * Grammar: 10.<registrant>[.<sub>]*\/<suffix>
 * The canonical form keeps the DOI's case. DOIs compare case-insensitively (see doiKey).
 */

const DOI_URL_BASE = "https://doi.org/";

/** Global pattern for scanning free text. Braces are excluded so LaTeX arguments end a match. */
export const DOI_PATTERN = /\b10\.\d{4,9}(?:\.\d+)*\/[^\s"'<>&{}]+/g;

/** Anchored grammar check for a normalized DOI. */
const DOI_GRAMMAR = /^10\.\d{4,9}(?:\.\d+)*\/[^\s"'<>&{}]+$/;

/** Prefixes removed by normalization: doi.org / dx.doi.org URLs and "doi:" labels */
const DOI_PREFIX = /^(?:https?:\/\/(?:dx\.)?doi\.org\/|doi:\s*)/i;

const TRAILING_PUNCTUATION = new Set([".", ",", ";", ":", "!", "?", "'", '"']);

const CLOSING_BRACKETS: Record<string, string> = { ")": "(", "]": "[" };

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function count(haystack: string, char: string): number {
  let n = 0;
  for (const c of haystack) if (c === char) n++;
  return n;
}

/**
 * Trim sentence punctuation and unbalanced closing brackets off the end of a match.
 * "10.1016/S0735-1097(98)00347-7)." → "10.1016/S0735-1097(98)00347-7"
 */
export function trimDoiTail(match: string): string {
  let doi = match;
  for (;;) {
    const last = doi.at(-1);
    if (last === undefined) return doi;
    if (TRAILING_PUNCTUATION.has(last)) {
      doi = doi.slice(0, -1);
      continue;
    }
    const opening = CLOSING_BRACKETS[last];
    if (opening && count(doi, last) > count(doi, opening)) {
      doi = doi.slice(0, -1);
      continue;
    }
    return doi;
  }
}

/**
 * Canonical form of a DOI: prefix-free, URL-decoded, LaTeX escapes undone.
 * "doi:10.1016/S0735-1097(98)00347-7" → "10.1016/S0735-1097(98)00347-7"
 */
export function normalizeDoi(doi: string): string {
  let value = doi.trim();
  const isUrl = /^https?:\/\//i.test(value);
  value = value.replace(DOI_PREFIX, "");
  if (isUrl) value = safeDecode(value);
  return value.replace(/\\([_&%#])/g, "$1");
}

/** Comparison key: two DOIs name the same object when their keys are equal. */
export function doiKey(doi: string): string {
  return normalizeDoi(doi).toLowerCase();
}

/** Whether a string is a canonical DOI (after normalization). */
export function isValidDoi(doi: string): boolean {
  return DOI_GRAMMAR.test(normalizeDoi(doi));
}

/**
 * Extract canonical DOIs from a text in order of appearance.
 * Case variants of one DOI are reported once, as first written.
 */
export function extractDois(text: string): string[] {
  const found = new Map<string, string>();
  for (const match of text.matchAll(DOI_PATTERN)) {
    const doi = normalizeDoi(trimDoiTail(match[0]));
    if (DOI_GRAMMAR.test(doi) && !found.has(doiKey(doi))) found.set(doiKey(doi), doi);
  }
  return [...found.values()];
}

/** Resolver URL for a DOI. */
export function doiToUrl(doi: string): string {
  return `${DOI_URL_BASE}${normalizeDoi(doi)}`;
}

/**
 * Canonical DOI from a DOI URL (or any text holding one), or null.
 */
export function doiFromUrl(url: string): string | null {
  return extractDois(safeDecode(url))[0] ?? null;
}
