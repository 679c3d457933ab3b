/**
 * arXiv identifier recognition and normalization.
 *
 * Two schemes:
 * - modern (April 2007 on): YYMM.NNNN, five-digit sequence numbers from 2015, e.g. "2303.12345v2"
 * - legacy: archive[.SubjectClass]/YYMMNNN, e.g. "hep-th/9901001", "math.GT/0309136"
 *
 * Both take an optional version suffix "vN". The canonical form keeps the version.
 */

const ARXIV_ABS_BASE = "https://arxiv.org/abs/";
const ARXIV_PDF_BASE = "https://arxiv.org/pdf/";

/** DataCite prefix arXiv registers its DOIs under */
const ARXIV_DOI_PREFIX = "10.48550/arXiv.";

const MODERN = String.raw`\d{2}(?:0[1-9]|1[0-2])\.\d{4,5}`;
const LEGACY = String.raw`[a-z]+(?:-[a-z]+)*(?:\.[A-Z]{2})?\/\d{2}(?:0[1-9]|1[0-2])\d{3}`;
const VERSION = String.raw`(?:v\d+)?`;
const PREFIX = String.raw`(?:[aA][rR][xX][iI][vV]:\s?)?`;

/** Modern IDs in free text; not glued to a preceding digit or dot, nor a following digit */
export const ARXIV_MODERN_PATTERN = new RegExp(
  String.raw`(?<![\d.])${PREFIX}${MODERN}${VERSION}(?!\d)`,
  "g"
);

/** Legacy IDs in free text */
export const ARXIV_LEGACY_PATTERN = new RegExp(
  String.raw`(?<![\w.-])${PREFIX}${LEGACY}${VERSION}(?!\d)`,
  "g"
);

const ARXIV_GRAMMAR = new RegExp(`^(?:${MODERN}|${LEGACY})${VERSION}$`);

const ARXIV_URL_PREFIX = /^https?:\/\/(?:www\.|export\.)?arxiv\.org\/(?:abs|pdf)\//i;

/**
 * Canonical form of an arXiv ID: URL, "arXiv:" prefix and ".pdf" suffix removed.
 * Idempotent.
 */
export function normalizeArxivId(id: string): string {
  return id
    .trim()
    .replace(ARXIV_URL_PREFIX, "")
    .replace(/\.pdf$/i, "")
    .replace(/^arxiv:\s*/i, "");
}

/** Whether a string is a well-formed arXiv ID (after normalization). */
export function isValidArxivId(id: string): boolean {
  return ARXIV_GRAMMAR.test(normalizeArxivId(id));
}

/** Whether an ID uses the legacy archive/YYMMNNN scheme. */
export function isLegacyArxivId(id: string): boolean {
  return normalizeArxivId(id).includes("/");
}

/** "2303.12345v2" → "2303.12345" */
export function stripArxivVersion(id: string): string {
  return normalizeArxivId(id).replace(/v\d+$/, "");
}

/** Version number of an ID, or null when the ID names no version. */
export function arxivVersion(id: string): number | null {
  const match = /v(\d+)$/.exec(normalizeArxivId(id));
  return match?.[1] ? Number.parseInt(match[1], 10) : null;
}

/**
 * Extract canonical arXiv IDs (both schemes) from a text,
 * de-duplicated, in order of appearance.
 */
export function extractArxivIds(text: string): string[] {
  const matches = [...text.matchAll(ARXIV_MODERN_PATTERN), ...text.matchAll(ARXIV_LEGACY_PATTERN)];
  matches.sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
  return [...new Set(matches.map((m) => normalizeArxivId(m[0])))];
}

/** Abstract page URL. */
export function arxivToUrl(id: string): string {
  return `${ARXIV_ABS_BASE}${normalizeArxivId(id)}`;
}

/** PDF URL, e.g. https://arxiv.org/pdf/hep-ph/9901234.pdf */
export function arxivPdfUrl(id: string): string {
  return `${ARXIV_PDF_BASE}${normalizeArxivId(id)}.pdf`;
}

/**
 * The DataCite DOI arXiv assigns to every paper (version-independent),
 * e.g. "2303.12345v2" → "10.48550/arXiv.2303.12345".
 */
export function arxivDataciteDoi(id: string): string {
  return `${ARXIV_DOI_PREFIX}${stripArxivVersion(id)}`;
}
