/**
 * Identifier recognizers.
 *
 * Scans free text for DOI, arXiv, ISBN and ISSN candidates. The scan is lazy and
 * restartable: every iteration of the returned iterable walks the text again,
 * one pass per kind, in the order of IDENTIFIER_KINDS.
 *
 * Overlaps are settled first-kind-wins: once a span has been yielded, later
 * candidates overlapping it are skipped, so a substring is never reported as
 * two kinds (e.g. the arXiv ID inside "10.48550/arXiv.2303.12345" stays part of the DOI).
 */

import { IDENTIFIER_KINDS, type IdentifierCandidate, type IdentifierKind } from "../types.js";
import { ARXIV_LEGACY_PATTERN, ARXIV_MODERN_PATTERN } from "./arxiv.js";
import { DOI_PATTERN, trimDoiTail } from "./doi.js";
import { ISBN_PATTERN, isValidIsbn, normalizeIsbn } from "./isbn.js";
import { ISSN_PATTERN } from "./issn.js";

interface Span {
  raw: string;
  index: number;
}

type Scanner = (text: string) => Iterable<Span>;

function* scanDois(text: string): Iterable<Span> {
  for (const match of text.matchAll(DOI_PATTERN)) {
    yield { raw: trimDoiTail(match[0]), index: match.index ?? 0 };
  }
}

function* scanArxivIds(text: string): Iterable<Span> {
  const matches = [...text.matchAll(ARXIV_MODERN_PATTERN), ...text.matchAll(ARXIV_LEGACY_PATTERN)];
  matches.sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
  for (const match of matches) {
    yield { raw: match[0], index: match.index ?? 0 };
  }
}

/** Digit runs are ambiguous, so only checksum-valid ISBNs are candidates. */
function* scanIsbns(text: string): Iterable<Span> {
  for (const match of text.matchAll(ISBN_PATTERN)) {
    if (isValidIsbn(normalizeIsbn(match[0]))) {
      yield { raw: match[0], index: match.index ?? 0 };
    }
  }
}

function* scanIssns(text: string): Iterable<Span> {
  for (const match of text.matchAll(ISSN_PATTERN)) {
    yield { raw: match[0], index: match.index ?? 0 };
  }
}

const SCANNERS: Record<IdentifierKind, Scanner> = {
  doi: scanDois,
  arxiv: scanArxivIds,
  isbn: scanIsbns,
  issn: scanIssns,
};

function overlaps(claimed: Array<[number, number]>, start: number, end: number): boolean {
  return claimed.some(([s, e]) => start < e && s < end);
}

/**
 * Recognize identifier candidates in a text.
 *
 * @param text - Text to scan
 * @param kinds - Kinds to look for; scanned in the fixed DOI, arXiv, ISBN, ISSN order whatever the argument order
 * @returns Lazy iterable; iterating it again rescans the text from the start
 */
export function recognizeIdentifiers(
  text: string,
  kinds: readonly IdentifierKind[] = IDENTIFIER_KINDS
): Iterable<IdentifierCandidate> {
  const selected = IDENTIFIER_KINDS.filter((kind) => kinds.includes(kind));
  return {
    *[Symbol.iterator]() {
      const claimed: Array<[number, number]> = [];
      for (const kind of selected) {
        for (const { raw, index } of SCANNERS[kind](text)) {
          const end = index + raw.length;
          if (raw.length === 0 || overlaps(claimed, index, end)) continue;
          claimed.push([index, end]);
          yield { kind, raw, index };
        }
      }
    },
  };
}

