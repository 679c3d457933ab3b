/**
 * Identifier validators.
 * Turn recognizer candidates into canonical, frozen identifiers, or reject them.
 */

import { ValidationError } from "../errors.js";
import type { Identifier, IdentifierCandidate, IdentifierFailure, IdentifierKind } from "../types.js";
import { isValidArxivId, normalizeArxivId } from "./arxiv.js";
import { doiKey, isValidDoi, normalizeDoi } from "./doi.js";
import { isValidIsbn10, isValidIsbn13, normalizeIsbn } from "./isbn.js";
import { isValidIssn, normalizeIssn } from "./issn.js";

type Canonicalizer = (candidate: string) => string;

function canonicalDoi(candidate: string): string {
  if (!isValidDoi(candidate)) {
    throw new ValidationError("doi", candidate, `Not a DOI: "${candidate}"`);
  }
  return normalizeDoi(candidate);
}

function canonicalArxivId(candidate: string): string {
  if (!isValidArxivId(candidate)) {
    throw new ValidationError("arxiv", candidate, `Not an arXiv identifier: "${candidate}"`);
  }
  return normalizeArxivId(candidate);
}

function canonicalIsbn(candidate: string): string {
  const value = normalizeIsbn(candidate);
  if (value.length === 13 && /^\d{13}$/.test(value)) {
    if (!isValidIsbn13(value)) {
      throw new ValidationError("isbn", candidate, `ISBN-13 checksum mismatch: "${candidate}"`);
    }
    return value;
  }
  if (value.length === 10 && /^\d{9}[\dX]$/.test(value)) {
    if (!isValidIsbn10(value)) {
      throw new ValidationError("isbn", candidate, `ISBN-10 checksum mismatch: "${candidate}"`);
    }
    return value;
  }
  throw new ValidationError("isbn", candidate, `Not an ISBN-10 or ISBN-13: "${candidate}"`);
}

function canonicalIssn(candidate: string): string {
  const value = normalizeIssn(candidate);
  if (!/^\d{7}[\dX]$/.test(value)) {
    throw new ValidationError("issn", candidate, `Not an ISSN: "${candidate}"`);
  }
  if (!isValidIssn(value)) {
    throw new ValidationError("issn", candidate, `ISSN check digit mismatch: "${candidate}"`);
  }
  return value;
}

const CANONICALIZERS: Record<IdentifierKind, Canonicalizer> = {
  doi: canonicalDoi,
  arxiv: canonicalArxivId,
  isbn: canonicalIsbn,
  issn: canonicalIssn,
};

/**
 * Validate a candidate string as the given kind.
 *
 * @returns A frozen identifier holding the canonical form
 * @throws ValidationError when the grammar or checksum does not hold
 */
export function validateIdentifier(candidate: string, kind: IdentifierKind): Identifier {
  const normalized = CANONICALIZERS[kind](candidate);
  return Object.freeze({ kind, raw: candidate, normalized });
}

/** Key identifying an identifier regardless of how it was written. DOIs compare case-insensitively. */
export function identifierKey(identifier: Pick<Identifier, "kind" | "normalized">): string {
  const value = identifier.kind === "doi" ? doiKey(identifier.normalized) : identifier.normalized;
  return `${identifier.kind}:${value}`;
}

export interface ValidationOutcome {
  identifiers: Identifier[];
  failures: IdentifierFailure[];
}

/**
 * Validate every candidate. Failures are collected, never thrown.
 * Identifiers are de-duplicated on kind and canonical form (first occurrence kept).
 */
export function validateCandidates(candidates: Iterable<IdentifierCandidate>): ValidationOutcome {
  const identifiers: Identifier[] = [];
  const failures: IdentifierFailure[] = [];
  const seen = new Set<string>();

  for (const candidate of candidates) {
    try {
      const identifier = validateIdentifier(candidate.raw, candidate.kind);
      const key = identifierKey(identifier);
      if (seen.has(key)) continue;
      seen.add(key);
      identifiers.push(identifier);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      failures.push({ kind: candidate.kind, raw: candidate.raw, error: err.message });
    }
  }

  return { identifiers, failures };
}

/**
 * First candidate that validates, or null. Consumes the iterable only up to that point.
 */
export function firstValidIdentifier(candidates: Iterable<IdentifierCandidate>): Identifier | null {
  for (const candidate of candidates) {
    try {
      return validateIdentifier(candidate.raw, candidate.kind);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
    }
  }
  return null;
}
