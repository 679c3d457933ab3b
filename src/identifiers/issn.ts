/**
 * ISSN recognition and checksum (ISO 3297).
 *
 * Seven digits weighted 8..2; check = (11 - sum mod 11) mod 11, with 10 written "X".
 */

/** NNNN-NNNC, not part of a longer digit/hyphen run */
export const ISSN_PATTERN = /(?<![\d-])\d{4}-\d{3}[\dXx](?![\dXx])(?!-\d)/g;

/** Canonical form: hyphen-free, "x" upper-cased, "ISSN" label removed. */
export function normalizeIssn(issn: string): string {
  return issn
    .trim()
    .replace(/^e?ISSN:?\s*/i, "")
    .replace(/[-\s]/g, "")
    .toUpperCase();
}

/** Check character for the first seven digits of an ISSN. */
export function issnCheckDigit(first7: string): string {
  let sum = 0;
  for (let i = 0; i < 7; i++) {
    sum += Number(first7[i]) * (8 - i);
  }
  const check = (11 - (sum % 11)) % 11;
  return check === 10 ? "X" : String(check);
}

/** Whether a string is a checksum-correct ISSN. */
export function isValidIssn(issn: string): boolean {
  const value = normalizeIssn(issn);
  if (!/^\d{7}[\dX]$/.test(value)) return false;
  return issnCheckDigit(value.slice(0, 7)) === value[7];
}

/** Display form with the hyphen: "20493630" → "2049-3630". */
export function formatIssn(issn: string): string {
  const value = normalizeIssn(issn);
  return `${value.slice(0, 4)}-${value.slice(4)}`;
}

/**
 * Extract checksum-valid ISSNs from a text, normalized and de-duplicated,
 * in order of appearance.
 */
export function extractIssns(text: string): string[] {
  const found = new Set<string>();
  for (const match of text.matchAll(ISSN_PATTERN)) {
    const issn = normalizeIssn(match[0]);
    if (isValidIssn(issn)) found.add(issn);
  }
  return [...found];
}
