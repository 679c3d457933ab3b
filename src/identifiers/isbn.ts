/**
 * ISBN recognition, checksums and conversions.
 *
 * ISBN-10: weights 10..1, sum mod 11 = 0; the check digit may be "X" (10).
 * ISBN-13: weights alternating 1 and 3, sum mod 10 = 0.
 */

/**
 * 13- or 10-digit runs with single hyphen/space separators, optionally labelled "ISBN", "ISBN-13:", etc.
 * Not glued to surrounding digits.
 */
export const ISBN_PATTERN =
  /(?:ISBN(?:-1[03])?:?\s*)?(?<![\d-])(?:97[89](?:[- ]?\d){10}|\d(?:[- ]?\d){8}[- ]?[\dXx])(?![\dXx])(?!-\d)/g;

const ISBN_LABEL = /^ISBN(?:-1[03])?:?\s*/i;

/** Canonical form: label removed, separators removed, "x" upper-cased. */
export function normalizeIsbn(isbn: string): string {
  return isbn.trim().replace(ISBN_LABEL, "").replace(/[-\s]/g, "").toUpperCase();
}

function digitsOf(value: string): number[] | null {
  const digits: number[] = [];
  for (const char of value) {
    if (char < "0" || char > "9") return null;
    digits.push(char.charCodeAt(0) - 48);
  }
  return digits;
}

function isbn10Sum(first9: number[]): number {
  return first9.reduce((sum, digit, i) => sum + digit * (10 - i), 0);
}

function isbn13Sum(first12: number[]): number {
  return first12.reduce((sum, digit, i) => sum + digit * (i % 2 === 0 ? 1 : 3), 0);
}

/** Check digit ("0"-"9" or "X") completing nine ISBN-10 digits. */
function isbn10CheckDigit(first9: number[]): string {
  const check = (11 - (isbn10Sum(first9) % 11)) % 11;
  return check === 10 ? "X" : String(check);
}

/** Check digit completing twelve ISBN-13 digits. */
function isbn13CheckDigit(first12: number[]): string {
  return String((10 - (isbn13Sum(first12) % 10)) % 10);
}

/** Checksum test for a normalized 10-character ISBN. */
export function isValidIsbn10(isbn: string): boolean {
  const value = normalizeIsbn(isbn);
  if (value.length !== 10) return false;
  const first9 = digitsOf(value.slice(0, 9));
  if (!first9) return false;
  return isbn10CheckDigit(first9) === value[9];
}

/** Checksum test for a normalized 13-digit ISBN. */
export function isValidIsbn13(isbn: string): boolean {
  const value = normalizeIsbn(isbn);
  if (value.length !== 13) return false;
  const first12 = digitsOf(value.slice(0, 12));
  if (!first12) return false;
  return isbn13CheckDigit(first12) === value[12];
}

/** Whether a string is a checksum-correct ISBN-10 or ISBN-13. */
export function isValidIsbn(isbn: string): boolean {
  return isValidIsbn10(isbn) || isValidIsbn13(isbn);
}

/**
 * ISBN-13 form of a valid ISBN (ISBN-13 input is returned normalized).
 * Returns null when the input is not a valid ISBN.
 */
export function toIsbn13(isbn: string): string | null {
  const value = normalizeIsbn(isbn);
  if (isValidIsbn13(value)) return value;
  if (!isValidIsbn10(value)) return null;
  const first12 = digitsOf(`978${value.slice(0, 9)}`);
  if (!first12) return null;
  return `978${value.slice(0, 9)}${isbn13CheckDigit(first12)}`;
}

/**
 * ISBN-10 form of a valid ISBN. Only "978" ISBN-13s have one; returns null otherwise.
 */
export function toIsbn10(isbn: string): string | null {
  const value = normalizeIsbn(isbn);
  if (isValidIsbn10(value)) return value;
  if (!isValidIsbn13(value) || !value.startsWith("978")) return null;
  const first9 = digitsOf(value.slice(3, 12));
  if (!first9) return null;
  return `${value.slice(3, 12)}${isbn10CheckDigit(first9)}`;
}

/**
 * Extract checksum-valid ISBNs from a text, normalized and de-duplicated,
 * in order of appearance.
 */
export function extractIsbns(text: string): string[] {
  const found = new Set<string>();
  for (const match of text.matchAll(ISBN_PATTERN)) {
    const isbn = normalizeIsbn(match[0]);
    if (isValidIsbn(isbn)) found.add(isbn);
  }
  return [...found];
}
