/**
 * Citation key generation for parsed references.
 */

import anyAscii from "any-ascii";

/**
 * Generate a collision suffix: a, b, ..., z, aa, ab, ...
 */
function collisionSuffix(index: number): string {
  let result = "";
  let n = index;
  do {
    result = String.fromCodePoint(97 + (n % 26)) + result;
    n = Math.floor(n / 26) - 1;
  } while (n >= 0);
  return result;
}

/** CJK Unified Ideographs range: U+4E00–U+9FFF */
const CJK_REGEX = /[\u4e00-\u9fff]/;

/** Name particles kept with the family name: "van der Waals" → "vanderwaals" */
const PARTICLES = new Set(["van", "von", "der", "den", "de", "del", "della", "di", "da", "du", "la", "le"]);

/**
 * Extract the family name portion from an author string.
 * "Smith, J." → "Smith", "J. Smith" → "Smith", "Johannes van der Waals" → "van der Waals".
 */
export function extractFamilyName(author: string): string {
  const trimmed = author.trim();
  const commaIndex = trimmed.indexOf(",");
  if (commaIndex >= 0) {
    return trimmed.slice(0, commaIndex).trim();
  }
  const words = trimmed.split(/\s+/);
  let start = words.length - 1;
  while (start > 0 && PARTICLES.has((words[start - 1] ?? "").toLowerCase())) {
    start--;
  }
  return words.slice(start).join(" ");
}

/**
 * Generate a citation key from author and year.
 * Format: {family-name-lowercase}{year}
 * With collision handling via letter suffixes (a, b, c, ...).
 */
export function generateCitationKey(
  author: string | undefined,
  year: string | undefined,
  existingKeys?: Iterable<string>
): string {
  const rawFamily = author?.trim() ? extractFamilyName(author) : "unknown";

  // any-ascii maps CJK ideographs to pinyin, which is wrong for other readings
  const normalizedFamily = CJK_REGEX.test(rawFamily)
    ? "unknown"
    : anyAscii(rawFamily).toLowerCase().replace(/[^a-z]/g, "") || "unknown";

  const normalizedYear = year?.trim() || "0000";

  const baseKey = `${normalizedFamily}${normalizedYear}`;

  const taken = new Set(existingKeys ?? []);
  if (!taken.has(baseKey)) {
    return baseKey;
  }

  for (let i = 0; ; i++) {
    const candidateKey = `${baseKey}${collisionSuffix(i)}`;
    if (!taken.has(candidateKey)) {
      return candidateKey;
    }
  }
}
