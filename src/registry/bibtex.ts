/**
 * BibTeX entries for identifiers.
 *
 * DOIs get the entry their agency serves through content negotiation. arXiv
 * papers get the entry of their published DOI when there is one, else an
 * @misc built from the arXiv metadata. ISBNs get a @book built from Open
 * Library. ISSNs name a journal, not a work, and have no entry.
 */

import { generateCitationKey } from "../citation-key.js";
import type { RegistryOptions } from "../config.js";
import { arxivToUrl } from "../identifiers/arxiv.js";
import type { Identifier } from "../types.js";
import { type ArxivMetadata, fetchArxivMetadata } from "./arxiv.js";
import { fetchDoiBibtex } from "./doi-org.js";
import { type BookRecord, fetchOpenLibraryBook } from "./openlibrary.js";

type BibtexFields = Array<[string, string | undefined]>;

/** Protect braces and the characters BibTeX treats specially. */
function escapeValue(value: string): string {
  return value.replace(/[{}]/g, "").replace(/([&%$#_])/g, "\\$1");
}

/**
 * Render a BibTeX entry. Fields without a value are left out.
 *
 * @example
 * formatBibtexEntry("book", "smith2020", [["title", "A Book"]])
 * // "@book{smith2020,\n  title = {A Book}\n}"
 */
export function formatBibtexEntry(type: string, key: string, fields: BibtexFields): string {
  const lines = fields
    .filter((field): field is [string, string] => Boolean(field[1]))
    .map(([name, value]) => `  ${name} = {${escapeValue(value)}}`);
  return `@${type}{${key},\n${lines.join(",\n")}\n}`;
}

export function arxivBibtex(metadata: ArxivMetadata): string {
  const year = metadata.published.slice(0, 4) || undefined;
  return formatBibtexEntry("misc", generateCitationKey(metadata.authors[0], year), [
    ["author", metadata.authors.join(" and ")],
    ["title", metadata.title],
    ["year", year],
    ["eprint", metadata.id],
    ["archivePrefix", "arXiv"],
    ["primaryClass", metadata.categories[0]],
    ["url", arxivToUrl(metadata.id)],
  ]);
}

export function bookBibtex(book: BookRecord): string {
  return formatBibtexEntry("book", generateCitationKey(book.authors[0], book.year), [
    ["author", book.authors.join(" and ")],
    ["title", book.title],
    ["publisher", book.publisher],
    ["year", book.year],
    ["isbn", book.isbn],
    ["url", book.url],
  ]);
}

/**
 * BibTeX entry for an identifier.
 *
 * @returns The entry, or null when the registry has none (always null for ISSNs)
 * @throws On HTTP errors or network errors
 */
export async function getBibtex(identifier: Identifier, options?: RegistryOptions): Promise<string | null> {
  switch (identifier.kind) {
    case "doi":
      return fetchDoiBibtex(identifier.normalized, options);
    case "arxiv": {
      const metadata = await fetchArxivMetadata(identifier.normalized, options);
      if (!metadata) return null;
      if (metadata.doi) {
        const published = await fetchDoiBibtex(metadata.doi, options);
        if (published) return published;
      }
      return arxivBibtex(metadata);
    }
    case "isbn": {
      const book = await fetchOpenLibraryBook(identifier.normalized, options);
      return book ? bookBibtex(book) : null;
    }
    case "issn":
      return null;
  }
}
