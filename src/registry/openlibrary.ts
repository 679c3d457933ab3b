/**
 * Open Library Books API client.
 *
 * API: https://openlibrary.org/api/books?bibkeys=ISBN:{isbn}&format=json&jscmd=data
 * Unknown ISBNs come back as an empty object, not as 404.
 */

import type { RegistryOptions } from "../config.js";
import { normalizeIsbn } from "../identifiers/isbn.js";
import { childLogger } from "../logger.js";
import { httpError, requestInit } from "./http.js";

const OPENLIBRARY_API_BASE = "https://openlibrary.org/api/books";

const log = childLogger("openlibrary");

interface OpenLibraryBookData {
  title?: string;
  subtitle?: string;
  authors?: Array<{ name?: string }>;
  publishers?: Array<{ name?: string }>;
  publish_date?: string;
  url?: string;
}

/** Bibliographic record of a book. */
export interface BookRecord {
  isbn: string;
  title?: string;
  authors: string[];
  publisher?: string;
  year?: string;
  url?: string;
}

function toBook(isbn: string, data: OpenLibraryBookData): BookRecord {
  const book: BookRecord = {
    isbn,
    authors: (data.authors ?? []).map((a) => a.name ?? "").filter((name) => name.length > 0),
  };
  const title = [data.title, data.subtitle].filter(Boolean).join(": ");
  if (title) book.title = title;
  const publisher = data.publishers?.[0]?.name;
  if (publisher) book.publisher = publisher;
  const year = data.publish_date?.match(/\b\d{4}\b/)?.[0];
  if (year) book.year = year;
  if (data.url) book.url = data.url;
  return book;
}

/**
 * Fetch the Open Library record of an ISBN.
 *
 * @returns The book, or null when Open Library does not know the ISBN
 * @throws On HTTP errors or network errors
 */
export async function fetchOpenLibraryBook(isbn: string, options?: RegistryOptions): Promise<BookRecord | null> {
  const normalized = normalizeIsbn(isbn);
  if (!normalized) return null;

  const bibkey = `ISBN:${normalized}`;
  const params = new URLSearchParams({ bibkeys: bibkey, format: "json", jscmd: "data" });
  log.debug({ isbn: normalized }, "looking up book");
  const url = `${OPENLIBRARY_API_BASE}?${params.toString()}`;
  const response = await fetch(url, requestInit(options, "application/json"));
  if (!response.ok) throw httpError("Open Library API", response);

  const data = (await response.json()) as Record<string, OpenLibraryBookData | undefined>;
  const entry = data[bibkey];
  return entry ? toBook(normalized, entry) : null;
}

/** Whether Open Library knows an ISBN. */
export async function openLibraryIsbnExists(isbn: string, options?: RegistryOptions): Promise<boolean> {
  return (await fetchOpenLibraryBook(isbn, options)) !== null;
}
