/**
 * Existence confirmation.
 *
 * A Resolver answers "does this identifier exist?". The registry resolver asks
 * the authority for each kind; tests and callers with their own data can pass
 * any other implementation.
 */

import type { RegistryOptions } from "../config.js";
import { NotFoundError } from "../errors.js";
import { childLogger } from "../logger.js";
import type { Identifier, IdentifierKind } from "../types.js";
import { arxivIdExists } from "./arxiv.js";
import { crossrefJournalExists, crossrefWorkExists } from "./crossref.js";
import { doiHandleExists } from "./doi-org.js";
import { openLibraryIsbnExists } from "./openlibrary.js";

export interface Resolver {
  /**
   * @param id - Canonical identifier
   * @param signal - Cancels the look-up
   * @returns Whether the identifier exists; rejects when the answer is unknown
   */
  confirm(kind: IdentifierKind, id: string, signal?: AbortSignal): Promise<boolean>;
}

const log = childLogger("resolver");

/**
 * Confirm an identifier through a resolver.
 *
 * @returns The identifier, when the resolver confirms it
 * @throws NotFoundError with reason "absent" when the resolver says no,
 *   or "unreachable" (original error as cause) when it fails
 * @throws The abort reason once `signal` is aborted
 */
export async function confirmIdentifier(
  identifier: Identifier,
  resolver: Resolver,
  signal?: AbortSignal
): Promise<Identifier> {
  signal?.throwIfAborted();
  let exists: boolean;
  try {
    exists = await resolver.confirm(identifier.kind, identifier.normalized, signal);
  } catch (err) {
    signal?.throwIfAborted();
    log.warn({ kind: identifier.kind, id: identifier.normalized, err }, "registry unreachable");
    throw new NotFoundError(identifier.kind, identifier.normalized, "unreachable", { cause: err });
  }
  if (!exists) {
    throw new NotFoundError(identifier.kind, identifier.normalized, "absent");
  }
  return identifier;
}

/** DOIs unknown to CrossRef may belong to another agency (DataCite, mEDRA, ...) */
async function doiExists(doi: string, options: RegistryOptions): Promise<boolean> {
  if (await crossrefWorkExists(doi, options)) return true;
  log.debug({ doi }, "not in CrossRef, trying the handle API");
  return doiHandleExists(doi, options);
}

/**
 * Resolver backed by the public registries:
 * DOI → CrossRef, then doi.org; arXiv → arXiv API; ISBN → Open Library; ISSN → CrossRef journals.
 */
export function createRegistryResolver(options: RegistryOptions = {}): Resolver {
  const checks: Record<IdentifierKind, (id: string, options: RegistryOptions) => Promise<boolean>> = {
    doi: doiExists,
    arxiv: arxivIdExists,
    isbn: openLibraryIsbnExists,
    issn: crossrefJournalExists,
  };
  return {
    confirm: (kind, id, signal) => checks[kind](id, signal ? { ...options, signal } : options),
  };
}
