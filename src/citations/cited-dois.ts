/**
 * DOIs of the works a bibliography cites.
 */

import type { RegistryOptions } from "../config.js";
import { childLogger } from "../logger.js";
import { searchCrossrefBibliographic } from "../registry/crossref.js";
import type { Reference } from "../types.js";

/** CrossRef relevance score below which a search hit is not trusted */
export const DEFAULT_MIN_SCORE = 60;

export interface FindCitedDoisOptions extends RegistryOptions {
  minScore?: number;
}

export interface CitedDoi {
  reference: Reference;
  /** null when the reference carries no DOI and the search found no good match */
  doi: string | null;
  /** "reference": DOI written in the entry; "search": CrossRef bibliographic match */
  source: "reference" | "search" | null;
  score?: number;
}

const log = childLogger("cited-dois");

/**
 * Find a DOI for every reference, in list order.
 * A DOI already in the entry is used as-is; otherwise the plain text is
 * searched on CrossRef, one request per reference.
 *
 * @throws On CrossRef HTTP errors or network errors
 */
export async function findCitedDois(
  references: Reference[],
  options: FindCitedDoisOptions = {}
): Promise<CitedDoi[]> {
  const { minScore = DEFAULT_MIN_SCORE, ...registry } = options;
  const results: CitedDoi[] = [];

  for (const reference of references) {
    const written = reference.identifiers.find((id) => id.kind === "doi");
    if (written) {
      results.push({ reference, doi: written.normalized, source: "reference" });
      continue;
    }

    const match = await searchCrossrefBibliographic(reference.text, registry);
    if (match && match.score >= minScore) {
      results.push({ reference, doi: match.doi, source: "search", score: match.score });
    } else {
      log.debug({ key: reference.citationKey, score: match?.score }, "no confident match");
      results.push({ reference, doi: null, source: null });
    }
  }

  return results;
}
