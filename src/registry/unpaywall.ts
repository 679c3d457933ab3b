/**
 * Unpaywall client: the best open-access copy of a DOI.
 *
 * API: https://api.unpaywall.org/v2/{doi}?email={email}
 * The email is mandatory; requests without one are refused.
 */

import type { RegistryOptions } from "../config.js";
import { normalizeDoi } from "../identifiers/doi.js";
import { childLogger } from "../logger.js";
import { httpError, requestInit } from "./http.js";

const UNPAYWALL_BASE_URL = "https://api.unpaywall.org/v2";

const log = childLogger("unpaywall");

interface UnpaywallLocation {
  url?: string | null;
  url_for_pdf?: string | null;
  url_for_landing_page?: string | null;
}

interface UnpaywallApiResponse {
  is_oa?: boolean;
  best_oa_location?: UnpaywallLocation | null;
}

/**
 * URL of the best open-access version of a DOI, the PDF when Unpaywall has one.
 *
 * @param options - `mailto` is sent as the email Unpaywall requires
 * @returns null when the DOI is unknown or closed access
 * @throws When no `mailto` is configured, on rate limit (429) or other HTTP errors
 */
export async function getOaVersion(doi: string, options: RegistryOptions = {}): Promise<string | null> {
  if (!options.mailto) {
    throw new Error("Unpaywall email is required for API access (set PAPER_ID_MAILTO)");
  }
  const normalized = normalizeDoi(doi);
  const url = `${UNPAYWALL_BASE_URL}/${normalized}?email=${encodeURIComponent(options.mailto)}`;
  log.debug({ doi: normalized }, "looking up open-access version");
  const response = await fetch(url, requestInit(options));

  if (response.status === 404) return null;
  if (!response.ok) throw httpError("Unpaywall API", response);

  const data = (await response.json()) as UnpaywallApiResponse;
  if (!data.is_oa || !data.best_oa_location) return null;
  const best = data.best_oa_location;
  return best.url_for_pdf ?? best.url ?? best.url_for_landing_page ?? null;
}
