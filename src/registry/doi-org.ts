/**
 * doi.org resolver client.
 *
 * - Handle API: https://doi.org/api/handles/{doi} (responseCode 1 = exists)
 * - Content negotiation: https://doi.org/{doi} with Accept: application/x-bibtex
 * - Redirect target: HEAD https://doi.org/{doi}
 *
 * Covers DOIs from every registration agency (CrossRef, DataCite, mEDRA, ...).
 */

import type { RegistryOptions } from "../config.js";
import { doiToUrl, normalizeDoi } from "../identifiers/doi.js";
import { childLogger } from "../logger.js";
import { httpError, requestInit } from "./http.js";

const HANDLE_API_BASE = "https://doi.org/api/handles/";

const BIBTEX_CONTENT_TYPE = "application/x-bibtex";

const log = childLogger("doi-org");

/**
 * Whether the DOI handle system has a DOI.
 *
 * @returns false on 404 or a "not found" response code
 * @throws On other HTTP errors or network errors
 */
export async function doiHandleExists(doi: string, options?: RegistryOptions): Promise<boolean> {
  const url = `${HANDLE_API_BASE}${normalizeDoi(doi)}`;
  log.debug({ doi }, "looking up handle");
  const response = await fetch(url, requestInit(options, "application/json"));
  if (response.status === 404) return false;
  if (!response.ok) throw httpError("DOI handle API", response);
  const data = (await response.json()) as { responseCode?: number };
  return data.responseCode === 1;
}

/**
 * BibTeX entry for a DOI through content negotiation.
 *
 * @returns The entry, or null when the DOI is unknown or the agency serves no BibTeX
 * @throws On HTTP errors other than 404/406 or network errors
 */
export async function fetchDoiBibtex(doi: string, options?: RegistryOptions): Promise<string | null> {
  const response = await fetch(doiToUrl(doi), requestInit(options, BIBTEX_CONTENT_TYPE));
  if (!response.ok) {
    if (response.status === 404 || response.status === 406) return null;
    throw httpError("doi.org", response);
  }
  const contentType = response.headers.get("content-type") ?? "";
  if (!contentType.toLowerCase().startsWith(BIBTEX_CONTENT_TYPE)) {
    log.debug({ doi, contentType }, "no BibTeX served");
    return null;
  }
  return (await response.text()).trim();
}

/**
 * URL a DOI redirects to (the publisher's landing page).
 *
 * @returns The Location of the redirect, or null when doi.org does not redirect
 */
export async function getLinkedUrl(doi: string, options?: RegistryOptions): Promise<string | null> {
  const response = await fetch(doiToUrl(doi), {
    ...requestInit(options),
    method: "HEAD",
    redirect: "manual",
  });
  if (response.status < 300 || response.status >= 400) return null;
  return response.headers.get("location");
}
