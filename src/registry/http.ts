/**
 * Request headers shared by the registry clients.
 */

import type { RegistryOptions } from "../config.js";

export const DEFAULT_USER_AGENT = "paper-identifiers/0.1.0";

/**
 * User-Agent (with a mailto contact when configured, as CrossRef asks) and an optional Accept.
 */
export function requestHeaders(options: RegistryOptions = {}, accept?: string): Record<string, string> {
  const agent = options.userAgent ?? DEFAULT_USER_AGENT;
  const headers: Record<string, string> = {
    "User-Agent": options.mailto ? `${agent} (mailto:${options.mailto})` : agent,
  };
  if (accept) headers.Accept = accept;
  return headers;
}

/** fetch init with the shared headers and the caller's abort signal. */
export function requestInit(options: RegistryOptions = {}, accept?: string): RequestInit {
  const init: RequestInit = { headers: requestHeaders(options, accept) };
  if (options.signal) init.signal = options.signal;
  return init;
}

/** Error for an unexpected HTTP status, naming the service. */
export function httpError(service: string, response: Response): Error {
  if (response.status === 429) {
    return new Error(`${service} rate limit exceeded`);
  }
  return new Error(`${service} error: HTTP ${response.status} ${response.statusText}`);
}
