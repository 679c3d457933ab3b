/**
 * Tests for the doi.org client.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { doiHandleExists, fetchDoiBibtex, getLinkedUrl } from "./doi-org.js";

const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

function createMockResponse(
  overrides: Partial<{ status: number; statusText: string; body: unknown; text: string; headers: Record<string, string> }> = {}
) {
  const status = overrides.status ?? 200;
  const headers = new Map(Object.entries(overrides.headers ?? {}));
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: overrides.statusText ?? "OK",
    json: () => Promise.resolve(overrides.body ?? {}),
    text: () => Promise.resolve(overrides.text ?? ""),
    headers: {
      get: (key: string) => headers.get(key.toLowerCase()) ?? null,
    },
  };
}

beforeEach(() => {
  mockFetch.mockReset();
});

describe("doiHandleExists", () => {
  it("returns true for response code 1", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ body: { responseCode: 1, handle: "10.1000/xyz" } }));

    await expect(doiHandleExists("https://doi.org/10.1000/XYZ")).resolves.toBe(true);
    expect(mockFetch).toHaveBeenCalledWith("https://doi.org/api/handles/10.1000/xyz", {
      headers: { "User-Agent": "paper-identifiers/0.1.0", Accept: "application/json" },
    });
  });

  it("returns false on 404", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 404, statusText: "Not Found" }));
    await expect(doiHandleExists("10.1000/missing")).resolves.toBe(false);
  });

  it("throws on server errors", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 502, statusText: "Bad Gateway" }));
    await expect(doiHandleExists("10.1000/xyz")).rejects.toThrow("DOI handle API error: HTTP 502 Bad Gateway");
  });
});

describe("fetchDoiBibtex", () => {
  it("returns the negotiated BibTeX entry", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({
        text: " @article{Smith_2020, title={Deep learning}}\n",
        headers: { "content-type": "application/x-bibtex; charset=utf-8" },
      })
    );

    await expect(fetchDoiBibtex("10.1000/xyz")).resolves.toBe("@article{Smith_2020, title={Deep learning}}");
    expect(mockFetch).toHaveBeenCalledWith("https://doi.org/10.1000/xyz", {
      headers: { "User-Agent": "paper-identifiers/0.1.0", Accept: "application/x-bibtex" },
    });
  });

  it("returns null when the agency serves something else", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ text: "<html></html>", headers: { "content-type": "text/html" } })
    );
    await expect(fetchDoiBibtex("10.1000/xyz")).resolves.toBeNull();
  });

  it("returns null on 404 and 406", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 404, statusText: "Not Found" }));
    await expect(fetchDoiBibtex("10.1000/missing")).resolves.toBeNull();
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 406, statusText: "Not Acceptable" }));
    await expect(fetchDoiBibtex("10.1000/xyz")).resolves.toBeNull();
  });
});

describe("getLinkedUrl", () => {
  it("returns the redirect target", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ status: 302, statusText: "Found", headers: { location: "https://publisher.example/article/1" } })
    );

    await expect(getLinkedUrl("10.1000/xyz")).resolves.toBe("https://publisher.example/article/1");
    expect(mockFetch).toHaveBeenCalledWith("https://doi.org/10.1000/xyz", {
      method: "HEAD",
      redirect: "manual",
      headers: { "User-Agent": "paper-identifiers/0.1.0" },
    });
  });

  it("returns null when doi.org does not redirect", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 404, statusText: "Not Found" }));
    await expect(getLinkedUrl("10.1000/missing")).resolves.toBeNull();
  });
});
