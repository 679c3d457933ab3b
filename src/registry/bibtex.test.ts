/**
 * Tests for BibTeX entries.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { validateIdentifier } from "../identifiers/validate.js";
import { formatBibtexEntry, getBibtex } from "./bibtex.js";

const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

function createMockResponse(
  overrides: Partial<{ status: number; body: unknown; text: string; headers: Record<string, string> }> = {}
) {
  const status = overrides.status ?? 200;
  const headers = new Map(Object.entries(overrides.headers ?? {}));
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Error",
    json: () => Promise.resolve(overrides.body ?? {}),
    text: () => Promise.resolve(overrides.text ?? ""),
    headers: { get: (key: string) => headers.get(key.toLowerCase()) ?? null },
  };
}

function arxivFeed(doi?: string): string {
  return `<feed xmlns="http://www.w3.org/2005/Atom" xmlns:arxiv="http://arxiv.org/schemas/atom">
  <entry>
    <id>http://arxiv.org/abs/2303.12345v2</id>
    <published>2023-03-22T00:00:00Z</published>
    <updated>2023-04-01T00:00:00Z</updated>
    <title>Deep Learning for Things</title>
    <summary>We study things.</summary>
    <author><name>Alice Smith</name></author>
    <author><name>Bob Jones</name></author>
    ${doi ? `<arxiv:doi>${doi}</arxiv:doi>` : ""}
    <category term="cs.LG"/>
  </entry>
</feed>`;
}

const BIBTEX = "@article{Smith_2023, title={Deep Learning for Things}}";

beforeEach(() => {
  mockFetch.mockReset();
});

describe("formatBibtexEntry", () => {
  it("renders fields in order and leaves out empty ones", () => {
    expect(formatBibtexEntry("book", "smith2020", [["title", "A Book"], ["publisher", undefined]])).toBe(
      "@book{smith2020,\n  title = {A Book}\n}"
    );
  });

  it("escapes BibTeX specials", () => {
    expect(formatBibtexEntry("misc", "k", [["title", "R&D at 50% {off}"]])).toBe(
      "@misc{k,\n  title = {R\\&D at 50\\% off}\n}"
    );
  });
});

describe("getBibtex", () => {
  it("negotiates BibTeX for a DOI", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ text: BIBTEX, headers: { "content-type": "application/x-bibtex" } })
    );

    await expect(getBibtex(validateIdentifier("10.1000/xyz", "doi"))).resolves.toBe(BIBTEX);
    expect(mockFetch.mock.calls[0]?.[0]).toBe("https://doi.org/10.1000/xyz");
  });

  it("uses the published DOI of an arXiv paper when it has one", async () => {
    mockFetch
      .mockResolvedValueOnce(createMockResponse({ text: arxivFeed("10.1000/xyz") }))
      .mockResolvedValueOnce(
        createMockResponse({ text: BIBTEX, headers: { "content-type": "application/x-bibtex" } })
      );

    await expect(getBibtex(validateIdentifier("arXiv:2303.12345", "arxiv"))).resolves.toBe(BIBTEX);
    expect(mockFetch.mock.calls[1]?.[0]).toBe("https://doi.org/10.1000/xyz");
  });

  it("builds a @misc entry for an arXiv paper without a DOI", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ text: arxivFeed() }));

    await expect(getBibtex(validateIdentifier("2303.12345", "arxiv"))).resolves.toBe(
      [
        "@misc{smith2023,",
        "  author = {Alice Smith and Bob Jones},",
        "  title = {Deep Learning for Things},",
        "  year = {2023},",
        "  eprint = {2303.12345v2},",
        "  archivePrefix = {arXiv},",
        "  primaryClass = {cs.LG},",
        "  url = {https://arxiv.org/abs/2303.12345v2}",
        "}",
      ].join("\n")
    );
  });

  it("builds a @book entry for an ISBN", async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({
        body: {
          "ISBN:9780306406157": {
            title: "Pattern Recognition",
            authors: [{ name: "Jane Doe" }],
            publishers: [{ name: "Example Press" }],
            publish_date: "1999",
          },
        },
      })
    );

    await expect(getBibtex(validateIdentifier("978-0-306-40615-7", "isbn"))).resolves.toBe(
      [
        "@book{doe1999,",
        "  author = {Jane Doe},",
        "  title = {Pattern Recognition},",
        "  publisher = {Example Press},",
        "  year = {1999},",
        "  isbn = {9780306406157}",
        "}",
      ].join("\n")
    );
  });

  it("returns null for unknown works and for ISSNs", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ body: {} }));
    await expect(getBibtex(validateIdentifier("0306406152", "isbn"))).resolves.toBeNull();

    await expect(getBibtex(validateIdentifier("0317-8471", "issn"))).resolves.toBeNull();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
