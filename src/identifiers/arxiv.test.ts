import { describe, expect, it } from "vitest";
import {
  arxivDataciteDoi,
  arxivPdfUrl,
  arxivToUrl,
  arxivVersion,
  extractArxivIds,
  isLegacyArxivId,
  isValidArxivId,
  normalizeArxivId,
  stripArxivVersion,
} from "./arxiv.js";

describe("normalizeArxivId", () => {
  it("strips abstract and PDF URLs", () => {
    expect(normalizeArxivId("https://arxiv.org/abs/2303.12345v2")).toBe("2303.12345v2");
    expect(normalizeArxivId("https://arxiv.org/pdf/2303.12345v2.pdf")).toBe("2303.12345v2");
  });

  it("strips the arXiv: prefix and keeps the subject class case", () => {
    expect(normalizeArxivId("arXiv:math.GT/0309136")).toBe("math.GT/0309136");
  });

  it("is idempotent", () => {
    for (const input of ["arXiv:2303.12345v2", "https://arxiv.org/abs/hep-th/9901001", " 0704.0001 "]) {
      const once = normalizeArxivId(input);
      expect(normalizeArxivId(once)).toBe(once);
    }
  });
});

describe("isValidArxivId", () => {
  it("accepts modern and legacy IDs, with or without a version", () => {
    expect(isValidArxivId("0704.0001")).toBe(true);
    expect(isValidArxivId("2303.12345v2")).toBe(true);
    expect(isValidArxivId("hep-th/9901001v3")).toBe(true);
    expect(isValidArxivId("math.GT/0309136")).toBe(true);
  });

  it("rejects impossible months and short sequence numbers", () => {
    expect(isValidArxivId("2313.12345")).toBe(false);
    expect(isValidArxivId("1234.5")).toBe(false);
  });
});

describe("version helpers", () => {
  it("strips and reads the version suffix", () => {
    expect(stripArxivVersion("2303.12345v2")).toBe("2303.12345");
    expect(arxivVersion("2303.12345v2")).toBe(2);
    expect(arxivVersion("2303.12345")).toBeNull();
  });

  it("tells the two schemes apart", () => {
    expect(isLegacyArxivId("hep-th/9901001")).toBe(true);
    expect(isLegacyArxivId("2303.12345")).toBe(false);
  });
});

describe("URLs and DOIs", () => {
  it("builds abstract and PDF URLs", () => {
    expect(arxivToUrl("arXiv:2303.12345v2")).toBe("https://arxiv.org/abs/2303.12345v2");
    expect(arxivPdfUrl("hep-ph/9901234")).toBe("https://arxiv.org/pdf/hep-ph/9901234.pdf");
  });

  it("derives the version-independent DataCite DOI", () => {
    expect(arxivDataciteDoi("2303.12345v2")).toBe("10.48550/arXiv.2303.12345");
  });
});

describe("extractArxivIds", () => {
  it("finds both schemes in order, de-duplicated", () => {
    expect(extractArxivIds("arXiv:2303.12345 and hep-th/9901001v2 and arXiv:2303.12345")).toEqual([
      "2303.12345",
      "hep-th/9901001v2",
    ]);
  });

  it("ignores digit runs glued to other numbers", () => {
    expect(extractArxivIds("version 1.2303.12345")).toEqual([]);
  });
});
