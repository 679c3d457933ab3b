/**
 * Tests for arXiv e-print handling.
 */

import { mkdir, stat, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { gzipSync } from "node:zlib";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../config.js";
import { ExtractionError, NotFoundError } from "../errors.js";
import { runTool } from "../extract/runner.js";
import { fetchArxivBbl, findInlineBibliography, isGzip, isPdf, isTar } from "./arxiv-source.js";

vi.mock("../extract/runner.js", () => ({ runTool: vi.fn() }));

const mockRunTool = vi.mocked(runTool);
const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

const config = loadConfig({ LOG_LEVEL: "silent" });

const BIBLIOGRAPHY = "\\begin{thebibliography}{1}\n\\bibitem{a} A.~Smith. Title. 2020.\n\\end{thebibliography}";

function createMockResponse(status: number, body: Buffer, statusText = "OK") {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    arrayBuffer: () => Promise.resolve(body),
  };
}

/** Bytes that pass the tar check; the mocked tar writes the tree */
function fakeTar(): Buffer {
  const archive = Buffer.alloc(1024);
  archive.write("ustar", 257, "latin1");
  return archive;
}

/** Make the mocked tar unpack the given files into the -C directory */
function unpacks(files: Record<string, string>): void {
  mockRunTool.mockImplementationOnce(async (_command, args) => {
    const dir = args[3] ?? "";
    for (const [name, content] of Object.entries(files)) {
      await mkdir(dirname(join(dir, name)), { recursive: true });
      await writeFile(join(dir, name), content);
    }
    return { stdout: "", stderr: "", exitCode: 0 };
  });
}

beforeEach(() => {
  mockFetch.mockReset();
  mockRunTool.mockReset();
});

describe("content checks", () => {
  it("recognizes gzip, tar and PDF bytes", () => {
    expect(isGzip(gzipSync("x"))).toBe(true);
    expect(isTar(fakeTar())).toBe(true);
    expect(isTar(Buffer.from("plain"))).toBe(false);
    expect(isPdf(Buffer.from("%PDF-1.5"))).toBe(true);
  });

  it("finds inline bibliographies", () => {
    expect(findInlineBibliography(`\\section{End}\n${BIBLIOGRAPHY}\n\\end{document}`)).toBe(BIBLIOGRAPHY);
    expect(findInlineBibliography("\\section{End}")).toBeNull();
  });
});

describe("fetchArxivBbl", () => {
  it("unpacks a gzipped tar and joins every .bbl file", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse(200, gzipSync(fakeTar())));
    unpacks({ "main.bbl": "\\bibitem{a} First.", "sub/refs.bbl": "\\bibitem{b} Second." });

    await expect(fetchArxivBbl("arXiv:2303.12345v2", { config })).resolves.toBe(
      "\\bibitem{a} First.\n\n\\bibitem{b} Second."
    );
    expect(mockFetch).toHaveBeenCalledWith("https://arxiv.org/e-print/2303.12345v2", {
      headers: { "User-Agent": "paper-identifiers/0.1.0" },
    });
    const args = mockRunTool.mock.calls[0]?.[1] ?? [];
    expect(mockRunTool.mock.calls[0]?.[0]).toBe("tar");
    expect(args[0]).toBe("-xf");
    expect(args[2]).toBe("-C");
  });

  it("removes the temporary directory afterwards", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse(200, gzipSync(fakeTar())));
    unpacks({ "main.bbl": "\\bibitem{a} First." });

    await fetchArxivBbl("2303.12345", { config });

    const archivePath = mockRunTool.mock.calls[0]?.[1][1] ?? "";
    await expect(stat(dirname(archivePath))).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("falls back to a thebibliography block in the TeX files", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse(200, gzipSync(fakeTar())));
    unpacks({ "paper.tex": `\\begin{document}\n${BIBLIOGRAPHY}\n\\end{document}` });

    await expect(fetchArxivBbl("2303.12345", { config })).resolves.toBe(BIBLIOGRAPHY);
  });

  it("returns null for a source tree without a bibliography", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse(200, gzipSync(fakeTar())));
    unpacks({ "paper.tex": "\\begin{document}Hi\\end{document}" });

    await expect(fetchArxivBbl("2303.12345", { config })).resolves.toBeNull();
  });

  it("searches a single gzipped TeX file", async () => {
    const tex = `\\documentclass{article}\n\\begin{document}\n${BIBLIOGRAPHY}\n\\end{document}\n`;
    mockFetch.mockResolvedValueOnce(createMockResponse(200, gzipSync(tex)));

    await expect(fetchArxivBbl("hep-th/9901001", { config })).resolves.toBe(BIBLIOGRAPHY);
    expect(mockRunTool).not.toHaveBeenCalled();
  });

  it("returns null when only a PDF is available", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse(200, Buffer.from("%PDF-1.5\n...")));
    await expect(fetchArxivBbl("2303.12345", { config })).resolves.toBeNull();
  });

  it("throws NotFoundError for a paper arXiv does not have", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse(404, Buffer.alloc(0), "Not Found"));

    const error = await fetchArxivBbl("arXiv:2303.99999", { config }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({
      kind: "arxiv",
      identifier: "2303.99999",
      reason: "absent",
      message: "arxiv 2303.99999 was not found in its registry",
    });
  });

  it("throws on other HTTP errors", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse(503, Buffer.alloc(0), "Service Unavailable"));
    await expect(fetchArxivBbl("2303.12345", { config })).rejects.toThrow(
      "arXiv e-print error: HTTP 503 Service Unavailable"
    );
  });

  it("reports a corrupt gzip body as an ExtractionError", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse(200, Buffer.from([0x1f, 0x8b, 0x00, 0x01, 0x02])));

    const error = await fetchArxivBbl("2303.12345", { config }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({ tool: "gunzip", reason: "unreadable" });
    expect(error).toHaveProperty("cause");
    expect(mockRunTool).not.toHaveBeenCalled();
  });

  it("propagates tar failures and still cleans up", async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse(200, gzipSync(fakeTar())));
    mockRunTool.mockRejectedValueOnce(new Error("tar exited with code 2"));

    await expect(fetchArxivBbl("2303.12345", { config })).rejects.toThrow("tar exited with code 2");
    const archivePath = mockRunTool.mock.calls[0]?.[1][1] ?? "";
    await expect(stat(dirname(archivePath))).rejects.toMatchObject({ code: "ENOENT" });
  });
});
