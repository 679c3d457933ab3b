/**
 * arXiv e-print sources.
 *
 * https://arxiv.org/e-print/{id} serves whatever the authors uploaded:
 * - a gzipped tar of the TeX tree (most papers)
 * - a single gzipped TeX file
 * - a PDF, when no source was submitted
 */

import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gunzipSync } from "node:zlib";
import { loadConfig, registryOptionsFrom } from "../config.js";
import { ExtractionError, NotFoundError, errorMessage } from "../errors.js";
import { type ExtractOptions, toolRunOptions } from "../extract/index.js";
import { runTool } from "../extract/runner.js";
import { normalizeArxivId } from "../identifiers/arxiv.js";
import { childLogger } from "../logger.js";
import { httpError, requestInit } from "../registry/http.js";

const ARXIV_EPRINT_BASE = "https://arxiv.org/e-print/";

const THEBIBLIOGRAPHY_PATTERN = /\\begin\s*\{thebibliography\}[\s\S]*?\\end\s*\{thebibliography\}/g;

const log = childLogger("arxiv-source");

export function isGzip(data: Buffer): boolean {
  return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;
}

/** POSIX tar headers carry "ustar" at offset 257 */
export function isTar(data: Buffer): boolean {
  return data.length >= 262 && data.subarray(257, 262).toString("latin1") === "ustar";
}

export function isPdf(data: Buffer): boolean {
  return data.subarray(0, 5).toString("latin1") === "%PDF-";
}

/** Every thebibliography environment in a TeX source, joined by blank lines. */
export function findInlineBibliography(tex: string): string | null {
  const blocks = tex.match(THEBIBLIOGRAPHY_PATTERN);
  return blocks ? blocks.join("\n\n") : null;
}

function gunzip(id: string, body: Buffer): Buffer {
  try {
    return gunzipSync(body);
  } catch (err) {
    throw new ExtractionError(
      `Corrupt e-print archive for ${id}: ${errorMessage(err)}`,
      { tool: "gunzip", reason: "unreadable" },
      { cause: err }
    );
  }
}

/** Unpack a tar archive and collect its bibliography. */
async function bibliographyFromTar(archive: Buffer, options: ExtractOptions): Promise<string | null> {
  const config = options.config ?? loadConfig();
  const dir = await mkdtemp(join(tmpdir(), "paper-identifiers-"));
  try {
    const archivePath = join(dir, "source.tar");
    const treeDir = join(dir, "tree");
    await writeFile(archivePath, archive);
    await mkdir(treeDir);

    await runTool(config.PAPER_ID_TAR, ["-xf", archivePath, "-C", treeDir], toolRunOptions(options, config));

    const files = (await readdir(treeDir, { recursive: true })).sort();
    const bblFiles = files.filter((file) => file.toLowerCase().endsWith(".bbl"));
    if (bblFiles.length > 0) {
      const contents: string[] = [];
      for (const file of bblFiles) {
        contents.push(await readFile(join(treeDir, file), "utf-8"));
      }
      return contents.join("\n\n");
    }

    for (const file of files.filter((f) => f.toLowerCase().endsWith(".tex"))) {
      const inline = findInlineBibliography(await readFile(join(treeDir, file), "utf-8"));
      if (inline) return inline;
    }
    return null;
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/**
 * Bibliography (.bbl content, or an inline thebibliography block) of an arXiv paper.
 *
 * @returns The bibliography, or null when the paper has no TeX source or no bibliography
 * @throws NotFoundError (reason "absent") when arXiv has no such paper
 * @throws ExtractionError when the archive is corrupt or tar fails
 * @throws On other HTTP errors or network errors
 */
export async function fetchArxivBbl(id: string, options: ExtractOptions = {}): Promise<string | null> {
  const config = options.config ?? loadConfig();
  const normalized = normalizeArxivId(id);
  const url = `${ARXIV_EPRINT_BASE}${normalized}`;
  log.debug({ id, url }, "downloading e-print");

  const registry = registryOptionsFrom(config);
  if (options.signal) registry.signal = options.signal;
  const response = await fetch(url, requestInit(registry));
  if (response.status === 404) throw new NotFoundError("arxiv", normalized, "absent");
  if (!response.ok) throw httpError("arXiv e-print", response);

  const body = Buffer.from(await response.arrayBuffer());
  if (isPdf(body)) {
    log.debug({ id }, "no TeX source available");
    return null;
  }

  const data = isGzip(body) ? gunzip(normalized, body) : body;
  if (isTar(data)) {
    return bibliographyFromTar(data, { ...options, config });
  }
  return findInlineBibliography(data.toString("utf-8"));
}
