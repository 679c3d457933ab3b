/**
 * Text extraction adapters.
 *
 * - PDF: `pdftotext <file> -`
 * - DjVu: `djvutxt <file>`
 * - LaTeX / .bbl: OpenDeTeX (`detex -s`) reading stdin
 *
 * Program names come from the configuration, so callers can point at
 * non-standard installs.
 */

import { type FileHandle, open, readFile } from "node:fs/promises";
import { extname } from "node:path";
import { type Config, loadConfig } from "../config.js";
import { ExtractionError, errorMessage } from "../errors.js";
import type { ExtractionResult, PaperFormat } from "../types.js";
import { runTool } from "./runner.js";

export interface ExtractOptions {
  config?: Config;
  signal?: AbortSignal;
  /** Overrides PAPER_ID_TIMEOUT_MS */
  timeoutMs?: number;
}

const EXTENSION_FORMATS: Record<string, PaperFormat> = {
  ".pdf": "pdf",
  ".djvu": "djvu",
  ".djv": "djvu",
  ".bbl": "bbl",
};

/** Bytes read when sniffing a file without a known extension */
const SNIFF_BYTES = 4096;

/** Timeout and abort settings for runTool, the option overriding the configuration. */
export function toolRunOptions(options: ExtractOptions, config: Config): { timeoutMs?: number; signal?: AbortSignal } {
  const result: { timeoutMs?: number; signal?: AbortSignal } = {};
  const timeoutMs = options.timeoutMs ?? config.PAPER_ID_TIMEOUT_MS;
  if (timeoutMs !== undefined) result.timeoutMs = timeoutMs;
  if (options.signal) result.signal = options.signal;
  return result;
}

/** An input file that cannot be read (missing, a directory, no permission). */
function unreadableInput(tool: string, path: string, err: unknown): ExtractionError {
  return new ExtractionError(
    `Cannot read ${path}: ${errorMessage(err)}`,
    { tool, reason: "unreadable" },
    { cause: err }
  );
}

async function readHead(path: string): Promise<Buffer> {
  let handle: FileHandle | undefined;
  try {
    handle = await open(path, "r");
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } catch (err) {
    throw unreadableInput("sniff", path, err);
  } finally {
    await handle?.close();
  }
}

async function readBbl(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    throw unreadableInput("read", path, err);
  }
}

/** Format from the leading bytes of a file. */
export function sniffContent(head: Buffer): PaperFormat | null {
  if (head.subarray(0, 5).toString("latin1") === "%PDF-") return "pdf";
  if (head.subarray(0, 8).toString("latin1") === "AT&TFORM") return "djvu";
  const text = head.toString("utf-8");
  if (text.includes("\\bibitem") || text.includes("thebibliography")) return "bbl";
  return null;
}

/**
 * Determine a file's format from its extension, falling back to its content.
 *
 * @throws ExtractionError (reason "unsupported") when neither identifies it,
 *   or (reason "unreadable") when the file cannot be read
 */
export async function sniffFormat(path: string): Promise<PaperFormat> {
  const byExtension = EXTENSION_FORMATS[extname(path).toLowerCase()];
  if (byExtension) return byExtension;

  const format = sniffContent(await readHead(path));
  if (format) return format;

  throw new ExtractionError(`Unsupported file format: ${path}`, { tool: "sniff", reason: "unsupported" });
}

/** Plain text of a PDF via pdftotext. */
export async function extractPdfText(path: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
  const config = options.config ?? loadConfig();
  const tool = config.PAPER_ID_PDFTOTEXT;
  const { stdout, exitCode } = await runTool(tool, [path, "-"], toolRunOptions(options, config));
  return { format: "pdf", tool, text: stdout, exitCode };
}

/** Plain text of a DjVu document via djvutxt. */
export async function extractDjvuText(path: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
  const config = options.config ?? loadConfig();
  const tool = config.PAPER_ID_DJVUTXT;
  const { stdout, exitCode } = await runTool(tool, [path], toolRunOptions(options, config));
  return { format: "djvu", tool, text: stdout, exitCode };
}

/**
 * Strip LaTeX markup through OpenDeTeX. `-s` replaces control sequences
 * with a space so words on either side stay apart.
 */
export async function detexText(latex: string, options: ExtractOptions = {}): Promise<string> {
  const config = options.config ?? loadConfig();
  const { stdout } = await runTool(config.PAPER_ID_DETEX, ["-s"], {
    ...toolRunOptions(options, config),
    input: latex,
  });
  return stdout;
}

/**
 * Extract the text of a paper with the adapter for its format.
 * `.bbl` files are returned as read; turning them into plain text is the
 * citation parser's job.
 *
 * @param format - Declared format; sniffed from the file when omitted
 * @throws ExtractionError when the format is unsupported, the file is unreadable or the tool fails
 */
export async function extractText(
  path: string,
  format?: PaperFormat,
  options: ExtractOptions = {}
): Promise<ExtractionResult> {
  const resolved = format ?? (await sniffFormat(path));
  switch (resolved) {
    case "pdf":
      return extractPdfText(path, options);
    case "djvu":
      return extractDjvuText(path, options);
    case "bbl":
      return { format: "bbl", tool: "read", text: await readBbl(path), exitCode: 0 };
  }
}
