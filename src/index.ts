/**
 * # paper-identifiers
 *
 * Finds DOIs, arXiv IDs, ISBNs and ISSNs in academic papers, validates them,
 * and parses LaTeX bibliographies (.bbl) into structured references.
 *
 * ## Workflow
 *
 * 1. **Extract**: Plain text from a PDF (`pdftotext`), DjVu (`djvutxt`) or .bbl file.
 * 2. **Recognize**: Lazy scan for identifier candidates, in DOI, arXiv, ISBN, ISSN order.
 * 3. **Validate**: Grammar and checksum checks; canonical forms.
 * 4. **Confirm** (optional): Ask CrossRef, doi.org, arXiv or Open Library whether an identifier exists.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { analyzePaper, findIdentifier, getBibtex, parseBbl } from "paper-identifiers";
 *
 * const analysis = await analyzePaper({ path: "paper.pdf" }, { confirm: true });
 * for (const id of analysis.identifiers) {
 *   console.log(id.kind, id.normalized);
 * }
 *
 * const first = await findIdentifier("book.djvu");
 * if (first) console.log(await getBibtex(first));
 *
 * const references = parseBbl(await readFile("paper.bbl", "utf-8"));
 * ```
 *
 * ## Configuration
 *
 * Environment variables, read by {@link loadConfig}:
 *
 * - **PAPER_ID_PDFTOTEXT**, **PAPER_ID_DJVUTXT**, **PAPER_ID_DETEX**, **PAPER_ID_TAR**: program names.
 * - **PAPER_ID_BBL_PLAINTEXT**: `detex` (default) or `builtin`.
 * - **PAPER_ID_TIMEOUT_MS**: subprocess timeout; none by default.
 * - **PAPER_ID_MAILTO** / **PAPER_ID_USER_AGENT**: identification sent to the registries.
 * - **LOG_LEVEL**: pino log level.
 *
 * ## Modules
 *
 * - **Extraction**: {@link extractText}, {@link sniffFormat}, {@link detexText}
 * - **Identifiers**: {@link recognizeIdentifiers}, {@link validateIdentifier}, {@link validateCandidates}
 * - **Citations**: {@link parseBbl}, {@link parseBblWithDetex}, {@link findCitedDois}
 * - **Registries**: {@link createRegistryResolver}, {@link getBibtex}, {@link fetchArxivMetadata}, {@link fetchCrossrefWork}, {@link getOaVersion}
 * - **Papers**: {@link analyzePaper}, {@link findIdentifier}, {@link fetchArxivBbl}
 *
 * @module paper-identifiers
 */

// === Extraction ===
export {
  detexText,
  extractDjvuText,
  extractPdfText,
  extractText,
  sniffContent,
  sniffFormat,
} from "./extract/index.js";
export type { ExtractOptions } from "./extract/index.js";
export { runTool } from "./extract/runner.js";
export type { RunOptions, RunResult } from "./extract/runner.js";

// === Identifiers ===
export { recognizeIdentifiers } from "./identifiers/recognize.js";
export {
  firstValidIdentifier,
  identifierKey,
  validateCandidates,
  validateIdentifier,
} from "./identifiers/validate.js";
export type { ValidationOutcome } from "./identifiers/validate.js";
export { doiFromUrl, doiKey, doiToUrl, extractDois, isValidDoi, normalizeDoi } from "./identifiers/doi.js";
export {
  arxivDataciteDoi,
  arxivPdfUrl,
  arxivToUrl,
  arxivVersion,
  extractArxivIds,
  isLegacyArxivId,
  isValidArxivId,
  normalizeArxivId,
  stripArxivVersion,
} from "./identifiers/arxiv.js";
export {
  extractIsbns,
  isValidIsbn,
  isValidIsbn10,
  isValidIsbn13,
  normalizeIsbn,
  toIsbn10,
  toIsbn13,
} from "./identifiers/isbn.js";
export { extractIssns, formatIssn, isValidIssn, normalizeIssn } from "./identifiers/issn.js";

// === Citations ===
export {
  assignCitationKeys,
  parseAuthors,
  parseBbl,
  parseBblStrict,
  parseBblWithDetex,
  splitBibitems,
} from "./citations/bbl.js";
export type { Bibitem } from "./citations/bbl.js";
export { stripLatex } from "./citations/latex.js";
export { DEFAULT_MIN_SCORE, findCitedDois } from "./citations/cited-dois.js";
export type { CitedDoi, FindCitedDoisOptions } from "./citations/cited-dois.js";
export { extractFamilyName, generateCitationKey } from "./citation-key.js";

// === Registries ===
export { confirmIdentifier, createRegistryResolver } from "./registry/resolver.js";
export type { Resolver } from "./registry/resolver.js";
export {
  crossrefJournalExists,
  crossrefWorkExists,
  fetchCrossrefWork,
  searchCrossrefBibliographic,
} from "./registry/crossref.js";
export type { BibliographicMatch, CrossrefWork } from "./registry/crossref.js";
export { doiHandleExists, fetchDoiBibtex, getLinkedUrl } from "./registry/doi-org.js";
export {
  arxivIdExists,
  arxivToDoi,
  fetchArxivEntries,
  fetchArxivMetadata,
  getLatestArxivVersion,
  parseArxivFeed,
} from "./registry/arxiv.js";
export type { ArxivMetadata } from "./registry/arxiv.js";
export { fetchOpenLibraryBook, openLibraryIsbnExists } from "./registry/openlibrary.js";
export type { BookRecord } from "./registry/openlibrary.js";
export { formatBibtexEntry, getBibtex } from "./registry/bibtex.js";
export { getOaVersion } from "./registry/unpaywall.js";

// === Papers ===
export { analyzePaper, findIdentifier } from "./papers/orchestrator.js";
export type { AnalyzeOptions, FindIdentifierOptions, PaperInput } from "./papers/orchestrator.js";
export { fetchArxivBbl, findInlineBibliography } from "./papers/arxiv-source.js";

// === Configuration, logging & errors ===
export { ConfigSchema, loadConfig, registryOptionsFrom } from "./config.js";
export type { Config, RegistryOptions } from "./config.js";
export { childLogger, logger } from "./logger.js";
export {
  ExtractionError,
  NotFoundError,
  PaperIdentifierError,
  ParseError,
  ValidationError,
  errorMessage,
  isPaperIdentifierError,
} from "./errors.js";
export type { ExtractionFailureReason } from "./errors.js";

// === Types ===
export { IDENTIFIER_KINDS } from "./types.js";
export type {
  AnalysisSource,
  ExtractionResult,
  Identifier,
  IdentifierCandidate,
  IdentifierFailure,
  IdentifierKind,
  PaperAnalysis,
  PaperFormat,
  Reference,
  UnconfirmedIdentifier,
} from "./types.js";
