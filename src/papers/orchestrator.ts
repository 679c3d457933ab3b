/**
 * Paper analysis orchestrator.
 * Runs extraction, recognition, validation, citation parsing and optional
 * registry confirmation for one paper, one step after the other.
 */

import { parseBbl, parseBblWithDetex } from "../citations/bbl.js";
import { stripLatex } from "../citations/latex.js";
import { type Config, loadConfig, registryOptionsFrom } from "../config.js";
import { NotFoundError } from "../errors.js";
import { type ExtractOptions, detexText, extractText } from "../extract/index.js";
import { recognizeIdentifiers } from "../identifiers/recognize.js";
import {
  firstValidIdentifier,
  identifierKey,
  validateCandidates,
  validateIdentifier,
} from "../identifiers/validate.js";
import { childLogger } from "../logger.js";
import { type Resolver, confirmIdentifier, createRegistryResolver } from "../registry/resolver.js";
import type {
  AnalysisSource,
  Identifier,
  IdentifierKind,
  PaperAnalysis,
  PaperFormat,
  Reference,
  UnconfirmedIdentifier,
} from "../types.js";
import { fetchArxivBbl } from "./arxiv-source.js";

const log = childLogger("orchestrator");

/** A local file, or an arXiv paper fetched by ID. */
export type PaperInput = { path: string; format?: PaperFormat } | { arxivId: string };

export interface AnalyzeOptions extends ExtractOptions {
  /** Ask a resolver whether each identifier exists */
  confirm?: boolean;
  /** Resolver used with `confirm`; defaults to the public registries */
  resolver?: Resolver;
  /** Kinds to recognize; all by default */
  kinds?: readonly IdentifierKind[];
}

export interface FindIdentifierOptions extends ExtractOptions {
  format?: PaperFormat;
  kinds?: readonly IdentifierKind[];
}

interface ParsedText {
  text: string;
  references: Reference[];
}

/** References of a bibliography, rendered the configured way, plus their joined text. */
async function parseBibliography(bbl: string, options: ExtractOptions, config: Config): Promise<ParsedText> {
  const references =
    config.PAPER_ID_BBL_PLAINTEXT === "detex"
      ? await parseBblWithDetex(bbl, { ...options, config })
      : parseBbl(bbl);
  return { text: references.map((r) => r.text).join("\n"), references };
}

/** Put `first` ahead of the others, dropping any duplicate of it. */
function withFirst(first: Identifier, others: Identifier[]): Identifier[] {
  const key = identifierKey(first);
  return [first, ...others.filter((id) => identifierKey(id) !== key)];
}

interface ConfirmationOutcome {
  confirmed: Identifier[];
  unconfirmed: UnconfirmedIdentifier[];
}

async function confirmAll(
  identifiers: Identifier[],
  resolver: Resolver,
  signal: AbortSignal | undefined
): Promise<ConfirmationOutcome> {
  const confirmed: Identifier[] = [];
  const unconfirmed: UnconfirmedIdentifier[] = [];

  for (const identifier of identifiers) {
    try {
      confirmed.push(await confirmIdentifier(identifier, resolver, signal));
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      unconfirmed.push({ identifier, reason: err.reason, error: err.message });
    }
  }
  return { confirmed, unconfirmed };
}

/**
 * Analyze one paper: identifiers found in it, validation failures, and the
 * references of its bibliography (for .bbl files and arXiv sources).
 *
 * @throws ExtractionError when a tool fails or the format is unsupported
 * @throws ValidationError when an arXiv input is not a valid arXiv ID
 * @throws NotFoundError when arXiv has no paper with that ID
 * @throws The abort reason when `signal` is aborted, confirmation included
 */
export async function analyzePaper(input: PaperInput, options: AnalyzeOptions = {}): Promise<PaperAnalysis> {
  const config = options.config ?? loadConfig();
  const extractOptions: ExtractOptions = { ...options, config };

  let source: AnalysisSource;
  let parsed: ParsedText;
  let own: Identifier | undefined;

  if ("arxivId" in input) {
    own = validateIdentifier(input.arxivId, "arxiv");
    const bbl = await fetchArxivBbl(own.normalized, extractOptions);
    parsed = bbl ? await parseBibliography(bbl, extractOptions, config) : { text: "", references: [] };
    source = { type: "arxiv", arxivId: own.normalized, hasSource: bbl !== null };
  } else {
    const extraction = await extractText(input.path, input.format, extractOptions);
    parsed =
      extraction.format === "bbl"
        ? await parseBibliography(extraction.text, extractOptions, config)
        : { text: extraction.text, references: [] };
    source = { type: "file", path: input.path, format: extraction.format, tool: extraction.tool };
  }

  const outcome = validateCandidates(recognizeIdentifiers(parsed.text, options.kinds));
  let identifiers = own ? withFirst(own, outcome.identifiers) : outcome.identifiers;
  let unconfirmed: UnconfirmedIdentifier[] = [];

  if (options.confirm) {
    const resolver = options.resolver ?? createRegistryResolver(registryOptionsFrom(config));
    ({ confirmed: identifiers, unconfirmed } = await confirmAll(identifiers, resolver, options.signal));
  }

  log.debug(
    {
      source: source.type,
      identifiers: identifiers.length,
      unconfirmed: unconfirmed.length,
      failures: outcome.failures.length,
      references: parsed.references.length,
    },
    "paper analyzed"
  );

  return {
    source,
    identifiers,
    unconfirmed,
    failures: outcome.failures,
    references: parsed.references,
  };
}

/**
 * First valid identifier in a paper, scanning kinds in DOI, arXiv, ISBN, ISSN order.
 * The scan stops at the first candidate that validates.
 *
 * @returns The identifier, or null when the paper has none
 * @throws ExtractionError when a tool fails or the format is unsupported
 */
export async function findIdentifier(path: string, options: FindIdentifierOptions = {}): Promise<Identifier | null> {
  const config = options.config ?? loadConfig();
  const extractOptions: ExtractOptions = { ...options, config };
  const extraction = await extractText(path, options.format, extractOptions);

  let text = extraction.text;
  if (extraction.format === "bbl") {
    text =
      config.PAPER_ID_BBL_PLAINTEXT === "detex"
        ? await detexText(extraction.text, extractOptions)
        : stripLatex(extraction.text);
  }
  return firstValidIdentifier(recognizeIdentifiers(text, options.kinds));
}
