/**
 * Shared type definitions.
 * Identifiers, parsed references, and the per-call extraction and analysis records.
 */

/** Kinds of identifier this library recognizes, in recognition order. */
export const IDENTIFIER_KINDS = ["doi", "arxiv", "isbn", "issn"] as const;

export type IdentifierKind = (typeof IDENTIFIER_KINDS)[number];

/**
 * A validated identifier. Instances returned by the validators are frozen.
 */
export interface Identifier {
  readonly kind: IdentifierKind;
  /** Substring as it appeared in the source text */
  readonly raw: string;
  /** Canonical form, satisfying the kind's grammar */
  readonly normalized: string;
}

/**
 * A recognizer match that has not been validated yet.
 */
export interface IdentifierCandidate {
  kind: IdentifierKind;
  raw: string;
  /** Offset of `raw` in the scanned text */
  index: number;
}

/** Input formats understood by the extraction adapters. */
export type PaperFormat = "pdf" | "djvu" | "bbl";

/**
 * Plain text produced by one extraction adapter.
 */
export interface ExtractionResult {
  format: PaperFormat;
  /** Program that produced the text, or "read" when the file was read as-is */
  tool: string;
  text: string;
  exitCode: number;
}

/**
 * One entry of a bibliography, parsed from a single `\bibitem` block.
 * Fields that could not be extracted are left out.
 */
export interface Reference {
  /** Key given to `\bibitem{...}` */
  key?: string;
  /** Optional label given to `\bibitem[...]` */
  label?: string;
  /** The block as it appeared in the .bbl */
  raw: string;
  /** Plain-text rendering of the block */
  text: string;
  authors: string[];
  title?: string;
  year?: string;
  venue?: string;
  identifiers: Identifier[];
  /** Normalized key: "{family-name}{year}" with collision suffixes */
  citationKey: string;
}

/**
 * A candidate that failed format or checksum validation.
 */
export interface IdentifierFailure {
  kind: IdentifierKind;
  raw: string;
  error: string;
}

/**
 * An identifier whose existence a registry could not confirm.
 * Not a negative answer: the registry may simply have been unreachable.
 */
export interface UnconfirmedIdentifier {
  identifier: Identifier;
  reason: "absent" | "unreachable";
  error: string;
}

/** Where the analyzed text came from. */
export type AnalysisSource =
  | { type: "file"; path: string; format: PaperFormat; tool: string }
  | { type: "arxiv"; arxivId: string; hasSource: boolean };

/**
 * Result of analyzing one paper.
 */
export interface PaperAnalysis {
  source: AnalysisSource;
  /** Valid (and, when confirmation was requested, confirmed) identifiers */
  identifiers: Identifier[];
  /** Valid identifiers a registry could not confirm */
  unconfirmed: UnconfirmedIdentifier[];
  /** Candidates rejected by validation */
  failures: IdentifierFailure[];
  references: Reference[];
}
