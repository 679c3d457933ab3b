/**
 * Error classes.
 *
 * - ExtractionError: an external program is missing, crashed, timed out or was aborted,
 *   or an input cannot be read or decoded
 * - ValidationError: a candidate fails its kind's grammar or checksum
 * - NotFoundError: a registry could not confirm an identifier (not a hard negative)
 * - ParseError: a bibliography has no recognizable structure at all
 */

import type { IdentifierKind } from "./types.js";

export class PaperIdentifierError extends Error {
  constructor(
    message: string,
    public readonly context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PaperIdentifierError";
  }
}

export type ExtractionFailureReason = "missing" | "timeout" | "aborted" | "exit" | "unsupported" | "unreadable";

export class ExtractionError extends PaperIdentifierError {
  readonly tool: string;
  readonly reason: ExtractionFailureReason;
  readonly exitCode: number | undefined;
  readonly stderr: string | undefined;

  constructor(
    message: string,
    details: { tool: string; reason: ExtractionFailureReason; exitCode?: number; stderr?: string },
    options?: { cause?: unknown }
  ) {
    super(message, { ...details }, options);
    this.name = "ExtractionError";
    this.tool = details.tool;
    this.reason = details.reason;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

export class ValidationError extends PaperIdentifierError {
  readonly kind: IdentifierKind;
  readonly candidate: string;

  constructor(kind: IdentifierKind, candidate: string, message: string) {
    super(message, { kind, candidate });
    this.name = "ValidationError";
    this.kind = kind;
    this.candidate = candidate;
  }
}

export class NotFoundError extends PaperIdentifierError {
  readonly kind: IdentifierKind;
  readonly identifier: string;
  readonly reason: "absent" | "unreachable";

  constructor(
    kind: IdentifierKind,
    identifier: string,
    reason: "absent" | "unreachable",
    options?: { cause?: unknown }
  ) {
    const message =
      reason === "absent"
        ? `${kind} ${identifier} was not found in its registry`
        : `${kind} ${identifier} could not be confirmed: registry unreachable`;
    super(message, { kind, identifier, reason }, options);
    this.name = "NotFoundError";
    this.kind = kind;
    this.identifier = identifier;
    this.reason = reason;
  }
}

export class ParseError extends PaperIdentifierError {
  constructor(message: string, input: string) {
    super(message, { input: input.slice(0, 200) });
    this.name = "ParseError";
  }
}

/**
 * Type guard for errors raised by this library.
 */
export function isPaperIdentifierError(error: unknown): error is PaperIdentifierError {
  return error instanceof PaperIdentifierError;
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
