export type CorpusErrorCode =
  | "INVALID_ARGUMENT"
  | "SHAPE_MISMATCH"
  | "NOT_COMPACT"
  | "DUPLICATE_LABEL"
  | "UNKNOWN_DOCUMENT";

/**
 * Raised for every contract violation in the engine. Thrown before any
 * document is touched, so a failed call leaves its inputs unchanged.
 */
export class CorpusError extends Error {
  readonly code: CorpusErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: CorpusErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "CorpusError";
    this.code = code;
    if (details) this.details = details;
  }
}

/** Length of a mask, shape or attribute array does not fit the document. */
export class ShapeError extends CorpusError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("SHAPE_MISMATCH", message, details);
    this.name = "ShapeError";
  }
}

export function invalidArgument(message: string, details?: Record<string, unknown>): CorpusError {
  return new CorpusError("INVALID_ARGUMENT", message, details);
}

export function requireNonNegativeInt(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw invalidArgument(`\`${name}\` must be an integer >= 0`, { [name]: value });
  }
}
