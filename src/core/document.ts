import type { DocLabel, Token, TokenAttrValue } from "./types.js";

/**
 * A tokenized document with a filter mask over its token buffer.
 *
 * Contract notes:
 * - `tokens`, `mask` and every attribute array always have the same length
 * - filtering narrows the mask in place; the buffer only shrinks through `compact()`
 * - match vectors and sub-masks are indexed over the live view, not the buffer
 */
export interface TokenDocument {
  readonly label: DocLabel;

  /** Raw token buffer, including hidden tokens. */
  readonly tokens: readonly Token[];
  readonly mask: readonly boolean[];

  /** Logical length: number of live tokens. */
  readonly length: number;
  readonly bufferLength: number;

  attrNames(): string[];
  hasAttr(name: string): boolean;
  /** Buffer-level attribute values (hidden entries included). */
  attr(name: string): readonly TokenAttrValue[] | undefined;

  logicalTokens(): Token[];
  /** Live values of one attribute. Unknown names are an INVALID_ARGUMENT. */
  logicalAttr(name: string): TokenAttrValue[];

  isCompact(): boolean;

  /**
   * Narrow the mask. `submask` has one entry per live token; `true` keeps the
   * token (or hides it when `invert` is set).
   */
  applyMask(submask: readonly boolean[], invert?: boolean): void;

  /** New document holding only live tokens; may return `this` when nothing is hidden. */
  compact(): TokenDocument;

  /** New document with every live token replaced by `fn(token)`. */
  mapTokens(fn: (token: Token) => Token): TokenDocument;
}
