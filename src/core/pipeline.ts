import type { Token, TokenAttrs } from "./types.js";

export interface TokenizedText {
  tokens: Token[];
  /** Per-token attributes, index-aligned with `tokens`. */
  attrs: TokenAttrs;
}

/**
 * Turns raw text into tokens plus per-token attributes.
 *
 * This is the seam to an external NLP pipeline; it is passed explicitly to
 * whatever needs tokenization, never held globally.
 *
 * Contract notes:
 * - should be deterministic for given input
 * - attribute arrays must have exactly `tokens.length` entries
 * - known attributes: `whitespace` (trailing space), `isPunct`, `likeNum`, `lemma`, `pos`
 */
export interface NlpPipeline {
  /** Two-letter ISO 639-1 code. */
  readonly language: string;
  tokenize(text: string): TokenizedText;
}
