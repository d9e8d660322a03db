import type { MatchOptions, Pattern, Token } from "./types.js";
import type { TokenDocument } from "./document.js";

export interface GlueResult {
  /** Rebuilt document; the input document is left untouched. */
  document: TokenDocument;
  /** Merged token strings in run order (empty when gluing with `null`). */
  glued: Token[];
}

/**
 * Finds runs of consecutive tokens matching an ordered pattern list, and
 * merges such runs into single tokens.
 */
export interface SubsequentMatcher {
  /**
   * Each run is `patterns.length` consecutive ascending indices into `tokens`
   * where token `run[k]` matches `patterns[k]`. Needs at least two patterns.
   */
  matchSubsequent(patterns: readonly Pattern[], tokens: readonly Token[], options?: MatchOptions): number[][];

  /**
   * Joins every run's tokens with `glue` into one token at the run's first
   * position. `doc` must be compact and runs must not overlap.
   */
  glueSubsequent(doc: TokenDocument, runs: readonly (readonly number[])[], glue?: string | null): GlueResult;
}
