import type { MatchOptions, Pattern } from "./types.js";

/**
 * Evaluates search patterns against a sequence of strings.
 *
 * Contract notes:
 * - result has exactly one entry per input string
 * - empty input yields an empty vector without compiling the pattern
 * - unknown match type / glob method is an INVALID_ARGUMENT, even for empty input
 */
export interface TokenMatcher {
  match(pattern: Pattern, tokens: readonly string[], options?: MatchOptions): boolean[];

  /** Logical OR of `match` over all patterns. */
  matchAny(patterns: Pattern | readonly Pattern[], tokens: readonly string[], options?: MatchOptions): boolean[];
}
