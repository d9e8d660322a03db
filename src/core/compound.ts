export interface SplitOptions {
  /** Separator(s) to split on. A single string is one separator. Defaults to `["-"]`. */
  splitChars?: string | Iterable<string>;
  /**
   * Minimum length of a resulting part; shorter parts are joined to their
   * neighbour (so "e-mail" stays whole with the default of 2). `null` turns
   * the length criterion off. Must be >= 1.
   */
  minPartLength?: number | null;
  /** Also split at lower/upper case changes ("CamelCase" -> "Camel", "Case"). */
  splitOnCaseChange?: boolean;
}

/**
 * Splits one compound token into parts.
 *
 * Contract notes:
 * - never returns an empty list; `[token]` when nothing is split
 * - pure: no state, same input gives same output
 */
export interface CompoundSplitter {
  split(token: string, options?: SplitOptions): string[];
}
