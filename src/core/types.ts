/** Shared core types used by module contracts. */

export type DocLabel = string;
export type Token = string;

/** Value of a per-token attribute (lemma, POS tag, flags, ...). */
export type TokenAttrValue = string | number | boolean | null;

/** Attribute name -> one value per token, index-aligned with the token buffer. */
export type TokenAttrs = Record<string, readonly TokenAttrValue[]>;

/**
 * Attributes delivered by the NLP pipeline. Anything else attached to a
 * document is an extended attribute; tables list base attributes first.
 */
export const BASE_TOKEN_ATTRS = ["isPunct", "lemma", "likeNum", "pos", "whitespace"] as const;

export type MatchType = "exact" | "regex" | "glob";
export type GlobMethod = "match" | "search";

/** A search pattern: plain string, or a prepared regular expression for `regex` matching. */
export type Pattern = string | RegExp;

export interface MatchOptions {
  /** Defaults to "exact". */
  matchType?: MatchType;
  ignoreCase?: boolean;
  /** Only used for glob patterns. "match" anchors at token start, "search" anywhere. */
  globMethod?: GlobMethod;
}

/** Minimal document representation used when building a collection. */
export interface DocumentInput {
  label: DocLabel;
  tokens: readonly Token[];
  /** Optional per-token attributes, same length as `tokens`. */
  attrs?: TokenAttrs;
}
