import type { DocLabel, MatchOptions, Token, TokenAttrValue } from "./types.js";
import type { TokenMatcher } from "./matcher.js";
import type { WindowBuilder } from "./window.js";
import type { SubsequentMatcher } from "./subsequent.js";
import type { CompoundSplitter } from "./compound.js";
import type { StopwordSource } from "./stopwords.js";

/** Long-lived capabilities a collection needs from outside the engine. */
export interface CorpusContext {
  /** Two-letter ISO 639-1 code; selects the stopword list. */
  language: string;
  stopwords: StopwordSource;
}

/** Engine parts a collection composes; each can be swapped for tests. */
export interface CorpusDeps {
  matcher: TokenMatcher;
  windows: WindowBuilder;
  runs: SubsequentMatcher;
  splitter: CompoundSplitter;
}

export interface CorpusOptions {
  context?: Partial<CorpusContext>;
  deps?: Partial<CorpusDeps>;
}

export interface LabelOptions {
  /** Explicit labels for array input, one per document. */
  labels?: readonly DocLabel[];
  /** Label template for array input; `{i0}` / `{i1}` become the zero- / one-based index. Defaults to "doc-{i1}". */
  labelFormat?: string;
}

/** Symmetric radius, or `[left, right]`. */
export type ContextSize = number | readonly [number, number];

export interface KwicOptions extends MatchOptions {
  /** Defaults to 2. */
  contextSize?: ContextSize;
  /** Build windows around the tokens that do NOT match. */
  inverse?: boolean;
  /** Wrap the matched token in this marker, e.g. "*" gives "*word*". */
  highlightKeyword?: string;
  /** Attach per-token attribute values to every window. */
  withAttrs?: boolean;
  /** Drop documents without any window. */
  nonEmpty?: boolean;
}

export interface KwicWindow {
  /** Window number within its document. */
  context: number;
  /** Logical token positions covered by the window. */
  positions: number[];
  tokens: Token[];
  attrs?: Record<string, TokenAttrValue[]>;
}

export interface KwicDocument {
  doc: DocLabel;
  windows: KwicWindow[];
}

export type TableCell = string | number | boolean | null;

/** Columnar result handed to a tabular / reporting collaborator. */
export interface Table {
  columns: string[];
  rows: TableCell[][];
}

/** One boolean array per document (in corpus order), or arrays keyed by label. */
export type TokenMasks = readonly (readonly boolean[])[] | Readonly<Record<DocLabel, readonly boolean[]>>;

export interface TokenFilterOptions extends MatchOptions {
  /** Match against this token attribute instead of the token strings. */
  byAttr?: string;
  /** Remove matching tokens instead of keeping them. */
  inverse?: boolean;
}

export interface KwicFilterOptions extends MatchOptions {
  contextSize?: ContextSize;
  inverse?: boolean;
}

export interface DocumentFilterOptions extends MatchOptions {
  byAttr?: string;
  /** Minimum number of matching tokens for a document to count as a hit. Defaults to 1. */
  matchesThreshold?: number;
  /** Keep the documents that miss the threshold instead. */
  inverseResult?: boolean;
  /** Count the tokens that do NOT match. */
  inverseMatches?: boolean;
}

export interface NameFilterOptions extends MatchOptions {
  inverse?: boolean;
}

export interface PosFilterOptions {
  /** Map tags to N / V / ADJ / ADV before comparing. Defaults to true. */
  simplify?: boolean;
  tagset?: "ud" | "penn" | "wn";
  inverse?: boolean;
}

/** "common" is ">=", "uncommon" is "<=". */
export type DocFrequencyComparison = "common" | ">" | ">=" | "uncommon" | "<" | "<=";

export interface DocFrequencyOptions {
  /** Compare document counts instead of proportions. */
  absolute?: boolean;
}

export type TokenSet = readonly string[] | ReadonlySet<string>;

export interface CleanOptions {
  /** `true`: drop punctuation tokens; a list: drop exactly those tokens. Defaults to true. */
  removePunct?: boolean | TokenSet;
  /** `true`: drop the context language's stopwords; a list: drop those. Defaults to true. */
  removeStopwords?: boolean | TokenSet;
  /** Drop "" tokens. Defaults to true. */
  removeEmpty?: boolean;
  removeShorterThan?: number;
  removeLongerThan?: number;
  removeNumbers?: boolean;
}

export interface GlueOptions extends MatchOptions {
  /** Defaults to "_". */
  glue?: string;
}

export interface TermDocumentInput {
  /** Sorted vocabulary; column order of a document-term matrix. */
  vocab: Token[];
  /** Live tokens per document, in corpus order. */
  docs: Token[][];
}

export interface TokenIds {
  vocab: Token[];
  ids: number[][];
  /** Occurrences per vocabulary entry across all documents. */
  counts: number[];
}
