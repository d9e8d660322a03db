import type { DocLabel, DocumentInput, Pattern, Token, TokenAttrValue } from "../types.js";
import type { TokenDocument } from "../document.js";
import type { NlpPipeline } from "../pipeline.js";
import type { SplitOptions } from "../compound.js";
import type {
  CleanOptions,
  CorpusContext,
  CorpusDeps,
  CorpusOptions,
  DocFrequencyComparison,
  DocFrequencyOptions,
  DocumentFilterOptions,
  GlueOptions,
  KwicDocument,
  KwicFilterOptions,
  KwicOptions,
  LabelOptions,
  NameFilterOptions,
  PosFilterOptions,
  Table,
  TermDocumentInput,
  TokenFilterOptions,
  TokenIds,
  TokenMasks,
  TokenSet,
} from "../corpus.js";
import { CorpusError, ShapeError, invalidArgument, requireNonNegativeInt } from "../errors.js";
import { MaskedTokenDocument } from "./maskedTokenDocument.js";
import { PatternMatcher } from "./patternMatcher.js";
import { IndexWindowBuilder, indicesToMask } from "./indexWindowBuilder.js";
import { RunMatcher, exclusiveRuns } from "./runMatcher.js";
import { ShapeCompoundSplitter } from "./shapeCompoundSplitter.js";
import { JsonStopwordSource } from "./jsonStopwordSource.js";
import { isNumberLike, isPunctToken } from "./simplePipeline.js";
import { simplifiedPos } from "./pos.js";
import { contextRadii, kwicDocument, kwicFrame, kwicTable } from "./kwic.js";

type TokenInput =
  | readonly (readonly Token[])[]
  | Readonly<Record<DocLabel, readonly Token[]>>
  | readonly DocumentInput[];

const COMPARISONS: Record<DocFrequencyComparison, (a: number, b: number) => boolean> = {
  common: (a, b) => a >= b,
  ">": (a, b) => a > b,
  ">=": (a, b) => a >= b,
  uncommon: (a, b) => a <= b,
  "<": (a, b) => a < b,
  "<=": (a, b) => a <= b,
};

function defaultDeps(deps?: Partial<CorpusDeps>): CorpusDeps {
  const matcher = deps?.matcher ?? new PatternMatcher();
  return {
    matcher,
    windows: deps?.windows ?? new IndexWindowBuilder(),
    runs: deps?.runs ?? new RunMatcher(matcher),
    splitter: deps?.splitter ?? new ShapeCompoundSplitter(),
  };
}

function defaultContext(context?: Partial<CorpusContext>): CorpusContext {
  return {
    language: context?.language ?? "en",
    stopwords: context?.stopwords ?? new JsonStopwordSource(),
  };
}

function formatLabel(format: string, i: number): DocLabel {
  return format.replaceAll("{i0}", String(i)).replaceAll("{i1}", String(i + 1));
}

function arrayLabels(n: number, options?: LabelOptions): DocLabel[] {
  if (options?.labels) {
    if (options.labels.length !== n) {
      throw invalidArgument(`\`labels\` must have one entry per document (${n})`, { expected: n, actual: options.labels.length });
    }
    return Array.from(options.labels);
  }
  const format = options?.labelFormat ?? "doc-{i1}";
  return Array.from({ length: n }, (_, i) => formatLabel(format, i));
}

function isDocumentInputs(input: readonly unknown[]): input is readonly DocumentInput[] {
  return input.length > 0 && input.every((d) => typeof d === "object" && d !== null && !Array.isArray(d));
}

function isTokenLists(input: TokenInput): input is readonly (readonly Token[])[] | readonly DocumentInput[] {
  return Array.isArray(input);
}

function isTextList(texts: readonly string[] | Readonly<Record<DocLabel, string>>): texts is readonly string[] {
  return Array.isArray(texts);
}

function isMaskList(masks: TokenMasks): masks is readonly (readonly boolean[])[] {
  return Array.isArray(masks);
}

function attrString(v: TokenAttrValue | undefined): string {
  return v === null || v === undefined ? "" : String(v);
}

function toSet(tokens: TokenSet): Set<string> {
  return new Set(tokens);
}

/**
 * In-memory collection of masked token documents.
 *
 * Token filters narrow the documents' masks in place and return `this`;
 * document filters and rebuilding operations return a new corpus that shares
 * context and engine parts with this one.
 */
export class TokenCorpus implements Iterable<TokenDocument> {
  private readonly docs: TokenDocument[];
  private readonly byLabel = new Map<DocLabel, TokenDocument>();
  private readonly deps: CorpusDeps;
  readonly context: CorpusContext;

  constructor(docs: Iterable<TokenDocument>, options?: CorpusOptions) {
    this.docs = Array.from(docs);
    for (const doc of this.docs) {
      if (this.byLabel.has(doc.label)) {
        throw new CorpusError("DUPLICATE_LABEL", `duplicate document label "${doc.label}"`, { label: doc.label });
      }
      this.byLabel.set(doc.label, doc);
    }
    this.deps = defaultDeps(options?.deps);
    this.context = defaultContext(options?.context);
  }

  static fromTokens(input: TokenInput, options?: CorpusOptions & LabelOptions): TokenCorpus {
    let docs: TokenDocument[];
    if (isTokenLists(input)) {
      if (isDocumentInputs(input)) {
        docs = input.map((d) => new MaskedTokenDocument(d.label, d.tokens, { attrs: d.attrs }));
      } else {
        const labels = arrayLabels(input.length, options);
        docs = input.map((tokens, i) => new MaskedTokenDocument(labels[i]!, tokens));
      }
    } else {
      docs = Object.entries(input).map(([label, tokens]) => new MaskedTokenDocument(label, tokens));
    }
    return new TokenCorpus(docs, options);
  }

  static fromTexts(
    pipeline: NlpPipeline,
    texts: readonly string[] | Readonly<Record<DocLabel, string>>,
    options?: CorpusOptions & LabelOptions,
  ): TokenCorpus {
    let entries: Array<[DocLabel, string]>;
    if (isTextList(texts)) {
      const labels = arrayLabels(texts.length, options);
      entries = texts.map((t, i): [DocLabel, string] => [labels[i]!, t]);
    } else {
      entries = Object.entries(texts);
    }

    const docs = entries.map(([label, text]) => {
      const { tokens, attrs } = pipeline.tokenize(text);
      return new MaskedTokenDocument(label, tokens, { attrs });
    });

    return new TokenCorpus(docs, {
      ...options,
      context: { language: pipeline.language, ...options?.context },
    });
  }

  /** Inverse of `tokensToIds`. Every id must index into `vocab`. */
  static idsToTokens(vocab: readonly Token[], ids: readonly (readonly number[])[]): Token[][] {
    return ids.map((row) =>
      row.map((id) => {
        const t = Number.isInteger(id) ? vocab[id] : undefined;
        if (t === undefined) throw invalidArgument(`token id ${id} is out of range [0, ${vocab.length})`, { id });
        return t;
      }),
    );
  }

  [Symbol.iterator](): Iterator<TokenDocument> {
    return this.docs[Symbol.iterator]();
  }

  get size(): number {
    return this.docs.length;
  }

  get labels(): DocLabel[] {
    return this.docs.map((d) => d.label);
  }

  get documents(): readonly TokenDocument[] {
    return this.docs;
  }

  has(label: DocLabel): boolean {
    return this.byLabel.has(label);
  }

  get(label: DocLabel): TokenDocument {
    const doc = this.byLabel.get(label);
    if (!doc) throw new CorpusError("UNKNOWN_DOCUMENT", `no document labelled "${label}"`, { label });
    return doc;
  }

  /** Logical lengths in corpus order. */
  lengths(): number[] {
    return this.docs.map((d) => d.length);
  }

  // ---- vocabulary & counts ----

  vocabulary(): Set<Token> {
    const vocab = new Set<Token>();
    for (const doc of this.docs) for (const t of doc.logicalTokens()) vocab.add(t);
    return vocab;
  }

  sortedVocabulary(): Token[] {
    return Array.from(this.vocabulary()).sort(compareTokens);
  }

  vocabularyCounts(): Map<Token, number> {
    const counts = new Map<Token, number>();
    for (const doc of this.docs) {
      for (const t of doc.logicalTokens()) counts.set(t, (counts.get(t) ?? 0) + 1);
    }
    return counts;
  }

  /** Number (or share, with `proportions`) of documents each token occurs in. */
  documentFrequencies(options?: { proportions?: boolean }): Map<Token, number> {
    const df = new Map<Token, number>();
    for (const doc of this.docs) {
      for (const t of new Set(doc.logicalTokens())) df.set(t, (df.get(t) ?? 0) + 1);
    }
    if (options?.proportions) {
      for (const [t, n] of df) df.set(t, n / this.docs.length);
    }
    return df;
  }

  // ---- n-grams ----

  /**
   * Token n-grams per document. A document shorter than `n` yields one
   * n-gram holding all of its tokens; an empty document yields none.
   */
  ngramTokens(n: number): Token[][][] {
    if (!Number.isInteger(n) || n < 2) throw invalidArgument("`n` must be an integer >= 2", { n });

    return this.docs.map((doc) => {
      const tokens = doc.logicalTokens();
      if (tokens.length === 0) return [];
      if (tokens.length < n) return [tokens];
      const grams: Token[][] = [];
      for (let i = 0; i + n <= tokens.length; i++) grams.push(tokens.slice(i, i + n));
      return grams;
    });
  }

  ngrams(n: number, joinStr: string = " "): string[][] {
    return this.ngramTokens(n).map((grams) => grams.map((g) => g.join(joinStr)));
  }

  // ---- keywords in context ----

  kwic(patterns: Pattern | readonly Pattern[], options: KwicOptions = {}): KwicDocument[] {
    const results = this.docs.map((doc) => kwicDocument(doc, patterns, options, this.deps));
    return options.nonEmpty ? results.filter((r) => r.windows.length > 0) : results;
  }

  /** Window token lists per document. */
  kwicTokens(patterns: Pattern | readonly Pattern[], options: KwicOptions = {}): Token[][][] {
    return this.kwic(patterns, { ...options, withAttrs: false }).map((r) => r.windows.map((w) => w.tokens));
  }

  /** Windows joined with `glue` per document. */
  kwicGlued(patterns: Pattern | readonly Pattern[], options: KwicOptions & { glue?: string } = {}): string[][] {
    const glue = options.glue ?? " ";
    return this.kwicTokens(patterns, options).map((wins) => wins.map((w) => w.join(glue)));
  }

  kwicFrame(patterns: Pattern | readonly Pattern[], options: KwicOptions = {}): Table {
    return kwicFrame(this.kwic(patterns, options));
  }

  kwicTable(patterns: Pattern | readonly Pattern[], options: KwicOptions & { glue?: string } = {}): Table {
    const results = this.kwic(patterns, {
      ...options,
      highlightKeyword: options.highlightKeyword ?? "*",
      withAttrs: false,
      nonEmpty: true,
    });
    return kwicTable(results, options.glue ?? " ");
  }

  // ---- token filters (in place) ----

  filterTokensByMask(masks: TokenMasks, inverse: boolean = false): this {
    const plan: Array<[TokenDocument, readonly boolean[]]> = [];

    if (isMaskList(masks)) {
      if (masks.length !== this.docs.length) {
        throw new ShapeError(`\`masks\` must have one entry per document (${this.docs.length})`, {
          expected: this.docs.length,
          actual: masks.length,
        });
      }
      this.docs.forEach((doc, i) => plan.push([doc, masks[i]!]));
    } else {
      for (const [label, mask] of Object.entries(masks)) plan.push([this.get(label), mask]);
    }

    // all shapes are checked before the first document is touched
    for (const [doc, mask] of plan) {
      if (mask.length !== doc.length) {
        throw new ShapeError(`mask for document "${doc.label}" must have ${doc.length} entries`, {
          label: doc.label,
          expected: doc.length,
          actual: mask.length,
        });
      }
    }
    for (const [doc, mask] of plan) doc.applyMask(mask, inverse);
    return this;
  }

  removeTokensByMask(masks: TokenMasks): this {
    return this.filterTokensByMask(masks, true);
  }

  filterTokens(patterns: Pattern | readonly Pattern[], options: TokenFilterOptions = {}): this {
    const masks = this.docs.map((doc) => this.deps.matcher.matchAny(patterns, this.matchTargets(doc, options.byAttr), options));
    return this.filterTokensByMask(masks, options.inverse ?? false);
  }

  removeTokens(patterns: Pattern | readonly Pattern[], options: Omit<TokenFilterOptions, "inverse"> = {}): this {
    return this.filterTokens(patterns, { ...options, inverse: true });
  }

  /** Keeps only the tokens inside a window around a match (or removes them with `inverse`). */
  filterTokensWithKwic(patterns: Pattern | readonly Pattern[], options: KwicFilterOptions = {}): this {
    const [left, right] = contextRadii(options.contextSize);
    const masks = this.docs.map((doc) => {
      const matches = this.deps.matcher.matchAny(patterns, doc.logicalTokens(), options);
      return indicesToMask(this.deps.windows.flattened(matches, left, right), matches.length);
    });
    return this.filterTokensByMask(masks, options.inverse ?? false);
  }

  filterForPos(requiredPos: string | readonly string[], options: PosFilterOptions = {}): this {
    const required = new Set(typeof requiredPos === "string" ? [requiredPos] : requiredPos);
    const simplify = options.simplify ?? true;
    const tagset = options.tagset ?? "ud";

    const masks = this.docs.map((doc) => {
      if (doc.length === 0) return [];
      return doc.logicalAttr("pos").map((v) => {
        const tag = attrString(v);
        return required.has(simplify ? simplifiedPos(tag, tagset) : tag);
      });
    });
    return this.filterTokensByMask(masks, options.inverse ?? false);
  }

  /** Tokens whose document frequency satisfies `which` against `threshold`. */
  docFrequencyBlacklist(which: DocFrequencyComparison, threshold: number, options: DocFrequencyOptions = {}): Set<Token> {
    const cmp = COMPARISONS[which];
    if (!cmp) throw invalidArgument(`unknown comparison "${String(which)}"`, { which });

    const upper = options.absolute ? this.docs.length : 1;
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > upper) {
      throw invalidArgument(`\`threshold\` must lie in [0, ${upper}]`, { threshold });
    }

    const df = this.documentFrequencies({ proportions: !options.absolute });
    const out = new Set<Token>();
    for (const [t, f] of df) if (cmp(f, threshold)) out.add(t);
    return out;
  }

  removeTokensByDocFrequency(which: DocFrequencyComparison, threshold: number, options: DocFrequencyOptions = {}): this {
    const blacklist = this.docFrequencyBlacklist(which, threshold, options);
    return this.removeTokenSet(blacklist);
  }

  removeCommonTokens(threshold: number = 0.95, options: DocFrequencyOptions = {}): this {
    return this.removeTokensByDocFrequency("common", threshold, options);
  }

  removeUncommonTokens(threshold: number = 0.05, options: DocFrequencyOptions = {}): this {
    return this.removeTokensByDocFrequency("uncommon", threshold, options);
  }

  cleanTokens(options: CleanOptions = {}): this {
    const { removePunct = true, removeStopwords = true, removeEmpty = true, removeNumbers = false } = options;
    if (options.removeShorterThan !== undefined) requireNonNegativeInt(options.removeShorterThan, "removeShorterThan");
    if (options.removeLongerThan !== undefined) requireNonNegativeInt(options.removeLongerThan, "removeLongerThan");

    const drop = new Set<string>();
    if (removeEmpty) drop.add("");
    if (removePunct !== true && removePunct !== false) for (const t of toSet(removePunct)) drop.add(t);

    if (removeStopwords === true) {
      const words = this.context.stopwords.load(this.context.language);
      if (!words) {
        throw invalidArgument(`no stopword list for language "${this.context.language}"`, { language: this.context.language });
      }
      for (const w of words) drop.add(w);
    } else if (removeStopwords !== false) {
      for (const t of toSet(removeStopwords)) drop.add(t);
    }

    const masks = this.docs.map((doc) => {
      const tokens = doc.logicalTokens();
      const punct = removePunct === true ? this.flag(doc, "isPunct", tokens, isPunctToken) : undefined;
      const numbers = removeNumbers ? this.flag(doc, "likeNum", tokens, isNumberLike) : undefined;

      return tokens.map((t, i) => {
        if (drop.has(t)) return true;
        if (punct?.[i] || numbers?.[i]) return true;
        const len = Array.from(t).length;
        if (options.removeShorterThan !== undefined && len < options.removeShorterThan) return true;
        if (options.removeLongerThan !== undefined && len > options.removeLongerThan) return true;
        return false;
      });
    });

    return this.filterTokensByMask(masks, true);
  }

  // ---- document filters (new corpus) ----

  filterDocuments(patterns: Pattern | readonly Pattern[], options: DocumentFilterOptions = {}): TokenCorpus {
    const threshold = options.matchesThreshold ?? 1;
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw invalidArgument("`matchesThreshold` must be an integer >= 1", { matchesThreshold: threshold });
    }

    return this.withDocuments(
      this.docs.filter((doc) => {
        const matches = this.deps.matcher.matchAny(patterns, this.matchTargets(doc, options.byAttr), options);
        let hits = 0;
        for (const m of matches) if (options.inverseMatches ? !m : m) hits++;
        return (hits >= threshold) !== (options.inverseResult ?? false);
      }),
    );
  }

  removeDocuments(patterns: Pattern | readonly Pattern[], options: Omit<DocumentFilterOptions, "inverseResult"> = {}): TokenCorpus {
    return this.filterDocuments(patterns, { ...options, inverseResult: true });
  }

  filterDocumentsByName(patterns: Pattern | readonly Pattern[], options: NameFilterOptions = {}): TokenCorpus {
    const hits = this.deps.matcher.matchAny(patterns, this.labels, options);
    return this.withDocuments(this.docs.filter((_, i) => hits[i] !== (options.inverse ?? false)));
  }

  removeDocumentsByName(patterns: Pattern | readonly Pattern[], options: Omit<NameFilterOptions, "inverse"> = {}): TokenCorpus {
    return this.filterDocumentsByName(patterns, { ...options, inverse: true });
  }

  // ---- rebuilding operations (new corpus) ----

  compact(): TokenCorpus {
    return this.withDocuments(this.docs.map((d) => d.compact()));
  }

  /**
   * Merges every run of consecutive tokens matching `patterns` into one token
   * joined by `glue`. Overlapping runs are resolved left to right.
   */
  glueTokens(patterns: readonly Pattern[], options: GlueOptions = {}): { corpus: TokenCorpus; glued: Set<Token> } {
    if (patterns.length < 2) {
      throw invalidArgument("`patterns` must contain at least two patterns", { count: patterns.length });
    }

    const glued = new Set<Token>();
    const docs = this.docs.map((d) => {
      const doc = d.compact();
      const runs = exclusiveRuns(this.deps.runs.matchSubsequent(patterns, doc.tokens, options));
      const res = this.deps.runs.glueSubsequent(doc, runs, options.glue ?? "_");
      for (const g of res.glued) glued.add(g);
      return res.document;
    });

    return { corpus: this.withDocuments(docs), glued };
  }

  /** Replaces every live token by its compound parts; the result is compact. */
  expandCompounds(options?: SplitOptions): TokenCorpus {
    return this.withDocuments(
      this.docs.map((doc) => {
        const names = doc.attrNames();
        const values = new Map(names.map((n) => [n, doc.logicalAttr(n)] as const));
        const tokens: Token[] = [];
        const attrs: Record<string, TokenAttrValue[]> = Object.fromEntries(names.map((n) => [n, []]));

        doc.logicalTokens().forEach((t, i) => {
          const parts = this.deps.splitter.split(t, options);
          if (parts.length <= 1) {
            tokens.push(t);
            for (const [n, vals] of values) attrs[n]!.push(vals[i] ?? null);
            return;
          }
          parts.forEach((part, k) => {
            const last = k === parts.length - 1;
            tokens.push(part);
            for (const [n, vals] of values) {
              let v: TokenAttrValue = null;
              if (n === "lemma") v = part;
              else if (n === "whitespace") v = last ? (vals[i] ?? null) : false;
              attrs[n]!.push(v);
            }
          });
        });

        return new MaskedTokenDocument(doc.label, tokens, { attrs });
      }),
    );
  }

  /** New corpus with `fn` applied to every live token; masks are kept. */
  transform(fn: (token: Token) => Token): TokenCorpus {
    return this.withDocuments(this.docs.map((d) => d.mapTokens(fn)));
  }

  toLowercase(): TokenCorpus {
    return this.transform((t) => t.toLowerCase());
  }

  /** Deletes every character of `chars` from all live tokens. */
  removeChars(chars: Iterable<string>): TokenCorpus {
    const del = new Set(Array.from(chars).flatMap((c) => Array.from(c)));
    if (del.size === 0) throw invalidArgument("`chars` must contain at least one character");
    return this.transform((t) => Array.from(t).filter((c) => !del.has(c)).join(""));
  }

  // ---- matrix inputs ----

  termDocumentInput(vocab?: readonly Token[]): TermDocumentInput {
    return {
      vocab: vocab ? Array.from(vocab) : this.sortedVocabulary(),
      docs: this.docs.map((d) => d.logicalTokens()),
    };
  }

  tokensToIds(): TokenIds {
    const vocab = this.sortedVocabulary();
    const index = new Map(vocab.map((t, i) => [t, i] as const));
    const counts = new Array<number>(vocab.length).fill(0);

    const ids = this.docs.map((d) =>
      d.logicalTokens().map((t) => {
        const id = index.get(t)!;
        counts[id] = counts[id]! + 1;
        return id;
      }),
    );

    return { vocab, ids, counts };
  }

  // ---- internals ----

  private withDocuments(docs: TokenDocument[]): TokenCorpus {
    return new TokenCorpus(docs, { context: this.context, deps: this.deps });
  }

  private matchTargets(doc: TokenDocument, byAttr?: string): string[] {
    return byAttr === undefined ? doc.logicalTokens() : doc.logicalAttr(byAttr).map(attrString);
  }

  private flag(doc: TokenDocument, attr: string, tokens: readonly Token[], fallback: (t: Token) => boolean): boolean[] {
    return doc.hasAttr(attr) ? doc.logicalAttr(attr).map((v) => v === true) : tokens.map(fallback);
  }

  private removeTokenSet(tokens: ReadonlySet<Token>): this {
    if (tokens.size === 0) return this;
    return this.filterTokensByMask(
      this.docs.map((d) => d.logicalTokens().map((t) => tokens.has(t))),
      true,
    );
  }
}

/** Orders by Unicode code point, not UTF-16 code unit. */
function compareTokens(a: Token, b: Token): number {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const ca = a.codePointAt(i)!;
    const cb = b.codePointAt(j)!;
    if (ca !== cb) return ca - cb;
    i += ca > 0xffff ? 2 : 1;
    j += cb > 0xffff ? 2 : 1;
  }
  return a.length - i - (b.length - j);
}
