import {
  MaskedTokenDocument,
  SimplePipeline,
  TokenCorpus,
  type CleanOptions,
  type CorpusContext,
  type KwicOptions,
  type NlpPipeline,
  type Pattern,
  type SplitOptions,
  type Table,
  type TokenDocument,
  type TokenFilterOptions,
  type GlueOptions,
} from "../core/index.js";

export type ServiceDocumentInput = { label: string; text: string } | { label: string; tokens: string[] };

export interface DocumentSummary {
  label: string;
  length: number;
}

export interface CorpusService {
  has(label: string): boolean;
  /** Adds the document, or replaces the one with the same label in place. */
  upsert(doc: ServiceDocumentInput): void;
  list(): DocumentSummary[];
  vocabulary(): string[];
  docFrequencies(proportions: boolean): Record<string, number>;
  ngrams(n: number, joinStr: string): Record<string, string[]>;
  kwic(patterns: Pattern[], options: KwicOptions & { glue?: string }): Table;
  filter(patterns: Pattern[], options: TokenFilterOptions): DocumentSummary[];
  clean(options: CleanOptions): DocumentSummary[];
  compact(): DocumentSummary[];
  glue(patterns: Pattern[], options: GlueOptions): string[];
  expandCompounds(options: SplitOptions): DocumentSummary[];
}

export interface CorpusServiceOptions {
  pipeline?: NlpPipeline;
  context?: Partial<CorpusContext>;
}

/**
 * Holds one corpus for the HTTP layer. Operations that rebuild documents swap
 * the held corpus for the new one.
 */
export function createCorpusService(opts: CorpusServiceOptions = {}): CorpusService {
  const pipeline = opts.pipeline ?? new SimplePipeline(opts.context?.language);
  let corpus = new TokenCorpus([], { context: { language: pipeline.language, ...opts.context } });

  const summary = (): DocumentSummary[] => corpus.documents.map((d) => ({ label: d.label, length: d.length }));

  function toDocument(doc: ServiceDocumentInput): TokenDocument {
    if ("tokens" in doc) return new MaskedTokenDocument(doc.label, doc.tokens);
    const { tokens, attrs } = pipeline.tokenize(doc.text);
    return new MaskedTokenDocument(doc.label, tokens, { attrs });
  }

  function replaceCorpus(next: TokenCorpus): DocumentSummary[] {
    corpus = next;
    return summary();
  }

  return {
    has(label) {
      return corpus.has(label);
    },
    upsert(input) {
      const doc = toDocument(input);
      const docs = corpus.has(doc.label)
        ? corpus.documents.map((d) => (d.label === doc.label ? doc : d))
        : [...corpus.documents, doc];
      corpus = new TokenCorpus(docs, { context: corpus.context });
    },
    list: summary,
    vocabulary() {
      return corpus.sortedVocabulary();
    },
    docFrequencies(proportions) {
      return Object.fromEntries(corpus.documentFrequencies({ proportions }));
    },
    ngrams(n, joinStr) {
      const grams = corpus.ngrams(n, joinStr);
      return Object.fromEntries(corpus.labels.map((label, i) => [label, grams[i] ?? []]));
    },
    kwic(patterns, options) {
      return corpus.kwicTable(patterns, options);
    },
    filter(patterns, options) {
      corpus.filterTokens(patterns, options);
      return summary();
    },
    clean(options) {
      corpus.cleanTokens(options);
      return summary();
    },
    compact() {
      return replaceCorpus(corpus.compact());
    },
    glue(patterns, options) {
      const { corpus: next, glued } = corpus.glueTokens(patterns, options);
      corpus = next;
      return Array.from(glued).sort();
    },
    expandCompounds(options) {
      return replaceCorpus(corpus.expandCompounds(options));
    },
  };
}
