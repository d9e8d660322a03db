import { describe, expect, it } from "vitest";
import {
  MaskedTokenDocument,
  ShapeError,
  SimplePipeline,
  TokenCorpus,
  type StopwordSource,
} from "../../index.js";
import { errorCode } from "./helpers.js";

const stopwords: StopwordSource = { load: (language) => (language === "en" ? ["the", "in"] : undefined) };

function mini(): TokenCorpus {
  return TokenCorpus.fromTokens(
    {
      ny: ["I", "live", "in", "New", "York", "."],
      bln: ["I", "am", "in", "Berlin", ",", "but", "my", "flat", "is", "in", "Munich", "."],
      empty: [],
    },
    { context: { stopwords } },
  );
}

function abcd(): TokenCorpus {
  return TokenCorpus.fromTokens([
    ["a", "b", "a"],
    ["a", "c"],
    ["a", "b", "c", "d"],
  ]);
}

function live(corpus: TokenCorpus): string[][] {
  return corpus.documents.map((d) => d.logicalTokens());
}

describe("TokenCorpus construction", () => {
  it("labels array input", () => {
    expect(abcd().labels).toEqual(["doc-1", "doc-2", "doc-3"]);
    expect(TokenCorpus.fromTokens([["x"], ["y"]], { labelFormat: "d{i0}" }).labels).toEqual(["d0", "d1"]);
    expect(TokenCorpus.fromTokens([["x"]], { labels: ["only"] }).labels).toEqual(["only"]);
    expect(errorCode(() => TokenCorpus.fromTokens([["x"]], { labels: ["a", "b"] }))).toBe("INVALID_ARGUMENT");
  });

  it("accepts documents with attributes", () => {
    const c = TokenCorpus.fromTokens([{ label: "a", tokens: ["x", "y"], attrs: { pos: ["NOUN", "VERB"] } }]);
    expect(c.get("a").logicalAttr("pos")).toEqual(["NOUN", "VERB"]);
  });

  it("tokenizes texts through a pipeline", () => {
    const c = TokenCorpus.fromTexts(new SimplePipeline("de"), { a: "New York!" });
    const doc = c.get("a");
    expect(doc.tokens).toEqual(["New", "York", "!"]);
    expect(doc.attr("whitespace")).toEqual([true, false, false]);
    expect(doc.attr("isPunct")).toEqual([false, false, true]);
    expect(c.context.language).toBe("de");
  });

  it("rejects duplicate labels and reports unknown ones", () => {
    const docs = [new MaskedTokenDocument("a", ["x"]), new MaskedTokenDocument("a", ["y"])];
    expect(errorCode(() => new TokenCorpus(docs))).toBe("DUPLICATE_LABEL");
    expect(errorCode(() => mini().get("nope"))).toBe("UNKNOWN_DOCUMENT");
    expect(mini().has("ny")).toBe(true);
  });

  it("reports sizes and lengths", () => {
    const c = mini();
    expect(c.size).toBe(3);
    expect(c.lengths()).toEqual([6, 12, 0]);
    expect(Array.from(c, (d) => d.label)).toEqual(["ny", "bln", "empty"]);
  });
});

describe("vocabulary and frequencies", () => {
  it("collects the sorted vocabulary", () => {
    expect(mini().sortedVocabulary()).toEqual([
      ",", ".", "Berlin", "I", "Munich", "New", "York", "am", "but", "flat", "in", "is", "live", "my",
    ]);
    expect(mini().vocabularyCounts().get("in")).toBe(3);
  });

  it("orders the vocabulary by code point", () => {
    const c = TokenCorpus.fromTokens([["\u{1F600}", "\uFF5E", "a"]]);
    expect(c.sortedVocabulary()).toEqual(["a", "\uFF5E", "\u{1F600}"]);
  });

  it("counts documents per token", () => {
    expect(Object.fromEntries(abcd().documentFrequencies())).toEqual({ a: 3, b: 2, c: 2, d: 1 });
    const props = abcd().documentFrequencies({ proportions: true });
    expect(props.get("a")).toBe(1);
    expect(props.get("d")).toBeCloseTo(1 / 3);
  });

  it("ignores masked tokens", () => {
    const c = abcd().removeTokens("a");
    expect(c.documentFrequencies().has("a")).toBe(false);
  });
});

describe("ngrams", () => {
  const c = TokenCorpus.fromTokens([["a", "b", "c"], ["x"], []]);

  it("builds joined n-grams", () => {
    expect(c.ngrams(2)).toEqual([["a b", "b c"], ["x"], []]);
    expect(c.ngrams(3, "_")).toEqual([["a_b_c"], ["x"], []]);
  });

  it("builds token n-grams", () => {
    expect(c.ngramTokens(2)[0]).toEqual([
      ["a", "b"],
      ["b", "c"],
    ]);
  });

  it("requires n >= 2", () => {
    expect(errorCode(() => c.ngrams(1))).toBe("INVALID_ARGUMENT");
  });

  it("overlaps so the grams rebuild the tokens", () => {
    const tokens = ["a", "b", "c", "d", "e", "f", "g"];
    for (let len = 2; len <= tokens.length; len++) {
      const docTokens = tokens.slice(0, len);
      const corpus = TokenCorpus.fromTokens([docTokens]);
      for (let n = 2; n <= len; n++) {
        const grams = corpus.ngramTokens(n)[0] ?? [];
        expect(grams).toHaveLength(len - n + 1);
        const rebuilt = [...grams.map((g) => g[0]), ...(grams[grams.length - 1] ?? []).slice(1)];
        expect(rebuilt).toEqual(docTokens);
      }
    }
  });
});

describe("kwic", () => {
  it("collects windows per document", () => {
    expect(mini().kwicTokens("in", { contextSize: 1 })).toEqual([
      [["live", "in", "New"]],
      [
        ["am", "in", "Berlin"],
        ["is", "in", "Munich"],
      ],
      [],
    ]);
  });

  it("glues and highlights windows", () => {
    expect(mini().kwicGlued("in", { contextSize: 1 })).toEqual([["live in New"], ["am in Berlin", "is in Munich"], []]);
    expect(mini().kwicGlued("in", { contextSize: 1, highlightKeyword: "*" })[0]).toEqual(["live *in* New"]);
  });

  it("takes asymmetric context sizes", () => {
    const [ny] = mini().kwic("in", { contextSize: [0, 2] });
    expect(ny?.windows).toEqual([{ context: 0, positions: [2, 3, 4], tokens: ["in", "New", "York"] }]);
  });

  it("drops empty documents on request", () => {
    expect(mini().kwic("in", { nonEmpty: true }).map((r) => r.doc)).toEqual(["ny", "bln"]);
  });

  it("builds a table of glued windows", () => {
    expect(mini().kwicTable("in", { contextSize: 1 })).toEqual({
      columns: ["doc", "context", "kwic"],
      rows: [
        ["bln", 0, "am *in* Berlin"],
        ["bln", 1, "is *in* Munich"],
        ["ny", 0, "live *in* New"],
      ],
    });
  });

  it("builds a token frame with attribute columns", () => {
    const c = TokenCorpus.fromTokens([
      {
        label: "a",
        tokens: ["x", "New", "y"],
        attrs: { zeta: [1, 2, 3], whitespace: [true, true, false], pos: ["X", "PROPN", "X"] },
      },
    ]);

    expect(c.kwicFrame("New", { contextSize: 1, withAttrs: true })).toEqual({
      columns: ["doc", "context", "position", "token", "pos", "whitespace", "zeta"],
      rows: [
        ["a", 0, 0, "x", "X", true, 1],
        ["a", 0, 1, "New", "PROPN", true, 2],
        ["a", 0, 2, "y", "X", false, 3],
      ],
    });
  });

  it("uses live positions after filtering", () => {
    const c = mini().removeTokens("live");
    expect(c.kwicTokens("in", { contextSize: 1 })[0]).toEqual([["I", "in", "New"]]);
  });
});

describe("token filters", () => {
  it("keeps or removes matching tokens", () => {
    expect(live(abcd().filterTokens("a"))).toEqual([["a", "a"], ["a"], ["a"]]);
    expect(live(abcd().removeTokens(["a", "b"]))).toEqual([[], ["c"], ["c", "d"]]);
  });

  it("matches on attributes", () => {
    const c = TokenCorpus.fromTokens([{ label: "a", tokens: ["Ann", "runs"], attrs: { pos: ["PROPN", "VERB"] } }]);
    expect(live(c.filterTokens("VERB", { byAttr: "pos" }))).toEqual([["runs"]]);
  });

  it("keeps the tokens around a keyword", () => {
    expect(mini().filterTokensWithKwic("New", { contextSize: 1 }).lengths()).toEqual([3, 0, 0]);
    expect(live(mini().filterTokensWithKwic("New", { contextSize: 1, inverse: true }))[0]).toEqual(["I", "live", "."]);
  });

  it("applies masks keyed by label", () => {
    const c = mini().filterTokensByMask({ ny: [true, false, true, false, true, false] });
    expect(live(c)[0]).toEqual(["I", "in", "York"]);
    expect(c.lengths()).toEqual([3, 12, 0]);
    expect(errorCode(() => c.filterTokensByMask({ nope: [] }))).toBe("UNKNOWN_DOCUMENT");
  });

  it("checks every mask before applying any", () => {
    const c = mini();
    expect(() => c.filterTokensByMask([new Array<boolean>(6).fill(false), [true], []])).toThrow(ShapeError);
    expect(c.lengths()).toEqual([6, 12, 0]);
    expect(() => c.filterTokensByMask([[]])).toThrow(ShapeError);
  });

  it("filters by coarse part of speech", () => {
    const make = (pos: string[]) =>
      TokenCorpus.fromTokens([{ label: "a", tokens: ["Ann", "runs", "to", "school"], attrs: { pos } }]);

    expect(live(make(["PROPN", "VERB", "ADP", "NOUN"]).filterForPos("N"))).toEqual([["Ann", "school"]]);
    expect(live(make(["NNP", "VBZ", "TO", "NN"]).filterForPos("N", { tagset: "penn" }))).toEqual([["Ann", "school"]]);
    expect(live(make(["PROPN", "VERB", "ADP", "NOUN"]).filterForPos("VERB", { simplify: false }))).toEqual([["runs"]]);
    expect(live(make(["PROPN", "VERB", "ADP", "NOUN"]).filterForPos(["N", "V"], { inverse: true }))).toEqual([["to"]]);
  });

  it("removes tokens by document frequency", () => {
    expect(live(abcd().removeCommonTokens(0.9))).toEqual([["b"], ["c"], ["b", "c", "d"]]);
    expect(live(abcd().removeUncommonTokens(1, { absolute: true }))).toEqual([["a", "b", "a"], ["a", "c"], ["a", "b", "c"]]);
    expect(Array.from(abcd().docFrequencyBlacklist(">", 1, { absolute: true })).sort()).toEqual(["a", "b", "c"]);
  });

  it("validates frequency thresholds", () => {
    expect(errorCode(() => abcd().removeCommonTokens(2))).toBe("INVALID_ARGUMENT");
    expect(errorCode(() => abcd().removeCommonTokens(4, { absolute: true }))).toBe("INVALID_ARGUMENT");
  });
});

describe("cleanTokens", () => {
  const raw = ["The", "the", "cat", ",", "", "42", "a", "sat", "."];

  it("removes stopwords, punctuation and empty tokens", () => {
    const c = TokenCorpus.fromTokens([raw], { context: { stopwords } });
    expect(live(c.cleanTokens())).toEqual([["The", "cat", "42", "a", "sat"]]);
  });

  it("removes numbers and short tokens on request", () => {
    const c = TokenCorpus.fromTokens([raw], { context: { stopwords } });
    expect(live(c.cleanTokens({ removeNumbers: true, removeShorterThan: 2 }))).toEqual([["The", "cat", "sat"]]);
  });

  it("takes explicit token lists", () => {
    const c = TokenCorpus.fromTokens([raw], { context: { stopwords } });
    expect(live(c.cleanTokens({ removeStopwords: false, removePunct: [","] }))).toEqual([
      ["The", "the", "cat", "42", "a", "sat", "."],
    ]);
  });

  it("prefers pipeline flags over character classes", () => {
    const c = TokenCorpus.fromTokens([{ label: "a", tokens: ["x", "-"], attrs: { isPunct: [true, false] } }], {
      context: { stopwords },
    });
    expect(live(c.cleanTokens())).toEqual([["-"]]);
  });

  it("needs a stopword list for the corpus language", () => {
    const c = TokenCorpus.fromTokens([raw], { context: { stopwords, language: "fr" } });
    expect(errorCode(() => c.cleanTokens())).toBe("INVALID_ARGUMENT");
  });
});

describe("document filters", () => {
  it("selects documents by matches", () => {
    const c = mini();
    const sub = c.filterDocuments("Berlin");
    expect(sub.labels).toEqual(["bln"]);
    expect(sub.get("bln")).toBe(c.get("bln"));
    expect(c.filterDocuments("Berlin", { inverseResult: true }).labels).toEqual(["ny", "empty"]);
    expect(c.filterDocuments("in", { matchesThreshold: 2 }).labels).toEqual(["bln"]);
    expect(c.removeDocuments("in").labels).toEqual(["empty"]);
  });

  it("counts non-matching tokens with inverseMatches", () => {
    expect(abcd().filterDocuments("a", { inverseMatches: true, matchesThreshold: 2 }).labels).toEqual(["doc-3"]);
  });

  it("selects documents by label", () => {
    const c = mini();
    expect(c.filterDocumentsByName("n*", { matchType: "glob" }).labels).toEqual(["ny"]);
    expect(c.removeDocumentsByName(["ny", "bln"]).labels).toEqual(["empty"]);
  });
});

describe("rebuilding operations", () => {
  it("compacts every document", () => {
    const c = mini().removeTokens(["I", "."]).compact();
    expect(c.documents.every((d) => d.isCompact())).toBe(true);
    expect(c.get("ny").tokens).toEqual(["live", "in", "New", "York"]);
  });

  it("glues subsequent matches without touching the source corpus", () => {
    const c = mini();
    const { corpus, glued } = c.glueTokens(["New", "York"]);

    expect(corpus.get("ny").tokens).toEqual(["I", "live", "in", "New_York", "."]);
    expect(Array.from(glued)).toEqual(["New_York"]);
    expect(c.get("ny").tokens).toEqual(["I", "live", "in", "New", "York", "."]);

    const second = corpus.glueTokens(["in", "*"], { matchType: "glob", glue: "/" });
    expect(Array.from(second.glued).sort()).toEqual(["in/Berlin", "in/Munich", "in/New_York"]);
  });

  it("glues overlapping matches left to right", () => {
    const c = TokenCorpus.fromTokens([["a", "a", "a"]]);
    expect(c.glueTokens(["a", "a"]).corpus.documents[0]?.tokens).toEqual(["a_a", "a"]);
    expect(errorCode(() => c.glueTokens(["a"]))).toBe("INVALID_ARGUMENT");
  });

  it("expands compounds and fills attributes of the parts", () => {
    const c = TokenCorpus.fromTokens([
      {
        label: "a",
        tokens: ["US-Student", "runs"],
        attrs: { lemma: ["US-Student", "run"], whitespace: [true, false], pos: ["PROPN", "VERB"] },
      },
    ]);
    const doc = c.expandCompounds().get("a");

    expect(doc.tokens).toEqual(["US", "Student", "runs"]);
    expect(doc.attr("lemma")).toEqual(["US", "Student", "run"]);
    expect(doc.attr("whitespace")).toEqual([false, true, false]);
    expect(doc.attr("pos")).toEqual([null, null, "VERB"]);
  });

  it("transforms live tokens and keeps masks", () => {
    const c = mini().removeTokens("I");
    const lower = c.toLowercase();
    expect(lower.get("ny").logicalTokens()).toEqual(["live", "in", "new", "york", "."]);
    expect(lower.get("ny").tokens[0]).toBe("I");
    expect(c.get("ny").logicalTokens()).toEqual(["live", "in", "New", "York", "."]);
  });

  it("removes characters", () => {
    const c = TokenCorpus.fromTokens([["a.b", ".", "c,"]]);
    expect(live(c.removeChars([".,"]))).toEqual([["ab", "", "c"]]);
    expect(errorCode(() => c.removeChars([]))).toBe("INVALID_ARGUMENT");
  });
});

describe("matrix inputs", () => {
  const c = TokenCorpus.fromTokens([
    ["A", "B", "C"],
    ["A", "C", "A", "B"],
    ["D", "E", "A"],
  ]);

  it("maps tokens to vocabulary ids", () => {
    const { vocab, ids, counts } = c.tokensToIds();
    expect(vocab).toEqual(["A", "B", "C", "D", "E"]);
    expect(ids).toEqual([
      [0, 1, 2],
      [0, 2, 0, 1],
      [3, 4, 0],
    ]);
    expect(counts).toEqual([4, 2, 2, 1, 1]);
    expect(TokenCorpus.idsToTokens(vocab, ids)).toEqual(live(c));
  });

  it("rejects unknown ids", () => {
    expect(errorCode(() => TokenCorpus.idsToTokens(["A"], [[1]]))).toBe("INVALID_ARGUMENT");
  });

  it("hands out term-document input", () => {
    expect(c.termDocumentInput()).toEqual({ vocab: ["A", "B", "C", "D", "E"], docs: live(c) });
    expect(c.termDocumentInput(["A"]).vocab).toEqual(["A"]);
  });
});
