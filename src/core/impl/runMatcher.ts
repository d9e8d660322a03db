import type { MatchOptions, Pattern, Token, TokenAttrValue } from "../types.js";
import type { TokenDocument } from "../document.js";
import type { TokenMatcher } from "../matcher.js";
import type { GlueResult, SubsequentMatcher } from "../subsequent.js";
import { CorpusError, invalidArgument } from "../errors.js";
import { MaskedTokenDocument } from "./maskedTokenDocument.js";
import { PatternMatcher } from "./patternMatcher.js";

/**
 * Subsequent-pattern matching in one pass per pattern:
 * - candidates start as every token index
 * - pattern k is only tried on tokens right after a match of pattern k-1
 * - surviving indices are run ends; runs are rebuilt backwards from them
 */
export class RunMatcher implements SubsequentMatcher {
  constructor(private readonly matcher: TokenMatcher = new PatternMatcher()) {}

  matchSubsequent(patterns: readonly Pattern[], tokens: readonly Token[], options?: MatchOptions): number[][] {
    const nPat = patterns.length;
    if (nPat < 2) {
      throw invalidArgument("`patterns` must contain at least two patterns", { count: nPat });
    }

    const nTok = tokens.length;
    if (nTok === 0) return [];

    let matched: number[] = [];
    for (let k = 0; k < nPat; k++) {
      const candidates = k === 0 ? Array.from({ length: nTok }, (_, i) => i) : matched.map((i) => i + 1).filter((i) => i < nTok);

      const hits = this.matcher.match(patterns[k]!, candidates.map((i) => tokens[i]!), options);
      matched = candidates.filter((_, j) => hits[j]);

      // every pattern has to hit, so one empty step ends the search
      if (matched.length === 0) return [];
    }

    return matched.map((end) => {
      const run: number[] = [];
      for (let i = end - nPat + 1; i <= end; i++) run.push(i);
      return run;
    });
  }

  glueSubsequent(doc: TokenDocument, runs: readonly (readonly number[])[], glue: string | null = "_"): GlueResult {
    if (!doc.isCompact()) {
      throw new CorpusError("NOT_COMPACT", `document "${doc.label}" must be compact (no pending filter mask) before gluing`, {
        label: doc.label,
      });
    }

    const n = doc.bufferLength;
    const ends = validateRuns(runs, n);
    if (ends.size === 0 || n === 0) return { document: doc, glued: [] };

    const names = doc.attrNames();
    const tokens: Token[] = [];
    const attrs: Record<string, TokenAttrValue[]> = {};
    for (const name of names) attrs[name] = [];
    const glued: Token[] = [];

    let i = 0;
    while (i < n) {
      const end = ends.get(i);
      if (end === undefined) {
        tokens.push(doc.tokens[i]!);
        for (const name of names) attrs[name]!.push(attrAt(doc, name, i));
        i++;
        continue;
      }

      const merged = glue === null ? "" : doc.tokens.slice(i, end + 1).join(glue);
      tokens.push(merged);
      for (const name of names) {
        let v: TokenAttrValue = null;
        if (name === "lemma") v = merged;
        else if (name === "whitespace") v = attrAt(doc, name, end);
        attrs[name]!.push(v);
      }
      if (glue !== null) glued.push(merged);
      i = end + 1;
    }

    return { document: new MaskedTokenDocument(doc.label, tokens, { attrs }), glued };
  }
}

/**
 * Keeps runs in order, dropping every run that shares an index with an
 * earlier kept one. Subsequent matches of repeating patterns overlap
 * ("a a a" against ["a", "a"]); gluing needs them mutually exclusive.
 */
export function exclusiveRuns(runs: readonly (readonly number[])[]): number[][] {
  const used = new Set<number>();
  const out: number[][] = [];
  for (const run of runs) {
    if (run.some((i) => used.has(i))) continue;
    for (const i of run) used.add(i);
    out.push(Array.from(run));
  }
  return out;
}

// run start -> run end; throws on malformed or overlapping runs
function validateRuns(runs: readonly (readonly number[])[], n: number): Map<number, number> {
  const ends = new Map<number, number>();
  const spans: Array<[number, number]> = [];

  for (const run of runs) {
    if (run.length < 2) {
      throw invalidArgument("each run must contain at least two token indices", { run: Array.from(run) });
    }
    for (let k = 0; k < run.length; k++) {
      const idx = run[k]!;
      if (!Number.isInteger(idx) || idx < 0 || idx >= n) {
        throw invalidArgument(`run index ${idx} is out of range [0, ${n})`, { run: Array.from(run) });
      }
      if (k > 0 && idx !== run[k - 1]! + 1) {
        throw invalidArgument("runs must contain consecutive ascending indices", { run: Array.from(run) });
      }
    }
    spans.push([run[0]!, run[run.length - 1]!]);
  }

  spans.sort((a, b) => a[0] - b[0]);
  let prevEnd = -1;
  for (const [start, end] of spans) {
    if (start <= prevEnd) {
      throw invalidArgument("runs must not overlap", { start, previousEnd: prevEnd });
    }
    ends.set(start, end);
    prevEnd = end;
  }

  return ends;
}

function attrAt(doc: TokenDocument, name: string, i: number): TokenAttrValue {
  return doc.attr(name)?.[i] ?? null;
}
