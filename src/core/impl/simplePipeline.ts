import type { Token } from "../types.js";
import type { NlpPipeline, TokenizedText } from "../pipeline.js";

const PUNCT = /^[\p{P}\p{S}]$/u;
const PUNCT_ONLY = /^[\p{P}\p{S}]+$/u;
const NUMBER_LIKE = /^[+-]?(?:\d+(?:[.,]\d+)*|\d*[.,]\d+)%?$/u;
const WHITESPACE = /\s/u;

function isPunctChar(c: string): boolean {
  return PUNCT.test(c);
}

export function isPunctToken(token: string): boolean {
  return PUNCT_ONLY.test(token);
}

export function isNumberLike(token: string): boolean {
  return NUMBER_LIKE.test(token);
}

/**
 * Minimal white-space tokenizer:
 * - splits on white space
 * - peels leading / trailing punctuation off into single-character tokens
 * - keeps inner punctuation, so "US-Student" and "don't" stay whole
 * - `lemma` is the token itself; no POS tags
 */
export class SimplePipeline implements NlpPipeline {
  constructor(readonly language: string = "en") {}

  tokenize(text: string): TokenizedText {
    const tokens: Token[] = [];
    const whitespace: boolean[] = [];

    const n = text.length;
    let i = 0;

    while (i < n) {
      // skip separators
      while (i < n && WHITESPACE.test(text[i]!)) i++;
      if (i >= n) break;

      const start = i;
      while (i < n && !WHITESPACE.test(text[i]!)) i++;
      const chunk = Array.from(text.slice(start, i));

      let lead = 0;
      while (lead < chunk.length && isPunctChar(chunk[lead]!)) lead++;
      let trail = chunk.length;
      while (trail > lead && isPunctChar(chunk[trail - 1]!)) trail--;

      const pieces: Token[] = [...chunk.slice(0, lead)];
      if (trail > lead) pieces.push(chunk.slice(lead, trail).join(""));
      pieces.push(...chunk.slice(trail));

      for (const p of pieces) {
        tokens.push(p);
        whitespace.push(false);
      }
      // only the last piece of a chunk can be followed by white space
      if (i < n) whitespace[whitespace.length - 1] = true;
    }

    return {
      tokens,
      attrs: {
        whitespace,
        isPunct: tokens.map(isPunctToken),
        likeNum: tokens.map(isNumberLike),
        lemma: tokens.slice(),
      },
    };
  }
}
