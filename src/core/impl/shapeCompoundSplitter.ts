import type { CompoundSplitter, SplitOptions } from "../compound.js";
import { ShapeError, invalidArgument } from "../errors.js";

const DEFAULT_MIN_PART_LENGTH = 2;

const LOWERCASE = /\p{Lowercase}/u;
const UPPERCASE = /\p{Uppercase}/u;
const TITLECASE = /\p{Lt}/u;

function isLowerChar(c: string): boolean {
  return LOWERCASE.test(c);
}

/** True if `s` has at least one cased character and all of them are upper case. */
export function isUpperString(s: string): boolean {
  let cased = false;
  for (const c of s) {
    if (LOWERCASE.test(c) || TITLECASE.test(c)) return false;
    if (UPPERCASE.test(c)) cased = true;
  }
  return cased;
}

function codePointLength(s: string): number {
  let n = 0;
  for (const _ of s) n++;
  return n;
}

/** Case shape of `s`, one entry per code point: `lower` for lower case letters, `upper` for anything else. */
export function strShape(s: string, lower: number = 0, upper: number = 1): number[] {
  return Array.from(s, (c) => (isLowerChar(c) ? lower : upper));
}

/** Splits `s` at every occurrence of every separator; empty parts are kept. */
export function multiSplit(s: string, splitChars: Iterable<string>): string[] {
  let parts = [s];
  for (const c of splitChars) {
    if (c.length === 0) throw invalidArgument("split characters must be non-empty strings");
    parts = parts.flatMap((p) => p.split(c));
  }
  return parts;
}

export interface ShapeSplitOptions {
  /** Precomputed shape (see `strShape`), one entry per code point of `s`. */
  shape?: readonly number[];
  /** Minimum chunk length (as long as `s` is at least that long). `null` means the default of 2. */
  minPartLength?: number | null;
}

/**
 * Splits `s` where its case shape changes. A chunk is kept separate only if
 * both it and the previous part reach `minPartLength`; otherwise it is
 * appended to the previous part. Concatenating the result gives back `s`.
 */
export function shapeSplit(s: string, options?: ShapeSplitOptions): string[] {
  const minLen = options?.minPartLength ?? DEFAULT_MIN_PART_LENGTH;
  if (minLen < 1) {
    throw invalidArgument("`minPartLength` must be greater or equal 1", { minPartLength: minLen });
  }

  if (s.length === 0) return [""];

  const chars = Array.from(s);
  const shape = options?.shape ?? strShape(s);
  if (shape.length !== chars.length) {
    throw new ShapeError("`shape` must have one entry per character of `s`", {
      expected: chars.length,
      actual: shape.length,
    });
  }

  const change = shape.map((v, i) => (i === 0 ? 0 : Math.abs(v - shape[i - 1]!)));

  const parts: string[] = [];
  const partLens: number[] = [];
  let n = 0;

  while (n < chars.length) {
    const begin = n;
    // a lower case start may break after one character ("newYork" -> "new", "York")
    const offset = n === 0 && shape[0] === 0 ? n + 1 : n + minLen;
    const end = change.indexOf(1, offset);

    const chunk = end < 0 ? chars.slice(begin) : chars.slice(begin, end);
    n = end < 0 ? chars.length : end;

    const last = parts.length - 1;
    if (last < 0 || (partLens[last]! >= minLen && chunk.length >= minLen)) {
      parts.push(chunk.join(""));
      partLens.push(chunk.length);
    } else {
      parts[last] = parts[last]! + chunk.join("");
      partLens[last] = partLens[last]! + chunk.length;
    }
  }

  return parts;
}

/**
 * Expands a compound token, e.g. "US-Student" -> ["US", "Student"].
 *
 * After splitting, parts shorter than `minPartLength` are carried forward
 * onto the next part. With `splitOnCaseChange` only short parts that are all
 * upper case are carried ("E-Mobility" -> "EMobility", but "Camel-camelCase"
 * -> "Camel", "camel", "Case"). A short part left over at the end is merged
 * into the part before it.
 */
export function splitCompound(token: string, options?: SplitOptions): string[] {
  const rawChars = options?.splitChars ?? ["-"];
  const splitChars = typeof rawChars === "string" ? [rawChars] : Array.from(rawChars);
  const minLen = options?.minPartLength === undefined ? DEFAULT_MIN_PART_LENGTH : options.minPartLength;
  const caseChange = options?.splitOnCaseChange ?? false;

  if (minLen !== null && minLen < 1) {
    throw invalidArgument("`minPartLength` must be greater or equal 1", { minPartLength: minLen });
  }

  let pieces: string[];
  if (caseChange && splitChars.length === 0) {
    pieces = shapeSplit(token, { minPartLength: minLen });
  } else {
    pieces = multiSplit(token, new Set(splitChars));
    if (caseChange) pieces = pieces.flatMap((p) => shapeSplit(p, { minPartLength: minLen }));
  }

  if (pieces.length === 1) return pieces;

  const parts: string[] = [];
  let carry = false;

  for (const p of pieces) {
    if (!p) continue;

    const last = parts.length - 1;
    if (carry && last >= 0) parts[last] = parts[last]! + p;
    else parts.push(p);

    if (minLen !== null) carry = codePointLength(p) < minLen;
    if (caseChange) carry = minLen !== null ? carry && isUpperString(p) : isUpperString(p);
  }

  if (carry && parts.length >= 2) {
    const tail = parts.pop()!;
    parts[parts.length - 1] = parts[parts.length - 1]! + tail;
  }

  return parts.length ? parts : [token];
}

export class ShapeCompoundSplitter implements CompoundSplitter {
  split(token: string, options?: SplitOptions): string[] {
    return splitCompound(token, options);
  }
}
