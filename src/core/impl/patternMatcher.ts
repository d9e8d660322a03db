import type { GlobMethod, MatchOptions, MatchType, Pattern } from "../types.js";
import type { TokenMatcher } from "../matcher.js";
import { invalidArgument } from "../errors.js";
import { globToRegExpSource } from "./glob.js";

const MATCH_TYPES: ReadonlySet<string> = new Set<MatchType>(["exact", "regex", "glob"]);
const GLOB_METHODS: ReadonlySet<string> = new Set<GlobMethod>(["match", "search"]);

/**
 * Exact / regex / glob token matching.
 *
 * - exact: string equality, optionally case-insensitive
 * - regex: search semantics (found anywhere in the token)
 * - glob: compiled to a regex; "match" anchors at the token start
 */
export class PatternMatcher implements TokenMatcher {
  match(pattern: Pattern, tokens: readonly string[], options?: MatchOptions): boolean[] {
    const matchType = options?.matchType ?? "exact";
    const ignoreCase = options?.ignoreCase ?? false;
    const globMethod = options?.globMethod ?? "match";

    if (!MATCH_TYPES.has(matchType)) {
      throw invalidArgument("`matchType` must be one of: exact, regex, glob", { matchType });
    }
    if (matchType === "glob" && !GLOB_METHODS.has(globMethod)) {
      throw invalidArgument("`globMethod` must be one of: match, search", { globMethod });
    }

    if (tokens.length === 0) return [];

    if (matchType === "exact") {
      if (typeof pattern !== "string") {
        throw invalidArgument("exact matching requires a string pattern");
      }
      if (!ignoreCase) return tokens.map((t) => t === pattern);
      const p = pattern.toLowerCase();
      return tokens.map((t) => t.toLowerCase() === p);
    }

    const re = matchType === "regex" ? compileRegex(pattern, ignoreCase) : compileGlob(pattern, ignoreCase, globMethod);
    return tokens.map((t) => re.test(t));
  }

  matchAny(patterns: Pattern | readonly Pattern[], tokens: readonly string[], options?: MatchOptions): boolean[] {
    const list: readonly Pattern[] = isPatternList(patterns) ? patterns : [patterns];
    const out = new Array<boolean>(tokens.length).fill(false);

    for (const p of list) {
      const m = this.match(p, tokens, options);
      for (let i = 0; i < m.length; i++) {
        if (m[i]) out[i] = true;
      }
    }

    return out;
  }
}

function isPatternList(p: Pattern | readonly Pattern[]): p is readonly Pattern[] {
  return Array.isArray(p);
}

function compileRegex(pattern: Pattern, ignoreCase: boolean): RegExp {
  if (pattern instanceof RegExp) {
    // drop stateful flags so `test()` has no lastIndex carry-over between tokens
    let flags = pattern.flags.replace(/[gy]/g, "");
    if (ignoreCase && !flags.includes("i")) flags += "i";
    return new RegExp(pattern.source, flags);
  }
  return buildRegExp(pattern, ignoreCase ? "i" : "");
}

function compileGlob(pattern: Pattern, ignoreCase: boolean, method: GlobMethod): RegExp {
  if (typeof pattern !== "string") {
    throw invalidArgument("glob matching requires a string pattern");
  }
  const source = globToRegExpSource(pattern);
  return buildRegExp(method === "match" ? `^(?:${source})` : source, ignoreCase ? "i" : "");
}

function buildRegExp(source: string, flags: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (e) {
    throw invalidArgument(`invalid regular expression: ${source}`, {
      pattern: source,
      reason: e instanceof Error ? e.message : String(e),
    });
  }
}
