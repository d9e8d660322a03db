const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

export function escapeRegExp(s: string): string {
  return s.replace(REGEX_SPECIAL, "\\$&");
}

/**
 * Translates a shell-style glob into regular expression source (unanchored).
 *
 * Supported syntax:
 * - `*` any run of characters, `?` exactly one character
 * - `[abc]`, `[a-z]`, `[!abc]` / `[^abc]` character classes
 * - `{foo,bar}` alternatives (each alternative is itself a glob, so groups nest)
 * - `\x` matches `x` literally
 *
 * Tokens are not paths, so `*` and `?` also match `/`.
 */
export function globToRegExpSource(glob: string): string {
  let out = "";
  let i = 0;
  const n = glob.length;

  while (i < n) {
    const c = glob[i]!;

    if (c === "*") {
      while (i < n && glob[i] === "*") i++;
      out += "[\\s\\S]*";
      continue;
    }

    if (c === "?") {
      out += "[\\s\\S]";
      i++;
      continue;
    }

    if (c === "[") {
      const end = classEnd(glob, i);
      if (end < 0) {
        out += "\\[";
        i++;
        continue;
      }
      let body = glob.slice(i + 1, end);
      let negate = false;
      if (body[0] === "!" || body[0] === "^") {
        negate = true;
        body = body.slice(1);
      }
      out += "[" + (negate ? "^" : "") + body.replace(/[\\\]]/g, "\\$&") + "]";
      i = end + 1;
      continue;
    }

    if (c === "{") {
      const end = braceEnd(glob, i);
      if (end < 0) {
        out += "\\{";
        i++;
        continue;
      }
      const alternatives = splitAlternatives(glob.slice(i + 1, end));
      out += "(?:" + alternatives.map(globToRegExpSource).join("|") + ")";
      i = end + 1;
      continue;
    }

    if (c === "\\" && i + 1 < n) {
      out += escapeRegExp(glob[i + 1]!);
      i += 2;
      continue;
    }

    out += escapeRegExp(c);
    i++;
  }

  return out;
}

// index of the `]` closing the class opened at `start`, or -1
function classEnd(glob: string, start: number): number {
  let j = start + 1;
  if (glob[j] === "!" || glob[j] === "^") j++;
  // a leading `]` is a literal member of the class
  if (glob[j] === "]") j++;
  while (j < glob.length && glob[j] !== "]") j++;
  return j < glob.length ? j : -1;
}

// index of the `}` closing the group opened at `start`, or -1; groups nest
function braceEnd(glob: string, start: number): number {
  let depth = 0;
  for (let j = start; j < glob.length; j++) {
    const c = glob[j];
    if (c === "\\") j++;
    else if (c === "{") depth++;
    else if (c === "}" && --depth === 0) return j;
  }
  return -1;
}

// splits a group body at the commas outside nested groups
function splitAlternatives(body: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let from = 0;
  for (let j = 0; j < body.length; j++) {
    const c = body[j];
    if (c === "\\") j++;
    else if (c === "{") depth++;
    else if (c === "}") depth--;
    else if (c === "," && depth === 0) {
      parts.push(body.slice(from, j));
      from = j + 1;
    }
  }
  parts.push(body.slice(from));
  return parts;
}
