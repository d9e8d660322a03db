import { invalidArgument } from "../errors.js";

export type PosTagset = "ud" | "penn" | "wn";

/**
 * Coarse POS class for a full tag:
 * - nouns -> "N", verbs -> "V", adjectives -> "ADJ", adverbs -> "ADV"
 * - anything else -> `fallback`
 *
 * `ud` (Universal Dependencies) compares whole tags; `penn` and `wn` look at
 * tag prefixes (NN*, VB*, JJ*, RB* and N*, V*, ADJ*, ADV* respectively).
 */
export function simplifiedPos(pos: string, tagset: PosTagset = "ud", fallback: string = ""): string {
  switch (tagset) {
    case "ud":
      if (pos === "NOUN" || pos === "PROPN") return "N";
      if (pos === "VERB") return "V";
      if (pos === "ADJ" || pos === "ADV") return pos;
      return fallback;
    case "penn":
      if (pos.startsWith("N") || pos.startsWith("V")) return pos[0]!;
      if (pos.startsWith("JJ")) return "ADJ";
      if (pos.startsWith("RB")) return "ADV";
      return fallback;
    case "wn":
      if (pos.startsWith("N") || pos.startsWith("V")) return pos[0]!;
      if (pos.startsWith("ADJ") || pos.startsWith("ADV")) return pos.slice(0, 3);
      return fallback;
    default:
      throw invalidArgument(`unknown tagset "${String(tagset)}"`, { tagset });
  }
}

/** Penn Treebank tag -> WordNet POS letter ("a", "r", "n", "v"), or `undefined`. */
export function pennToWordNet(tag: string): string | undefined {
  if (tag === "JJ" || tag === "JJR" || tag === "JJS") return "a";
  if (tag === "RB" || tag === "RBR" || tag === "RBS") return "r";
  if (tag === "NN" || tag === "NNS" || tag === "NNP" || tag === "NNPS") return "n";
  if (["VB", "VBD", "VBG", "VBN", "VBP", "VBZ"].includes(tag)) return "v";
  return undefined;
}
