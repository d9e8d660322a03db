import { describe, expect, it } from "vitest";
import { pennToWordNet, simplifiedPos } from "../../index.js";

describe("simplifiedPos", () => {
  it("maps Universal Dependencies tags", () => {
    expect(simplifiedPos("NOUN")).toBe("N");
    expect(simplifiedPos("PROPN")).toBe("N");
    expect(simplifiedPos("VERB")).toBe("V");
    expect(simplifiedPos("ADV")).toBe("ADV");
    expect(simplifiedPos("N")).toBe("");
    expect(simplifiedPos("DET", "ud", "O")).toBe("O");
  });

  it("maps Penn Treebank tags by prefix", () => {
    expect(simplifiedPos("NNP", "penn")).toBe("N");
    expect(simplifiedPos("VBZ", "penn")).toBe("V");
    expect(simplifiedPos("JJX", "penn")).toBe("ADJ");
    expect(simplifiedPos("RBFOO", "penn")).toBe("ADV");
    expect(simplifiedPos("DT", "penn")).toBe("");
  });

  it("maps WordNet style tags by prefix", () => {
    expect(simplifiedPos("NN", "wn")).toBe("N");
    expect(simplifiedPos("ADJY", "wn")).toBe("ADJ");
    expect(simplifiedPos("X", "wn")).toBe("");
  });
});

describe("pennToWordNet", () => {
  it("maps tags to WordNet letters", () => {
    expect(pennToWordNet("JJR")).toBe("a");
    expect(pennToWordNet("RB")).toBe("r");
    expect(pennToWordNet("NNS")).toBe("n");
    expect(pennToWordNet("VBD")).toBe("v");
    expect(pennToWordNet("DT")).toBeUndefined();
  });
});
