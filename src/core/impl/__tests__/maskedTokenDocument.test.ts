import { describe, expect, it } from "vitest";
import { MaskedTokenDocument, ShapeError } from "../../index.js";
import { errorCode } from "./helpers.js";

function doc() {
  return new MaskedTokenDocument("d", ["a", "b", "c", "d"], { attrs: { pos: ["X", "Y", "X", "Z"] } });
}

describe("MaskedTokenDocument", () => {
  it("starts with every token live", () => {
    const d = doc();
    expect(d.length).toBe(4);
    expect(d.isCompact()).toBe(true);
    expect(d.mask).toEqual([true, true, true, true]);
  });

  it("scatters sub-masks into the live positions", () => {
    const d = doc();
    d.applyMask([true, false, true, true]);
    expect(d.logicalTokens()).toEqual(["a", "c", "d"]);

    d.applyMask([false, true, true]);
    expect(d.mask).toEqual([false, false, true, true]);
    expect(d.logicalTokens()).toEqual(["c", "d"]);
    expect(d.logicalAttr("pos")).toEqual(["X", "Z"]);
    expect(d.length).toBe(2);
    expect(d.bufferLength).toBe(4);
  });

  it("removes the marked tokens when inverted", () => {
    const d = doc();
    d.applyMask([true, false, false, true], true);
    expect(d.logicalTokens()).toEqual(["b", "c"]);
  });

  it("rejects sub-masks that do not cover the live view", () => {
    const d = doc();
    d.applyMask([true, true, false, false]);
    expect(() => d.applyMask([true, true, true, true])).toThrow(ShapeError);
    expect(d.logicalTokens()).toEqual(["a", "b"]);
  });

  it("rejects attributes of the wrong length", () => {
    expect(() => new MaskedTokenDocument("x", ["a", "b"], { attrs: { pos: ["X"] } })).toThrow(ShapeError);
    expect(() => new MaskedTokenDocument("x", ["a", "b"], { mask: [true] })).toThrow(ShapeError);
  });

  it("compacts into a new document holding only live tokens", () => {
    const d = doc();
    d.applyMask([false, true, false, true]);
    const c = d.compact();

    expect(c).not.toBe(d);
    expect(c.tokens).toEqual(["b", "d"]);
    expect(c.attr("pos")).toEqual(["Y", "Z"]);
    expect(c.isCompact()).toBe(true);
    expect(d.bufferLength).toBe(4);
  });

  it("returns itself when compacting a compact document", () => {
    const d = doc();
    expect(d.compact()).toBe(d);
  });

  it("compacts once", () => {
    const d = doc();
    d.applyMask([true, false, true, false]);
    const once = d.compact();
    const twice = once.compact();
    expect(twice).toBe(once);
    expect(twice.tokens).toEqual(d.logicalTokens());
  });

  it("never revives masked tokens over repeated masks", () => {
    let seed = 7;
    const next = () => {
      seed = (Math.imul(seed, 1103515245) + 12345) >>> 0;
      return seed / 4294967296;
    };

    for (let round = 0; round < 50; round++) {
      const d = new MaskedTokenDocument("d", Array.from({ length: 20 }, (_, i) => `t${i}`));
      for (let step = 0; step < 6; step++) {
        const before = [...d.mask];
        const sub = Array.from({ length: d.length }, () => next() < 0.7);
        d.applyMask(sub, next() < 0.3);

        before.forEach((was, i) => {
          if (!was) expect(d.mask[i]).toBe(false);
        });
        expect(d.length).toBeLessThanOrEqual(before.filter(Boolean).length);
        expect(d.length).toBe(d.mask.filter(Boolean).length);
      }
    }
  });

  it("maps live tokens only and keeps the mask", () => {
    const d = doc();
    d.applyMask([false, false, true, true]);
    const m = d.mapTokens((t) => t.toUpperCase());

    expect(m.tokens).toEqual(["a", "b", "C", "D"]);
    expect(m.mask).toEqual([false, false, true, true]);
    expect(d.tokens).toEqual(["a", "b", "c", "d"]);
  });

  it("reports unknown attributes", () => {
    expect(errorCode(() => doc().logicalAttr("lemma"))).toBe("INVALID_ARGUMENT");
    expect(doc().hasAttr("pos")).toBe(true);
    expect(doc().attrNames()).toEqual(["pos"]);
  });

  it("handles empty documents", () => {
    const d = new MaskedTokenDocument("empty", []);
    d.applyMask([]);
    expect(d.length).toBe(0);
    expect(d.compact()).toBe(d);
  });
});
