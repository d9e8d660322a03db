import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { JsonStopwordSource } from "../../index.js";
import { errorCode } from "./helpers.js";

describe("JsonStopwordSource", () => {
  it("loads the bundled lists", () => {
    const src = new JsonStopwordSource();
    expect(src.load("en")).toContain("the");
    expect(src.load("de")).toContain("und");
  });

  it("returns undefined for languages without a list", () => {
    expect(new JsonStopwordSource().load("xx")).toBeUndefined();
  });

  it("rejects malformed language codes", () => {
    expect(errorCode(() => new JsonStopwordSource().load("EN"))).toBe("INVALID_ARGUMENT");
    expect(errorCode(() => new JsonStopwordSource().load("../en"))).toBe("INVALID_ARGUMENT");
  });

  it("reads lists from a given directory", () => {
    const dir = mkdtempSync(path.join(tmpdir(), "stopwords-"));
    writeFileSync(path.join(dir, "fr.json"), JSON.stringify(["le", "la"]));
    writeFileSync(path.join(dir, "it.json"), JSON.stringify({ words: ["il"] }));

    const src = new JsonStopwordSource(dir);
    expect(src.load("fr")).toEqual(["le", "la"]);
    expect(errorCode(() => src.load("it"))).toBe("INVALID_ARGUMENT");
  });
});
