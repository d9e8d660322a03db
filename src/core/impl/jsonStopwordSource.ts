import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import path from "node:path";

import type { StopwordSource } from "../stopwords.js";
import { invalidArgument } from "../errors.js";

const DEFAULT_DIR = fileURLToPath(new URL("../../../data/stopwords/", import.meta.url));

/**
 * Reads `<dir>/<language>.json` (a JSON array of strings) on first use and
 * keeps the list in memory.
 */
export class JsonStopwordSource implements StopwordSource {
  private readonly cache = new Map<string, string[] | undefined>();

  constructor(private readonly dir: string = DEFAULT_DIR) {}

  load(language: string): string[] | undefined {
    if (!/^[a-z]{2}$/.test(language)) {
      throw invalidArgument("`language` must be a two-letter ISO 639-1 language code", { language });
    }

    if (this.cache.has(language)) return this.cache.get(language);

    const words = this.read(path.join(this.dir, `${language}.json`));
    this.cache.set(language, words);
    return words;
  }

  private read(file: string): string[] | undefined {
    let raw: string;
    try {
      raw = readFileSync(file, "utf8");
    } catch (e) {
      if (isNotFound(e)) return undefined;
      throw e;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed) || !parsed.every((w): w is string => typeof w === "string")) {
      throw invalidArgument(`stopword file ${file} must contain a JSON array of strings`, { file });
    }
    return parsed;
  }
}

function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
