import { CorpusError } from "../../index.js";

/** Runs `fn` and returns the `code` of the CorpusError it throws. */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof CorpusError) return e.code;
    throw e;
  }
  return undefined;
}
