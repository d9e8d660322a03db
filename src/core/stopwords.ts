/**
 * Source of stopword lists per language (an external language resource).
 */
export interface StopwordSource {
  /** Stopwords for a two-letter ISO 639-1 code, or `undefined` if none are available. */
  load(language: string): string[] | undefined;
}
