export * from "./types.js";
export * from "./errors.js";
export type * from "./document.js";
export type * from "./matcher.js";
export type * from "./window.js";
export type * from "./subsequent.js";
export type * from "./compound.js";
export type * from "./pipeline.js";
export type * from "./stopwords.js";
export type * from "./corpus.js";
export * from "./impl/index.js";
