export * from "./maskedTokenDocument.js";
export * from "./patternMatcher.js";
export * from "./glob.js";
export * from "./indexWindowBuilder.js";
export * from "./runMatcher.js";
export * from "./shapeCompoundSplitter.js";
export * from "./simplePipeline.js";
export * from "./jsonStopwordSource.js";
export * from "./pos.js";
export * from "./kwic.js";
export * from "./tokenCorpus.js";
