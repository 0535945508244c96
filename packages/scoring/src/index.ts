export * from "./types.js";
export * from "./language.js";
export * from "./contradictionParser.js";
export * from "./contradiction.js";
export * from "./confidence.js";
export * from "./policyScorer.js";
