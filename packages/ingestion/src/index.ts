export * from "./documentType.js";
export * from "./normalize.js";
export * from "./parser.js";
export * from "./textSplitter.js";
export * from "./pageChunker.js";
