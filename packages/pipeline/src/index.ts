export * from "./types.js";
export * from "./answerGenerator.js";
export * from "./jobStore.js";
export * from "./auditLog.js";
export * from "./documentIngestor.js";
export * from "./questionAnswerer.js";
export * from "./documents.js";
export * from "./createPipeline.js";
