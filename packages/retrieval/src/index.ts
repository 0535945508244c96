export * from "./retriever.js";
export * from "./context.js";
