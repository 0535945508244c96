export * from "./types.js";
export * from "./ollama.js";
