import "dotenv/config";
import { createLogger, loadConfig } from "@policyqa/core";
import { createPipeline } from "@policyqa/pipeline";
import { Retriever } from "@policyqa/retrieval";
import { readDocumentType, readOption, readPositiveInt } from "./cli.js";

const q = readOption("q");
const document = readOption("document");
const type = readDocumentType("type");

if (!q) {
  console.error('Usage: npm run query -- --q "<question>" [--topK 7] [--document handbook.pdf] [--type pdf|docx]');
  process.exit(1);
}

const config = loadConfig();
const log = createLogger("query", config.logLevel);
const topK = readPositiveInt("topK") ?? config.topKChunks;

const pipeline = createPipeline(config);

try {
  const retriever = new Retriever({ embeddings: pipeline.embeddings, store: pipeline.store, defaultTopK: topK });
  log.info("start", { dbPath: config.vectorDbPath, topK });

  const results = await retriever.retrieve(q, {
    ...(document ? { filterByDocument: document } : {}),
    ...(type && { filterByType: type }),
  });

  console.log("[query] results:", results.length);

  for (const r of results) {
    const md = r.metadata;

    console.log("=".repeat(80));
    console.log(`similarity ${r.similarityScore.toFixed(4)} | ${md.filename} p.${md.pageNumber} #${md.chunkId} (${md.documentType})`);
    console.log("");
    console.log(r.text.length > 600 ? `${r.text.slice(0, 600)}...` : r.text);
  }

  console.log("=".repeat(80));
} finally {
  pipeline.close();
}
