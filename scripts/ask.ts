import "dotenv/config";
import { createLogger, loadConfig } from "@policyqa/core";
import { createPipeline } from "@policyqa/pipeline";
import { hasSwitch, readDocumentType, readOption, readPositiveInt } from "./cli.js";

const q = readOption("q");
const topK = readPositiveInt("topK");
const document = readOption("document");
const type = readDocumentType("type");
const debug = hasSwitch("debug");

if (!q) {
  console.error(`Usage:
npm run ask -- --q "..." \\
  [--topK 7] \\
  [--document handbook.pdf] \\
  [--type pdf|docx] \\
  [--debug]`);
  process.exit(1);
}

const config = loadConfig();
const log = createLogger("ask", config.logLevel);
const pipeline = createPipeline(config);

try {
  log.info("start", {
    dbPath: config.vectorDbPath,
    model: config.llmModel,
    topK: topK ?? config.topKChunks,
    contradictionCheck: config.contradictionCheck,
  });

  const result = await pipeline.answerer.ask({
    query: q,
    ...(topK !== undefined && { topK }),
    ...(document ? { filterByDocument: document } : {}),
    ...(type && { filterByType: type }),
  });

  console.log("\n=== ANSWER ===\n");
  console.log(result.answer);

  console.log("\n=== SOURCES ===");
  result.citations.forEach((c, i) => {
    console.log(`[S${i + 1}] ${c.filename} (page ${c.pageNumber}, paragraph ${c.chunkId})`);
  });

  console.log(`\n=== CONFIDENCE: ${result.confidenceScore.toFixed(2)} ===`);
  for (const w of result.warnings) console.log(`warning: ${w}`);
  for (const r of result.recommendations) console.log(`recommendation: ${r}`);

  if (result.followupQuestions.length > 0) {
    console.log("\n=== FOLLOW-UP QUESTIONS ===");
    for (const f of result.followupQuestions) console.log(`- ${f}`);
  }

  if (debug) {
    console.log("\n[ask] metadata", JSON.stringify(result.metadata, null, 2));
  }
} finally {
  pipeline.close();
}
