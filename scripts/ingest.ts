import "dotenv/config";
import { createLogger, loadConfig } from "@policyqa/core";
import { createPipeline } from "@policyqa/pipeline";
import { readOption } from "./cli.js";

const file = readOption("file");

if (!file) {
  console.error("Usage: npm run ingest -- --file <document.pdf.pages.json>");
  process.exit(1);
}

const config = loadConfig();
const log = createLogger("ingest", config.logLevel);
const pipeline = createPipeline(config);

try {
  log.info("start", { file, dbPath: config.vectorDbPath, chunkSize: config.chunkSize });

  const { jobId, completion } = await pipeline.ingestor.startIngestion(file);
  log.info("job created", { jobId });

  await completion;
  const record = pipeline.catalog.job(jobId);

  if (record.status === "failed") {
    log.error("failed", { jobId, error: record.error });
    process.exitCode = 1;
  } else {
    log.info("stored in sqlite OK", record);
  }
} finally {
  pipeline.close();
}
