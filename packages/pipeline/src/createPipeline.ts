import { mkdirSync } from "node:fs";
import path from "node:path";
import type { AppConfig, Logger } from "@policyqa/core";
import { createLogger } from "@policyqa/core";
import { OllamaEmbeddingService, type EmbeddingService, type FetchLike } from "@policyqa/embeddings";
import { JsonPagesParser, type DocumentParser } from "@policyqa/ingestion";
import { OllamaLlmService, type LlmService } from "@policyqa/llm";
import { Retriever } from "@policyqa/retrieval";
import { PolicyScorer } from "@policyqa/scoring";
import { SqliteVectorStore } from "@policyqa/vectorstore";
import { AnswerGenerator } from "./answerGenerator.js";
import { JsonlAuditLog } from "./auditLog.js";
import { DocumentCatalog } from "./documents.js";
import { DocumentIngestor } from "./documentIngestor.js";
import { InMemoryJobStore } from "./jobStore.js";
import { QuestionAnswerer } from "./questionAnswerer.js";

export type Pipeline = {
  config: AppConfig;
  store: SqliteVectorStore;
  embeddings: EmbeddingService;
  llm: LlmService;
  ingestor: DocumentIngestor;
  answerer: QuestionAnswerer;
  catalog: DocumentCatalog;
  audit: JsonlAuditLog;
  close(): void;
};

function ensureDir(filePath: string) {
  if (filePath === ":memory:") return;
  mkdirSync(path.dirname(filePath), { recursive: true });
}

/** Wires the Ollama and SQLite adapters from configuration. */
export function createPipeline(
  config: AppConfig,
  opts: { fetchImpl?: FetchLike; parser?: DocumentParser; logger?: (tag: string) => Logger } = {}
): Pipeline {
  const logger = opts.logger ?? ((tag: string) => createLogger(tag, config.logLevel));
  const fetchImpl = opts.fetchImpl ? { fetchImpl: opts.fetchImpl } : {};

  ensureDir(config.vectorDbPath);
  const store = new SqliteVectorStore(config.vectorDbPath);
  store.init();

  const embeddings = new OllamaEmbeddingService({
    baseUrl: config.ollamaBaseUrl,
    model: config.embeddingModel,
    ...fetchImpl,
  });
  const llm = new OllamaLlmService({ baseUrl: config.ollamaBaseUrl, model: config.llmModel, ...fetchImpl });

  const audit = new JsonlAuditLog(config.auditLogPath);
  const jobs = new InMemoryJobStore();

  const ingestor = new DocumentIngestor({
    parser: opts.parser ?? new JsonPagesParser(),
    embeddings,
    store,
    chunkOptions: { chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap },
    jobs,
    audit,
    logger: logger("ingest"),
  });

  const answerer = new QuestionAnswerer({
    retriever: new Retriever({
      embeddings,
      store,
      defaultTopK: config.topKChunks,
      logger: logger("retrieve"),
    }),
    generator: new AnswerGenerator(llm, {
      temperature: config.llmTemperature,
      maxTokens: config.maxTokens,
      logger: logger("generate"),
    }),
    scorer: new PolicyScorer({
      llm: config.contradictionCheck === "llm" ? llm : null,
      logger: logger("score"),
    }),
    audit,
    logger: logger("ask"),
  });

  return {
    config,
    store,
    embeddings,
    llm,
    ingestor,
    answerer,
    catalog: new DocumentCatalog({ store, jobs }),
    audit,
    close: () => store.close(),
  };
}
