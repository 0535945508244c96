/**
 * Runtime configuration
 *
 * Read once from environment variables (scripts load `.env` first) and
 * validated with zod. Every field has a default, so an empty environment
 * yields a working local setup against Ollama on localhost.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const ConfigSchema = z
  .object({
    OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
    EMBEDDING_MODEL: z.string().trim().min(1).default("nomic-embed-text:latest"),
    LLM_MODEL: z.string().trim().min(1).default("llama3.1:8b"),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    MAX_TOKENS: z.coerce.number().int().positive().default(2000),

    TOP_K_CHUNKS: z.coerce.number().int().min(1).max(100).default(7),
    CHUNK_SIZE: z.coerce.number().int().positive().default(512),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(128),

    VECTOR_DB_PATH: z.string().min(1).default(".data/vectorstore.sqlite"),
    AUDIT_LOG_PATH: z.string().min(1).default(".data/logs/audit.jsonl"),

    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    CONTRADICTION_CHECK: z.enum(["llm", "heuristic"]).default("llm"),
  })
  .refine((c) => c.CHUNK_OVERLAP < c.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  });

export interface AppConfig {
  ollamaBaseUrl: string;
  embeddingModel: string;
  llmModel: string;
  llmTemperature: number;
  maxTokens: number;
  topKChunks: number;
  chunkSize: number;
  chunkOverlap: number;
  vectorDbPath: string;
  auditLogPath: string;
  logLevel: LogLevel;
  contradictionCheck: "llm" | "heuristic";
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );

  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }

  const c = parsed.data;
  return Object.freeze({
    ollamaBaseUrl: c.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    embeddingModel: c.EMBEDDING_MODEL,
    llmModel: c.LLM_MODEL,
    llmTemperature: c.LLM_TEMPERATURE,
    maxTokens: c.MAX_TOKENS,
    topKChunks: c.TOP_K_CHUNKS,
    chunkSize: c.CHUNK_SIZE,
    chunkOverlap: c.CHUNK_OVERLAP,
    vectorDbPath: c.VECTOR_DB_PATH,
    auditLogPath: c.AUDIT_LOG_PATH,
    logLevel: c.LOG_LEVEL,
    contradictionCheck: c.CONTRADICTION_CHECK,
  });
}
