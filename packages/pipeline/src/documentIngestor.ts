import {
  errorMessage,
  MalformedServiceResponseError,
  silentLogger,
  type ChunkStatistics,
  type Logger,
} from "@policyqa/core";
import type { EmbeddingService } from "@policyqa/embeddings";
import {
  chunkDocument,
  documentIdFor,
  getChunkStatistics,
  inferDocumentType,
  type ChunkOptions,
  type DocumentParser,
} from "@policyqa/ingestion";
import type { VectorStore } from "@policyqa/vectorstore";
import { noopAuditLog, type AuditLog } from "./auditLog.js";
import { InMemoryJobStore, type JobStore } from "./jobStore.js";
import type { JobRecord } from "./types.js";

export type IngestionResult = {
  documentId: string;
  filename: string;
  chunksCreated: number;
  statistics: ChunkStatistics | null;
};

export type StartedIngestion = {
  jobId: string;
  filename: string;
  /** Settles with the final job record; never rejects. */
  completion: Promise<JobRecord>;
};

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/**
 * `yyyyMMddHHmmss_<filename>` in local time; `yyyyMMddHHmmss-<seq>_<filename>`
 * for the second and later uploads of a name within one second.
 */
export function jobIdFor(filename: string, at: Date, seq = 1): string {
  const stamp =
    pad(at.getFullYear(), 4) +
    pad(at.getMonth() + 1) +
    pad(at.getDate()) +
    pad(at.getHours()) +
    pad(at.getMinutes()) +
    pad(at.getSeconds());
  return seq > 1 ? `${stamp}-${seq}_${filename}` : `${stamp}_${filename}`;
}

export class DocumentIngestor {
  readonly jobs: JobStore;
  private readonly audit: AuditLog;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      parser: DocumentParser;
      embeddings: EmbeddingService;
      store: VectorStore;
      chunkOptions?: ChunkOptions;
      jobs?: JobStore;
      audit?: AuditLog;
      logger?: Logger;
      now?: () => Date;
    }
  ) {
    this.now = deps.now ?? (() => new Date());
    this.jobs = deps.jobs ?? new InMemoryJobStore(this.now);
    this.audit = deps.audit ?? noopAuditLog;
    this.log = deps.logger ?? silentLogger;
  }

  /**
   * Validates the document type of the name the parser reports (throws
   * `UnsupportedInputError` before a job exists), then parses, chunks, embeds
   * and stores in the background.
   */
  async startIngestion(filePath: string): Promise<StartedIngestion> {
    const filename = await this.deps.parser.filenameOf(filePath);
    inferDocumentType(filename);

    const at = this.now();
    let seq = 1;
    while (this.jobs.get(jobIdFor(filename, at, seq))) seq++;
    const jobId = jobIdFor(filename, at, seq);

    this.jobs.create(jobId, filename);
    this.log.info("job started", { jobId, filename });

    return { jobId, filename, completion: this.runJob(jobId, filePath) };
  }

  private async runJob(jobId: string, filePath: string): Promise<JobRecord> {
    let result: IngestionResult;
    try {
      result = await this.ingest(filePath);
    } catch (err) {
      const error = errorMessage(err);
      this.log.error("job failed", { jobId, error });
      return this.jobs.fail(jobId, error);
    }

    const record = this.jobs.complete(jobId, result.chunksCreated);
    this.log.info("job completed", { jobId, chunksCreated: result.chunksCreated });

    try {
      await this.audit.record({
        type: "document_upload",
        jobId,
        filename: result.filename,
        chunks: result.chunksCreated,
        timestamp: this.now().toISOString(),
      });
    } catch (err) {
      this.log.warn("audit log write failed", { jobId, error: errorMessage(err) });
    }

    return record;
  }

  /** Foreground ingestion; re-ingesting a file overwrites its chunks by key. */
  async ingest(filePath: string): Promise<IngestionResult> {
    const doc = await this.deps.parser.parse(filePath);
    inferDocumentType(doc.filename);
    const chunks = chunkDocument(doc, this.deps.chunkOptions);
    this.log.debug("chunked", { filename: doc.filename, pages: doc.pages.length, chunks: chunks.length });

    const vectors = await this.deps.embeddings.embedBatch(chunks.map((c) => c.text));
    if (vectors.length !== chunks.length) {
      throw new MalformedServiceResponseError(
        "embedding service",
        `embedding count mismatch: got ${vectors.length}, expected ${chunks.length}`
      );
    }

    const items = chunks.map((chunk, i) => {
      const vector = vectors[i];
      if (!vector) {
        throw new MalformedServiceResponseError("embedding service", `missing embedding for chunk ${chunk.chunkId}`);
      }
      return { chunk, vector };
    });

    this.deps.store.upsertEmbeddedChunks(items);

    return {
      documentId: documentIdFor(doc.filename),
      filename: doc.filename,
      chunksCreated: chunks.length,
      statistics: getChunkStatistics(chunks),
    };
  }
}
