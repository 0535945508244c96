import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { UnsupportedInputError, type ParsedDocument } from "@policyqa/core";
import type { EmbeddingService } from "@policyqa/embeddings";
import { documentIdFor, JsonPagesParser, sourceFilename, type DocumentParser } from "@policyqa/ingestion";
import { SqliteVectorStore } from "@policyqa/vectorstore";
import type { AuditEntry, AuditLog } from "./auditLog.js";
import { DocumentIngestor, jobIdFor } from "./documentIngestor.js";
import { DocumentCatalog } from "./documents.js";
import { UnknownJobError } from "./jobStore.js";

const handbook: ParsedDocument = {
  filename: "handbook.pdf",
  documentType: "pdf",
  uploadDate: "2024-01-05T09:03:07.000Z",
  pages: [
    { pageNumber: 1, text: "alpha beta gamma delta epsilon zeta", charCount: 35 },
    { pageNumber: 2, text: "   ", charCount: 3 },
    { pageNumber: 3, text: "Fees apply.", charCount: 11 },
  ],
};

class FakeParser implements DocumentParser {
  async filenameOf(filePath: string): Promise<string> {
    return sourceFilename(filePath);
  }
  readonly parse = vi.fn(async (_filePath: string): Promise<ParsedDocument> => handbook);
}

class LengthEmbeddings implements EmbeddingService {
  async embed(text: string): Promise<number[]> {
    return [text.length, 1];
  }
  async embedBatch(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map((t) => this.embed(t)));
  }
}

class MemoryAudit implements AuditLog {
  readonly entries: AuditEntry[] = [];
  async record(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }
}

const startedAt = new Date(2024, 0, 5, 9, 3, 7);

describe("jobIdFor", () => {
  it("prefixes the filename with a local timestamp", () => {
    expect(jobIdFor("handbook.pdf", startedAt)).toBe("20240105090307_handbook.pdf");
  });
});

describe("DocumentIngestor", () => {
  let store: SqliteVectorStore;
  let parser: FakeParser;
  let audit: MemoryAudit;
  let ingestor: DocumentIngestor;

  beforeEach(() => {
    store = new SqliteVectorStore(":memory:");
    store.init();
    parser = new FakeParser();
    audit = new MemoryAudit();
    ingestor = new DocumentIngestor({
      parser,
      embeddings: new LengthEmbeddings(),
      store,
      chunkOptions: { chunkSize: 20, chunkOverlap: 5 },
      audit,
      now: () => startedAt,
    });
  });

  afterEach(() => {
    store.close();
  });

  it("parses, chunks, embeds and stores a document", async () => {
    const result = await ingestor.ingest("/uploads/handbook.pdf.pages.json");

    expect(result).toMatchObject({
      documentId: documentIdFor("handbook.pdf"),
      filename: "handbook.pdf",
      chunksCreated: 4,
    });
    expect(result.statistics?.totalChunks).toBe(4);
    expect(store.listDocuments()).toEqual([
      { documentId: documentIdFor("handbook.pdf"), filename: "handbook.pdf", documentType: "pdf", chunkCount: 4 },
    ]);
  });

  it("overwrites chunks when the same document is ingested again", async () => {
    await ingestor.ingest("/uploads/handbook.pdf.pages.json");
    await ingestor.ingest("/uploads/handbook.pdf.pages.json");

    expect(store.count()).toBe(4);
  });

  it("rejects unsupported files before creating a job", async () => {
    await expect(ingestor.startIngestion("/uploads/notes.txt")).rejects.toThrow(UnsupportedInputError);
    expect(ingestor.jobs.list()).toEqual([]);
    expect(parser.parse).not.toHaveBeenCalled();
  });

  it("runs a background job to completion and audits it", async () => {
    let release = (_doc: ParsedDocument) => {};
    parser.parse.mockImplementationOnce(
      () =>
        new Promise<ParsedDocument>((resolve) => {
          release = resolve;
        })
    );

    const started = await ingestor.startIngestion("/uploads/handbook.pdf.pages.json");

    expect(started.jobId).toBe("20240105090307_handbook.pdf");
    expect(ingestor.jobs.get(started.jobId)?.status).toBe("processing");

    release(handbook);
    const record = await started.completion;

    expect(record).toMatchObject({ status: "completed", chunksCreated: 4, filename: "handbook.pdf" });
    expect(audit.entries).toEqual([
      {
        type: "document_upload",
        jobId: "20240105090307_handbook.pdf",
        filename: "handbook.pdf",
        chunks: 4,
        timestamp: startedAt.toISOString(),
      },
    ]);
  });

  it("records a failed job instead of rejecting", async () => {
    parser.parse.mockRejectedValueOnce(new Error("corrupt file"));

    const { completion } = await ingestor.startIngestion("/uploads/handbook.pdf.pages.json");
    const record = await completion;

    expect(record).toMatchObject({ status: "failed", error: "corrupt file" });
    expect(ingestor.jobs.counts()).toEqual({ total: 1, processing: 0, completed: 0, failed: 1 });
    expect(audit.entries).toEqual([]);
    expect(store.count()).toBe(0);
  });

  it("fails the job when the embedding service drops vectors", async () => {
    const lossy = new DocumentIngestor({
      parser,
      embeddings: { embed: async () => [1], embedBatch: async () => [] },
      store,
      chunkOptions: { chunkSize: 20, chunkOverlap: 5 },
      now: () => startedAt,
    });

    const { completion } = await lossy.startIngestion("/uploads/handbook.pdf.pages.json");
    const record = await completion;

    expect(record).toMatchObject({
      status: "failed",
      error: "embedding service returned a malformed response: embedding count mismatch: got 0, expected 4",
    });
  });
});

describe("DocumentIngestor with pages files", () => {
  let dir: string;
  let store: SqliteVectorStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "policyqa-ingest-"));
    store = new SqliteVectorStore(":memory:");
    store.init();
  });

  afterEach(async () => {
    store.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("takes the document name and type from the filename recorded in the file", async () => {
    const file = path.join(dir, "export.pages.json");
    await fs.writeFile(
      file,
      JSON.stringify({ filename: "conduct.docx", pages: [{ pageNumber: 1, text: "Fees apply." }] })
    );
    const audit = new MemoryAudit();
    const ingestor = new DocumentIngestor({
      parser: new JsonPagesParser(),
      embeddings: new LengthEmbeddings(),
      store,
      audit,
      now: () => startedAt,
    });

    const started = await ingestor.startIngestion(file);
    const record = await started.completion;

    expect(started).toMatchObject({ jobId: "20240105090307_conduct.docx", filename: "conduct.docx" });
    expect(record).toMatchObject({ status: "completed", filename: "conduct.docx", chunksCreated: 1 });
    expect(audit.entries).toMatchObject([{ filename: "conduct.docx", chunks: 1 }]);
    expect(store.listDocuments()).toEqual([
      { documentId: documentIdFor("conduct.docx"), filename: "conduct.docx", documentType: "docx", chunkCount: 1 },
    ]);
    expect(await ingestor.ingest(file)).toMatchObject({ filename: "conduct.docx", chunksCreated: 1 });
  });
});

describe("job ids", () => {
  it("stay distinct for repeated uploads within one second", async () => {
    const store = new SqliteVectorStore(":memory:");
    store.init();
    const ingestor = new DocumentIngestor({
      parser: new FakeParser(),
      embeddings: new LengthEmbeddings(),
      store,
      now: () => startedAt,
    });

    const first = await ingestor.startIngestion("/uploads/handbook.pdf.pages.json");
    const second = await ingestor.startIngestion("/uploads/handbook.pdf.pages.json");
    await Promise.all([first.completion, second.completion]);

    expect([first.jobId, second.jobId]).toEqual(["20240105090307_handbook.pdf", "20240105090307-2_handbook.pdf"]);
    expect(ingestor.jobs.counts()).toEqual({ total: 2, processing: 0, completed: 2, failed: 0 });

    store.close();
  });
});

describe("DocumentCatalog", () => {
  it("lists, deletes and reports stats", async () => {
    const store = new SqliteVectorStore(":memory:");
    store.init();
    const ingestor = new DocumentIngestor({
      parser: new FakeParser(),
      embeddings: new LengthEmbeddings(),
      store,
      chunkOptions: { chunkSize: 20, chunkOverlap: 5 },
    });
    const catalog = new DocumentCatalog({ store, jobs: ingestor.jobs });

    const { jobId, completion } = await ingestor.startIngestion("/uploads/handbook.pdf.pages.json");
    await completion;
    const documentId = documentIdFor("handbook.pdf");

    expect(catalog.job(jobId)).toMatchObject({ status: "completed", chunksCreated: 4 });
    expect(() => catalog.job("missing")).toThrow(UnknownJobError);

    expect(catalog.list()).toEqual({
      documents: [{ documentId, filename: "handbook.pdf", documentType: "pdf", chunkCount: 4 }],
      total: 1,
    });
    expect(catalog.stats()).toEqual({
      vectorDb: { totalChunks: 4, totalDocuments: 1 },
      uploadJobs: { total: 1, processing: 0, completed: 1, failed: 0 },
    });

    expect(catalog.delete(documentId)).toEqual({ documentId, filename: "handbook.pdf", deletedChunks: 4 });
    expect(catalog.delete("unknown")).toEqual({ documentId: "unknown", filename: null, deletedChunks: 0 });
    expect(catalog.list().total).toBe(0);
  });

  it("clears every document", async () => {
    const store = new SqliteVectorStore(":memory:");
    store.init();
    const ingestor = new DocumentIngestor({
      parser: new FakeParser(),
      embeddings: new LengthEmbeddings(),
      store,
      chunkOptions: { chunkSize: 20, chunkOverlap: 5 },
    });
    const catalog = new DocumentCatalog({ store, jobs: ingestor.jobs });

    await ingestor.ingest("/uploads/handbook.pdf.pages.json");

    expect(catalog.clear()).toBe(4);
    expect(catalog.stats().vectorDb).toEqual({ totalChunks: 0, totalDocuments: 0 });

    store.close();
  });
});
