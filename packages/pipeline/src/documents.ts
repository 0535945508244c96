import type { DocumentSummary } from "@policyqa/core";
import type { VectorStore } from "@policyqa/vectorstore";
import { UnknownJobError, type JobStore } from "./jobStore.js";
import type { JobCounts, JobRecord } from "./types.js";

export type DocumentDeletion = {
  documentId: string;
  /** `null` when no stored document had this id. */
  filename: string | null;
  deletedChunks: number;
};

export type CollectionStats = {
  vectorDb: { totalChunks: number; totalDocuments: number };
  uploadJobs: JobCounts;
};

export class DocumentCatalog {
  constructor(private readonly deps: { store: VectorStore; jobs: JobStore }) {}

  list(): { documents: DocumentSummary[]; total: number } {
    const documents = this.deps.store.listDocuments();
    return { documents, total: documents.length };
  }

  delete(documentId: string): DocumentDeletion {
    const doc = this.deps.store.listDocuments().find((d) => d.documentId === documentId);
    const deletedChunks = this.deps.store.delete({ documentId });
    return { documentId, filename: doc?.filename ?? null, deletedChunks };
  }

  /** Removes every document; returns the number of deleted chunks. */
  clear(): number {
    return this.deps.store.clear();
  }

  job(jobId: string): JobRecord {
    const record = this.deps.jobs.get(jobId);
    if (!record) throw new UnknownJobError(jobId);
    return record;
  }

  stats(): CollectionStats {
    return {
      vectorDb: {
        totalChunks: this.deps.store.count(),
        totalDocuments: this.deps.store.listDocuments().length,
      },
      uploadJobs: this.deps.jobs.counts(),
    };
  }
}
