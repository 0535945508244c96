import type { ChunkMetadata, DocumentSummary, EmbeddedChunk, MetadataFilter, VectorMatch } from "@policyqa/core";

export interface VectorStore {
  init(): void;

  upsert(params: { id: string; vector: number[]; text: string; metadata: ChunkMetadata }): void;
  upsertEmbeddedChunks(items: EmbeddedChunk[]): void;

  /**
   * Nearest first. All filter fields must match (AND); an empty filter
   * matches everything.
   */
  query(params: { vector: number[]; k: number; filter?: MetadataFilter }): VectorMatch[];

  /** Returns the number of deleted entries. */
  delete(filter: MetadataFilter): number;
  /** Empties the collection; returns the number of deleted entries. */
  clear(): number;

  count(): number;
  listDocuments(): DocumentSummary[];
}

/** Store key of a chunk: unique within a document, stable across re-uploads. */
export function chunkKey(chunk: Pick<ChunkMetadata, "documentId" | "chunkId">): string {
  return `${chunk.documentId}_${chunk.chunkId}`;
}

export function toChunkMetadata(chunk: ChunkMetadata): ChunkMetadata {
  return {
    documentId: chunk.documentId,
    chunkId: chunk.chunkId,
    pageNumber: chunk.pageNumber,
    filename: chunk.filename,
    documentType: chunk.documentType,
    tokenCount: chunk.tokenCount,
    charCount: chunk.charCount,
    startOffset: chunk.startOffset,
    endOffset: chunk.endOffset,
  };
}
