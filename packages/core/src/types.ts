export type DocumentType = "pdf" | "docx";

export type DocumentId = string;
export type ChunkId = number;

export interface Page {
  pageNumber: number;
  text: string;
  charCount: number;
}

export interface ParsedDocument {
  filename: string;
  documentType: DocumentType;
  uploadDate: string;
  pages: Page[];
}

export interface ChunkMetadata {
  documentId: DocumentId;
  chunkId: ChunkId;
  pageNumber: number;
  filename: string;
  documentType: DocumentType;

  tokenCount: number; // whitespace word count
  charCount: number;

  // approximate window positions, see chunkDocument()
  startOffset: number;
  endOffset: number;
}

export interface Chunk extends ChunkMetadata {
  text: string;
}

export interface EmbeddedChunk {
  chunk: Chunk;
  vector: number[];
}

export type MetadataFilter = Partial<Pick<ChunkMetadata, "documentId" | "filename" | "documentType">>;

export interface VectorMatch {
  id: string;
  text: string;
  metadata: ChunkMetadata;
  distance: number;
}

export interface RetrievedChunk extends VectorMatch {
  /** 1 - distance. Negative when distance > 1. */
  similarityScore: number;
}

export interface Citation {
  filename: string;
  pageNumber: number;
  chunkId: ChunkId;
  textSnippet: string;
}

export interface ChunkStatistics {
  totalChunks: number;
  totalTokens: number;
  totalChars: number;
  avgTokensPerChunk: number;
  avgCharsPerChunk: number;
}

export interface DocumentSummary {
  documentId: DocumentId;
  filename: string;
  documentType: DocumentType;
  chunkCount: number;
}
