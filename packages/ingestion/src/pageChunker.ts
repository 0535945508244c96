import type { Chunk, ChunkStatistics, ParsedDocument } from "@policyqa/core";
import { documentIdFor } from "./documentType.js";
import { RecursiveTextSplitter } from "./textSplitter.js";

export type ChunkOptions = {
  chunkSize?: number;
  chunkOverlap?: number;
};

export const DEFAULT_CHUNK_SIZE = 512;
export const DEFAULT_CHUNK_OVERLAP = 128;

function wordCount(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

/**
 * Splits every page on its own, so no chunk crosses a page boundary.
 * `chunkId` counts across the whole document.
 *
 * `startOffset`/`endOffset` are not character positions: the start is
 * `windowIndex * (chunkSize - chunkOverlap)` within the page and the end adds
 * the window's word count. They only order chunks roughly within a document.
 */
export function chunkDocument(doc: ParsedDocument, opts?: ChunkOptions): Chunk[] {
  const chunkSize = opts?.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const chunkOverlap = opts?.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;

  const splitter = new RecursiveTextSplitter({ chunkSize, chunkOverlap });
  const documentId = documentIdFor(doc.filename);
  const stride = chunkSize - chunkOverlap;

  const out: Chunk[] = [];
  let chunkId = 0;

  for (const page of doc.pages) {
    if (!page.text.trim()) continue;

    const windows = splitter.splitText(page.text);
    windows.forEach((text, i) => {
      const tokenCount = wordCount(text);
      const startOffset = i * stride;
      out.push({
        documentId,
        chunkId: chunkId++,
        text,
        pageNumber: page.pageNumber,
        filename: doc.filename,
        documentType: doc.documentType,
        tokenCount,
        charCount: text.length,
        startOffset,
        endOffset: startOffset + tokenCount,
      });
    });
  }

  return out;
}

export function getChunkStatistics(chunks: Chunk[]): ChunkStatistics | null {
  if (chunks.length === 0) return null;

  const totalTokens = chunks.reduce((sum, c) => sum + c.tokenCount, 0);
  const totalChars = chunks.reduce((sum, c) => sum + c.charCount, 0);

  return {
    totalChunks: chunks.length,
    totalTokens,
    totalChars,
    avgTokensPerChunk: totalTokens / chunks.length,
    avgCharsPerChunk: totalChars / chunks.length,
  };
}
