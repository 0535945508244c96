import type { Citation, RetrievedChunk } from "@policyqa/core";

export const SNIPPET_LENGTH = 200;

/**
 * The `[DOC: ... | page: ... | paragraph: ...]` tag is what the answer prompt
 * tells the model to cite from. Keep it byte-stable.
 */
export function formatChunkHeader(chunk: RetrievedChunk): string {
  const md = chunk.metadata;
  return `[DOC: ${md.filename} | page: ${md.pageNumber} | paragraph: ${md.chunkId}]`;
}

export function formatContext(chunks: RetrievedChunk[]): string {
  return chunks.map((c) => `${formatChunkHeader(c)}\n${c.text}\n`).join("\n");
}

function snippet(text: string): string {
  return text.length > SNIPPET_LENGTH ? `${text.slice(0, SNIPPET_LENGTH)}...` : text;
}

export function getCitations(chunks: RetrievedChunk[]): Citation[] {
  return chunks.map((c) => ({
    filename: c.metadata.filename,
    pageNumber: c.metadata.pageNumber,
    chunkId: c.metadata.chunkId,
    textSnippet: snippet(c.text),
  }));
}
