import { describe, it, expect } from "vitest";
import type { ParsedDocument } from "@policyqa/core";
import { chunkDocument, getChunkStatistics } from "./pageChunker.js";
import { documentIdFor } from "./documentType.js";

const doc: ParsedDocument = {
  filename: "policy.pdf",
  documentType: "pdf",
  uploadDate: "2026-01-15T09:00:00.000Z",
  pages: [
    { pageNumber: 1, text: "alpha beta gamma delta epsilon zeta", charCount: 35 },
    { pageNumber: 2, text: "", charCount: 0 },
    { pageNumber: 3, text: "omega", charCount: 5 },
  ],
};

describe("chunkDocument", () => {
  const chunks = chunkDocument(doc, { chunkSize: 20, chunkOverlap: 5 });

  it("chunks every non-empty page and skips empty ones", () => {
    expect(chunks.map((c) => [c.pageNumber, c.text])).toEqual([
      [1, "alpha beta gamma"],
      [1, "gamma delta epsilon"],
      [1, "zeta"],
      [3, "omega"],
    ]);
  });

  it("numbers chunks across the whole document", () => {
    expect(chunks.map((c) => c.chunkId)).toEqual([0, 1, 2, 3]);
  });

  it("derives approximate offsets from the window index within the page", () => {
    expect(chunks.map((c) => [c.startOffset, c.endOffset])).toEqual([
      [0, 3],
      [15, 18],
      [30, 31],
      [0, 1],
    ]);
  });

  it("copies document metadata onto every chunk", () => {
    const id = documentIdFor("policy.pdf");
    expect(id).toMatch(/^[0-9a-f]{16}$/);

    for (const c of chunks) {
      expect(c.documentId).toBe(id);
      expect(c.filename).toBe("policy.pdf");
      expect(c.documentType).toBe("pdf");
      expect(c.charCount).toBe(c.text.length);
    }
    expect(chunks[1]?.tokenCount).toBe(3);
  });

  it("uses 512/128 windows by default", () => {
    const long: ParsedDocument = {
      ...doc,
      pages: [{ pageNumber: 1, text: "word ".repeat(300).trim(), charCount: 1499 }],
    };

    const out = chunkDocument(long);
    expect(out.length).toBeGreaterThan(1);
    for (const c of out) expect(c.charCount).toBeLessThanOrEqual(512);
    expect(out[1]?.startOffset).toBe(384);
  });

  it("returns no chunks for a document of blank pages", () => {
    expect(chunkDocument({ ...doc, pages: [{ pageNumber: 1, text: "  ", charCount: 2 }] })).toEqual([]);
  });
});

describe("getChunkStatistics", () => {
  it("totals and averages token and character counts", () => {
    const chunks = chunkDocument(doc, { chunkSize: 20, chunkOverlap: 5 });

    expect(getChunkStatistics(chunks)).toEqual({
      totalChunks: 4,
      totalTokens: 8,
      totalChars: 44,
      avgTokensPerChunk: 2,
      avgCharsPerChunk: 11,
    });
  });

  it("returns null for no chunks", () => {
    expect(getChunkStatistics([])).toBeNull();
  });
});
