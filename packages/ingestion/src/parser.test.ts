import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { MalformedServiceResponseError, UnsupportedInputError } from "@policyqa/core";
import { JsonPagesParser, sourceFilename } from "./parser.js";
import { inferDocumentType } from "./documentType.js";
import { normalizePageText } from "./normalize.js";

describe("normalizePageText", () => {
  it("collapses whitespace, joins hyphenated breaks and drops non-ascii", () => {
    expect(normalizePageText("Student  con-\nduct\tpolicy  café\n")).toBe("Student conduct policy caf");
  });
});

describe("inferDocumentType", () => {
  it("maps pdf, docx and doc extensions", () => {
    expect(inferDocumentType("Handbook.PDF")).toBe("pdf");
    expect(inferDocumentType("leave.docx")).toBe("docx");
    expect(inferDocumentType("old-leave.doc")).toBe("docx");
  });

  it("rejects anything else", () => {
    expect(() => inferDocumentType("notes.txt")).toThrow(UnsupportedInputError);
    expect(() => inferDocumentType("notes")).toThrow("Unsupported file format: (none).");
  });
});

describe("JsonPagesParser", () => {
  let dir: string;
  const parser = new JsonPagesParser(() => new Date("2026-03-01T12:00:00.000Z"));

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "policyqa-parser-"));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function write(name: string, content: unknown): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, typeof content === "string" ? content : JSON.stringify(content));
    return file;
  }

  it("reads and normalizes pages, taking the name from the file", async () => {
    const file = await write("leave.pdf.pages.json", {
      pages: [
        { pageNumber: 1, text: "Leave   policy" },
        { pageNumber: 2, text: "" },
      ],
    });

    expect(await parser.parse(file)).toEqual({
      filename: "leave.pdf",
      documentType: "pdf",
      uploadDate: "2026-03-01T12:00:00.000Z",
      pages: [
        { pageNumber: 1, text: "Leave policy", charCount: 12 },
        { pageNumber: 2, text: "", charCount: 0 },
      ],
    });
  });

  it("prefers the filename recorded in the file", async () => {
    const file = await write("export.pages.json", {
      filename: "conduct.docx",
      pages: [{ pageNumber: 1, text: "x" }],
    });

    const parsed = await parser.parse(file);
    expect(parsed.filename).toBe("conduct.docx");
    expect(parsed.documentType).toBe("docx");
    expect(await parser.filenameOf(file)).toBe("conduct.docx");
  });

  it("reports the file's own name when the file records none", async () => {
    const file = await write("rules.pdf.pages.json", { pages: [] });
    expect(await parser.filenameOf(file)).toBe("rules.pdf");
  });

  it("rejects unsupported document types", async () => {
    const file = await write("notes.txt.pages.json", { pages: [] });
    await expect(parser.parse(file)).rejects.toBeInstanceOf(UnsupportedInputError);
  });

  it("rejects malformed page lists", async () => {
    const bad = await write("bad.pdf.pages.json", { pages: [{ pageNumber: 0, text: "x" }] });
    const notJson = await write("broken.pdf.pages.json", "{ pages: ");

    await expect(parser.parse(bad)).rejects.toBeInstanceOf(MalformedServiceResponseError);
    await expect(parser.parse(notJson)).rejects.toBeInstanceOf(MalformedServiceResponseError);
  });

  it("strips the pages suffix from file names", () => {
    expect(sourceFilename("/tmp/a/handbook.pdf.pages.json")).toBe("handbook.pdf");
    expect(sourceFilename("/tmp/a/handbook.pdf")).toBe("handbook.pdf");
  });
});
