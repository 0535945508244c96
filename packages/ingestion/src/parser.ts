import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { MalformedServiceResponseError, type ParsedDocument } from "@policyqa/core";
import { inferDocumentType } from "./documentType.js";
import { normalizePageText } from "./normalize.js";

/**
 * Text extraction (PDF/DOCX, OCR fallback) happens outside this repo.
 * A parser turns a file into normalized, page-indexed text.
 */
export interface DocumentParser {
  /** The filename `parse` will report, which decides the document type. */
  filenameOf(filePath: string): Promise<string>;
  parse(filePath: string): Promise<ParsedDocument>;
}

export const PAGES_SUFFIX = ".pages.json";

const PagesFileSchema = z.object({
  filename: z.string().min(1).optional(),
  pages: z.array(
    z.object({
      pageNumber: z.number().int().min(1),
      text: z.string(),
    })
  ),
});

type PagesFile = z.infer<typeof PagesFileSchema>;

/**
 * Reads the output of an external extractor saved as `<document>.pages.json`,
 * e.g. `handbook.pdf.pages.json`:
 *
 *   { "filename": "handbook.pdf", "pages": [{ "pageNumber": 1, "text": "..." }] }
 *
 * The `filename` field wins over the file's own name.
 */
export class JsonPagesParser implements DocumentParser {
  constructor(private readonly now: () => Date = () => new Date()) {}

  async filenameOf(filePath: string): Promise<string> {
    const file = await this.read(filePath);
    return file.filename ?? sourceFilename(filePath);
  }

  async parse(filePath: string): Promise<ParsedDocument> {
    const file = await this.read(filePath);
    const filename = file.filename ?? sourceFilename(filePath);

    return {
      filename,
      documentType: inferDocumentType(filename),
      uploadDate: this.now().toISOString(),
      pages: file.pages.map((p) => {
        const text = normalizePageText(p.text);
        return { pageNumber: p.pageNumber, text, charCount: text.length };
      }),
    };
  }

  private async read(filePath: string): Promise<PagesFile> {
    const raw = await fs.readFile(filePath, "utf8");

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new MalformedServiceResponseError("document parser", `${filePath} is not valid JSON`);
    }

    const parsed = PagesFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new MalformedServiceResponseError(
        "document parser",
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
      );
    }
    return parsed.data;
  }
}

export function sourceFilename(filePath: string): string {
  const base = path.basename(filePath);
  return base.endsWith(PAGES_SUFFIX) ? base.slice(0, -PAGES_SUFFIX.length) : base;
}
