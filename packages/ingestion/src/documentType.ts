import crypto from "node:crypto";
import path from "node:path";
import { UnsupportedInputError, type DocumentId, type DocumentType } from "@policyqa/core";

const EXTENSIONS: Record<string, DocumentType> = {
  ".pdf": "pdf",
  ".docx": "docx",
  ".doc": "docx",
};

export function inferDocumentType(filename: string): DocumentType {
  const ext = path.extname(filename).toLowerCase();
  const type = EXTENSIONS[ext];
  if (!type) throw new UnsupportedInputError(ext);
  return type;
}

/** Stable per filename, so a re-upload overwrites the same chunk ids. */
export function documentIdFor(filename: string): DocumentId {
  return crypto.createHash("md5").update(filename).digest("hex").slice(0, 16);
}
