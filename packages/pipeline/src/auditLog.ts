import { promises as fs } from "node:fs";
import path from "node:path";

export type AuditEntry =
  | { type: "document_upload"; jobId: string; filename: string; chunks: number; timestamp: string }
  | { type: "query"; query: string; answer: string; confidence: number; chunksUsed: number; timestamp: string }
  | {
      type: "user_feedback";
      query: string;
      answer: string;
      isCorrect: boolean;
      comment: string | null;
      timestamp: string;
    };

export interface AuditLog {
  record(entry: AuditEntry): Promise<void>;
}

/** Appends one JSON object per line; never rewrites earlier entries. */
export class JsonlAuditLog implements AuditLog {
  constructor(readonly filePath: string) {}

  async record(entry: AuditEntry): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, `${JSON.stringify(entry)}\n`, "utf8");
  }

  async readAll(): Promise<AuditEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    return raw
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line) => JSON.parse(line) as AuditEntry);
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export const noopAuditLog: AuditLog = {
  record: async () => {},
};
