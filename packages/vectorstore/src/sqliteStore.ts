import Database from "better-sqlite3";
import type {
  ChunkMetadata,
  DocumentSummary,
  DocumentType,
  EmbeddedChunk,
  MetadataFilter,
  VectorMatch,
} from "@policyqa/core";
import { chunkKey, toChunkMetadata, type VectorStore } from "./store.js";

export const DEFAULT_COLLECTION = "university_policies";

type SqlRow = {
  chunk_key: string;
  text: string;
  metadata_json: string;
  vector_json: string;
};

type DocumentRow = {
  document_id: string;
  filename: string;
  document_type: DocumentType;
  chunk_count: number;
};

const FILTER_COLUMNS = {
  documentId: "document_id",
  filename: "filename",
  documentType: "document_type",
} as const satisfies Record<keyof MetadataFilter, string>;

const FILTER_KEYS = ["documentId", "filename", "documentType"] as const;

function whereFilter(filter: MetadataFilter): { sql: string; values: string[] } {
  const clauses: string[] = [];
  const values: string[] = [];

  for (const key of FILTER_KEYS) {
    const value = filter[key];
    if (value === undefined) continue;
    clauses.push(`${FILTER_COLUMNS[key]} = ?`);
    values.push(value);
  }

  return { sql: clauses.map((c) => ` AND ${c}`).join(""), values };
}

/**
 * Brute-force cosine search over vectors kept as JSON in SQLite.
 * `distance` is cosine distance (1 - cosine similarity), in [0, 2].
 */
export class SqliteVectorStore implements VectorStore {
  private db: Database.Database;

  constructor(
    private readonly dbPath: string,
    private readonly collection: string = DEFAULT_COLLECTION
  ) {
    this.db = new Database(dbPath);
  }

  init(): void {
    if (this.dbPath !== ":memory:") this.db.exec(`PRAGMA journal_mode = WAL;`);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chunks (
        chunk_key TEXT NOT NULL,
        collection TEXT NOT NULL,
        document_id TEXT NOT NULL,
        filename TEXT NOT NULL,
        document_type TEXT NOT NULL,
        text TEXT NOT NULL,
        metadata_json TEXT NOT NULL,
        vector_json TEXT NOT NULL,
        PRIMARY KEY (collection, chunk_key)
      );
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_chunks_document
      ON chunks(collection, document_id);
    `);
  }

  upsert(params: { id: string; vector: number[]; text: string; metadata: ChunkMetadata }): void {
    this.upsertRows([params]);
  }

  upsertEmbeddedChunks(items: EmbeddedChunk[]): void {
    this.upsertRows(
      items.map(({ chunk, vector }) => ({
        id: chunkKey(chunk),
        vector,
        text: chunk.text,
        metadata: toChunkMetadata(chunk),
      }))
    );
  }

  private upsertRows(
    rows: Array<{ id: string; vector: number[]; text: string; metadata: ChunkMetadata }>
  ): void {
    const stmt = this.db.prepare(`
      INSERT INTO chunks (chunk_key, collection, document_id, filename, document_type, text, metadata_json, vector_json)
      VALUES (@chunk_key, @collection, @document_id, @filename, @document_type, @text, @metadata_json, @vector_json)
      ON CONFLICT(collection, chunk_key) DO UPDATE SET
        document_id = excluded.document_id,
        filename = excluded.filename,
        document_type = excluded.document_type,
        text = excluded.text,
        metadata_json = excluded.metadata_json,
        vector_json = excluded.vector_json;
    `);

    const tx = this.db.transaction((items: typeof rows) => {
      for (const it of items) {
        stmt.run({
          chunk_key: it.id,
          collection: this.collection,
          document_id: it.metadata.documentId,
          filename: it.metadata.filename,
          document_type: it.metadata.documentType,
          text: it.text,
          metadata_json: JSON.stringify(it.metadata),
          vector_json: JSON.stringify(it.vector),
        });
      }
    });

    tx(rows);
  }

  query(params: { vector: number[]; k: number; filter?: MetadataFilter }): VectorMatch[] {
    if (params.k <= 0) return [];

    const where = whereFilter(params.filter ?? {});
    const rows = this.db
      .prepare(
        `
        SELECT chunk_key, text, metadata_json, vector_json
        FROM chunks
        WHERE collection = ?${where.sql}
        ORDER BY rowid
      `
      )
      .all(this.collection, ...where.values) as SqlRow[];

    const scored: VectorMatch[] = rows.map((row) => {
      const vector = JSON.parse(row.vector_json) as number[];
      return {
        id: row.chunk_key,
        text: row.text,
        metadata: JSON.parse(row.metadata_json) as ChunkMetadata,
        distance: 1 - cosineSimilarity(params.vector, vector),
      };
    });

    scored.sort((a, b) => a.distance - b.distance);
    return scored.slice(0, params.k);
  }

  delete(filter: MetadataFilter): number {
    const where = whereFilter(filter);
    if (where.values.length === 0) {
      throw new Error("delete() needs at least one metadata filter; use clear() to empty the collection");
    }

    const result = this.db
      .prepare(`DELETE FROM chunks WHERE collection = ?${where.sql}`)
      .run(this.collection, ...where.values);
    return result.changes;
  }

  clear(): number {
    return this.db.prepare(`DELETE FROM chunks WHERE collection = ?`).run(this.collection).changes;
  }

  count(): number {
    const row = this.db
      .prepare(`SELECT COUNT(*) AS n FROM chunks WHERE collection = ?`)
      .get(this.collection) as { n: number };
    return row.n;
  }

  listDocuments(): DocumentSummary[] {
    const rows = this.db
      .prepare(
        `
        SELECT document_id, filename, document_type, COUNT(*) AS chunk_count
        FROM chunks
        WHERE collection = ?
        GROUP BY document_id
        ORDER BY MIN(rowid)
      `
      )
      .all(this.collection) as DocumentRow[];

    return rows.map((r) => ({
      documentId: r.document_id,
      filename: r.filename,
      documentType: r.document_type,
      chunkCount: r.chunk_count,
    }));
  }

  close(): void {
    this.db.close();
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;

  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    na += av * av;
    nb += bv * bv;
  }

  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}
