import { silentLogger, type DocumentType, type Logger, type MetadataFilter, type RetrievedChunk } from "@policyqa/core";
import type { EmbeddingService } from "@policyqa/embeddings";
import type { VectorStore } from "@policyqa/vectorstore";

export const DEFAULT_TOP_K = 7;

export type RetrieveOptions = {
  topK?: number;
  filterByDocument?: string;
  filterByType?: DocumentType;
};

/** Re-orders ranked chunks for a query, e.g. with a cross-encoder. */
export type Reranker = (chunks: RetrievedChunk[], query: string) => RetrievedChunk[];

export const identityReranker: Reranker = (chunks) => chunks;

export class Retriever {
  private readonly defaultTopK: number;
  private readonly reranker: Reranker;
  private readonly log: Logger;

  constructor(
    private readonly deps: {
      embeddings: EmbeddingService;
      store: VectorStore;
      defaultTopK?: number;
      reranker?: Reranker;
      logger?: Logger;
    }
  ) {
    this.defaultTopK = deps.defaultTopK ?? DEFAULT_TOP_K;
    this.reranker = deps.reranker ?? identityReranker;
    this.log = deps.logger ?? silentLogger;
  }

  /**
   * Nearest chunks first, as ordered by the store. Filters go to the store
   * as one conjunctive filter.
   *
   * `similarityScore` is `1 - distance`, which only reads as a similarity
   * for cosine distance; it turns negative for distances above 1.
   * An empty result means no evidence, not a failure.
   */
  async retrieve(query: string, opts?: RetrieveOptions): Promise<RetrievedChunk[]> {
    const topK = opts?.topK ?? this.defaultTopK;

    const vector = await this.deps.embeddings.embed(query);

    const filter: MetadataFilter = {};
    if (opts?.filterByDocument) filter.filename = opts.filterByDocument;
    if (opts?.filterByType) filter.documentType = opts.filterByType;

    const matches = this.deps.store.query({
      vector,
      k: topK,
      ...(Object.keys(filter).length > 0 && { filter }),
    });

    this.log.debug("retrieved", { topK, filter, matches: matches.length });

    return matches.map((m) => ({ ...m, similarityScore: 1 - m.distance }));
  }

  rerank(chunks: RetrievedChunk[], query: string): RetrievedChunk[] {
    return this.reranker(chunks, query);
  }
}
