import { MalformedServiceResponseError } from "@policyqa/core";
import { ollamaEmbedOne, type FetchLike } from "./ollama.js";

export { ollamaEmbedOne, type FetchLike } from "./ollama.js";

export const DEFAULT_MODEL = "nomic-embed-text:latest";

export interface EmbeddingService {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

/** Every vector in a batch must share the first one's dimension. */
export function assertSameDimension(vectors: number[][]): number {
  const dim = vectors[0]?.length ?? 0;
  for (const v of vectors) {
    if (v.length !== dim) {
      throw new MalformedServiceResponseError(
        "embedding service",
        `inconsistent embedding dimension: expected ${dim}, got ${v.length}`
      );
    }
  }
  return dim;
}

export class OllamaEmbeddingService implements EmbeddingService {
  private readonly model: string;

  constructor(
    private readonly opts: { baseUrl: string; model?: string; fetchImpl?: FetchLike }
  ) {
    this.model = opts.model ?? DEFAULT_MODEL;
  }

  embed(text: string): Promise<number[]> {
    return ollamaEmbedOne({
      baseUrl: this.opts.baseUrl,
      model: this.model,
      text,
      ...(this.opts.fetchImpl && { fetchImpl: this.opts.fetchImpl }),
    });
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    // Ollama's /api/embeddings takes one prompt per call
    const vectors: number[][] = [];
    for (const text of texts) {
      vectors.push(await this.embed(text));
    }

    assertSameDimension(vectors);
    return vectors;
  }
}
