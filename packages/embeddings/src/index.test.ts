import { describe, it, expect, vi } from "vitest";
import { ExternalServiceError, MalformedServiceResponseError } from "@policyqa/core";
import { OllamaEmbeddingService, type FetchLike } from "./index.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("OllamaEmbeddingService", () => {
  it("embeds each text with one request and keeps the order", async () => {
    const vectors: Record<string, number[]> = { first: [1, 0], second: [0, 1] };
    const fetchImpl = vi.fn<FetchLike>(async (_url, init) => {
      const body = JSON.parse(String(init.body)) as { model: string; prompt: string };
      return jsonResponse({ embedding: vectors[body.prompt] });
    });

    const service = new OllamaEmbeddingService({
      baseUrl: "http://ollama.test",
      model: " nomic-embed-text ",
      fetchImpl,
    });

    expect(await service.embedBatch(["first", "second"])).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);

    const [url, init] = fetchImpl.mock.calls[0]!;
    expect(url).toBe("http://ollama.test/api/embeddings");
    expect(JSON.parse(String(init.body))).toEqual({ model: "nomic-embed-text", prompt: "first" });
  });

  it("returns an empty batch without calling the service", async () => {
    const fetchImpl = vi.fn<FetchLike>();
    const service = new OllamaEmbeddingService({ baseUrl: "http://ollama.test", fetchImpl });

    expect(await service.embedBatch([])).toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("raises an ExternalServiceError carrying the HTTP status", async () => {
    const service = new OllamaEmbeddingService({
      baseUrl: "http://ollama.test",
      fetchImpl: async () => new Response("model not found", { status: 404, statusText: "Not Found" }),
    });

    const err = await service.embed("x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalServiceError);
    if (err instanceof ExternalServiceError) {
      expect(err.status).toBe(404);
      expect(err.message).toContain("model not found");
    }
  });

  it("wraps network failures", async () => {
    const service = new OllamaEmbeddingService({
      baseUrl: "http://ollama.test",
      fetchImpl: async () => {
        throw new TypeError("fetch failed");
      },
    });

    await expect(service.embed("x")).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it("rejects responses without a numeric embedding", async () => {
    const service = new OllamaEmbeddingService({
      baseUrl: "http://ollama.test",
      fetchImpl: async () => jsonResponse({ embedding: ["a"] }),
    });

    await expect(service.embed("x")).rejects.toBeInstanceOf(MalformedServiceResponseError);
  });

  it("rejects batches of mixed dimensions", async () => {
    let call = 0;
    const service = new OllamaEmbeddingService({
      baseUrl: "http://ollama.test",
      fetchImpl: async () => jsonResponse({ embedding: call++ === 0 ? [1, 2, 3] : [1, 2] }),
    });

    await expect(service.embedBatch(["a", "b"])).rejects.toThrow(/expected 3, got 2/);
  });
});
