import { ExternalServiceError, MalformedServiceResponseError } from "@policyqa/core";

type OllamaEmbeddingResponse = {
  embedding?: unknown;
};

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export async function ollamaEmbedOne(args: {
  baseUrl: string;
  model: string;
  text: string;
  fetchImpl?: FetchLike;
}): Promise<number[]> {
  const { baseUrl, text } = args;
  const doFetch = args.fetchImpl ?? fetch;

  let res: Response;
  try {
    res = await doFetch(`${baseUrl}/api/embeddings`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        model: args.model.trim(),
        prompt: text,
      }),
    });
  } catch (err) {
    throw new ExternalServiceError("Ollama embeddings", String(err), null, { cause: err });
  }

  if (!res.ok) {
    const body = await res.text().catch(() => "");
    throw new ExternalServiceError(
      "Ollama embeddings",
      `${res.status} ${res.statusText}\n${body}`,
      res.status
    );
  }

  const { embedding } = (await res.json()) as OllamaEmbeddingResponse;

  if (!Array.isArray(embedding) || !embedding.every((v): v is number => typeof v === "number")) {
    throw new MalformedServiceResponseError("Ollama embeddings", "missing `embedding` array");
  }

  return embedding;
}
