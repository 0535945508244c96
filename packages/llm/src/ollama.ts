import { ExternalServiceError, MalformedServiceResponseError } from "@policyqa/core";
import type { CompletionOptions, FetchLike, LlmService } from "./types.js";

type OllamaGenerateResponse = {
  response?: unknown;
};

export class OllamaLlmService implements LlmService {
  readonly model: string;
  private readonly doFetch: FetchLike;

  constructor(private readonly opts: { baseUrl: string; model: string; fetchImpl?: FetchLike }) {
    this.model = opts.model;
    this.doFetch = opts.fetchImpl ?? fetch;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    let res: Response;
    try {
      res = await this.doFetch(`${this.opts.baseUrl}/api/generate`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          prompt,
          stream: false,
          options: { temperature: options.temperature, num_predict: options.maxTokens },
        }),
      });
    } catch (err) {
      throw new ExternalServiceError("Ollama generate", String(err), null, { cause: err });
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new ExternalServiceError("Ollama generate", `${res.status} ${res.statusText}\n${text}`, res.status);
    }

    const data = (await res.json()) as OllamaGenerateResponse;
    if (typeof data.response !== "string") {
      throw new MalformedServiceResponseError("Ollama generate", "missing `response` text");
    }
    return data.response;
  }
}
