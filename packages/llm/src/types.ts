export type CompletionOptions = {
  temperature: number;
  maxTokens: number;
};

export interface LlmService {
  readonly model: string;
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;
