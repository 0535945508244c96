import { errorMessage, silentLogger, type Citation, type Logger } from "@policyqa/core";
import type { LlmService } from "@policyqa/llm";

export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_TOKENS = 2000;

const SYSTEM_PROMPT = `You are a helpful assistant that answers questions about university policies and regulations.

Your responsibilities:
1. Answer questions ONLY using the provided document snippets
2. First provide a clear, direct summary in your own words that directly addresses the question
3. Then provide detailed information with explicit inline citations in the format: (filename — page X, para Y)
4. If the answer is not contained in the snippets, respond: "I don't know — please consult the official office" and suggest the appropriate office to contact
5. Be precise and legally accurate
6. Quote relevant policy text when appropriate
7. If information is ambiguous or contradictory, clearly state this

Guidelines:
- Start with a concise summary that directly answers the user's question
- Then provide supporting details with citations
- Always cite your sources inline
- Use professional, clear language
- Never make assumptions beyond the provided text
- If unsure, acknowledge uncertainty

Response Format:
[Brief summary in your own words addressing the question]

[Detailed explanation with citations and relevant policy quotes]`;

export function buildAnswerPrompt(query: string, context: string): string {
  return `${SYSTEM_PROMPT}

Use ONLY the provided snippets below to answer the question. Each snippet includes metadata in this format:
[DOC: {filename} | page: {page} | paragraph: {p}]

IMPORTANT: Structure your answer as follows:
1. Start with a clear, concise summary (2-3 sentences) in your own words that directly answers: "${query}"
2. Then provide detailed information with citations inline like: (filename — page X, para Y)

Snippets:
--- SNIPPETS START ---
${context}
--- SNIPPETS END ---

Question: ${query}

Answer:`;
}

/**
 * Summary is everything before the first blank line. Without one, the first
 * line is the summary and the remaining lines are the details; a one-line
 * answer is both.
 */
export function splitAnswer(text: string): { summary: string; detailedAnswer: string } {
  const blank = text.indexOf("\n\n");
  if (blank !== -1) {
    return { summary: text.slice(0, blank).trim(), detailedAnswer: text.slice(blank + 2).trim() };
  }

  const [first = "", ...rest] = text.split("\n");
  return {
    summary: first.trim(),
    detailedAnswer: rest.length > 0 ? rest.join("\n").trim() : text,
  };
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

export type GeneratedAnswer =
  | {
      status: "ok";
      answer: string;
      summary: string;
      detailedAnswer: string;
      citations: Citation[];
      model: string;
      /** Word-count estimate over prompt and answer. */
      tokensUsed: number;
    }
  | { status: "error"; answer: string; citations: Citation[]; error: string };

export class AnswerGenerator {
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly log: Logger;

  constructor(
    private readonly llm: LlmService,
    opts: { temperature?: number; maxTokens?: number; logger?: Logger } = {}
  ) {
    this.temperature = opts.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = opts.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.log = opts.logger ?? silentLogger;
  }

  get model(): string {
    return this.llm.model;
  }

  /** Never throws: a failed model call comes back as an `error` result. */
  async generateAnswer(query: string, context: string, citations: Citation[]): Promise<GeneratedAnswer> {
    const prompt = buildAnswerPrompt(query, context);

    try {
      const answer = await this.llm.complete(prompt, {
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      });

      return {
        status: "ok",
        answer,
        ...splitAnswer(answer),
        citations,
        model: this.llm.model,
        tokensUsed: wordCount(prompt) + wordCount(answer),
      };
    } catch (err) {
      const error = errorMessage(err);
      this.log.error("answer generation failed", { error });
      return { status: "error", answer: `Error generating answer: ${error}`, citations, error };
    }
  }

  /** At most three questions; `[]` when the model call fails. */
  async generateFollowupQuestions(query: string, answer: string): Promise<string[]> {
    const prompt = `Based on this Q&A about university policies, suggest 3 relevant follow-up questions a student might ask:

Question: ${query}
Answer: ${answer}

Generate 3 short, specific follow-up questions (one per line):`;

    try {
      const reply = await this.llm.complete(prompt, { temperature: 0.7, maxTokens: 200 });
      return parseFollowupQuestions(reply);
    } catch (err) {
      this.log.warn("follow-up questions failed", { error: errorMessage(err) });
      return [];
    }
  }
}

const LIST_MARKER = /^[0-9.)\-• ]+/;

export function parseFollowupQuestions(reply: string): string[] {
  return reply
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && line.includes("?"))
    .map((line) => line.replace(LIST_MARKER, ""))
    .slice(0, 3);
}
