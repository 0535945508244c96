import { errorMessage, silentLogger, type Logger, type RetrievedChunk } from "@policyqa/core";
import type { LlmService } from "@policyqa/llm";
import { labeledLineParser, type ContradictionResponseParser } from "./contradictionParser.js";
import type { ContradictionCheck, HeuristicContradictionCheck } from "./types.js";

export interface ContradictionChecker {
  readonly mode: ContradictionCheck["mode"];
  check(answer: string, chunks: RetrievedChunk[]): Promise<ContradictionCheck>;
}

export const MAX_COMPARED_CHUNKS = 5;

/**
 * Never reports a contradiction. Chunks from more than one file lower the
 * confidence to 0.8 as a source-diversity signal.
 */
export function heuristicContradictionCheck(chunks: RetrievedChunk[]): HeuristicContradictionCheck {
  const sources = [...new Set(chunks.map((c) => c.metadata.filename))];
  const multipleSources = chunks.length >= 2 && sources.length > 1;

  return {
    mode: "heuristic",
    hasContradictions: false,
    multipleSources,
    sourceCount: sources.length,
    sources,
    confidence: multipleSources ? 0.8 : 1.0,
  };
}

export class HeuristicContradictionChecker implements ContradictionChecker {
  readonly mode = "heuristic" as const;

  async check(_answer: string, chunks: RetrievedChunk[]): Promise<ContradictionCheck> {
    return heuristicContradictionCheck(chunks);
  }
}

export function buildContradictionPrompt(answer: string, chunks: RetrievedChunk[]): string {
  const chunksText = chunks
    .slice(0, MAX_COMPARED_CHUNKS)
    .map(
      (c, i) =>
        `Source ${i + 1} (${c.metadata.filename}, page ${c.metadata.pageNumber}):\n${c.text}`
    )
    .join("\n\n");

  return `You are a policy-checker assistant. Given an answer and its supporting snippets, detect if there are contradictions across snippets.

Answer: ${answer}

Supporting snippets:
${chunksText}

Analyze:
1. Are there contradictions between the snippets?
2. Do the snippets provide conflicting information?
3. Is the answer consistent with all snippets?

Respond in this format:
HAS_CONTRADICTIONS: [YES/NO]
CONFIDENCE: [0.0-1.0]
EXPLANATION: [brief explanation]`;
}

/**
 * Asks the model to compare the answer with its first five chunks. Fewer than
 * two chunks, or any failure of the call, gives the heuristic result instead.
 */
export class LlmContradictionChecker implements ContradictionChecker {
  readonly mode = "llm" as const;
  private readonly parser: ContradictionResponseParser;
  private readonly log: Logger;

  constructor(
    private readonly llm: LlmService,
    opts?: { parser?: ContradictionResponseParser; logger?: Logger }
  ) {
    this.parser = opts?.parser ?? labeledLineParser;
    this.log = opts?.logger ?? silentLogger;
  }

  async check(answer: string, chunks: RetrievedChunk[]): Promise<ContradictionCheck> {
    if (chunks.length < 2) return heuristicContradictionCheck(chunks);

    try {
      const reply = await this.llm.complete(buildContradictionPrompt(answer, chunks), {
        temperature: 0.1,
        maxTokens: 300,
      });
      return { mode: "llm", ...this.parser.parse(reply) };
    } catch (err) {
      this.log.warn("contradiction check failed, using heuristic", { error: errorMessage(err) });
      return heuristicContradictionCheck(chunks);
    }
  }
}

/** Picks the strategy once: the model-backed checker when a service is available. */
export function createContradictionChecker(
  llm: LlmService | null | undefined,
  opts?: { parser?: ContradictionResponseParser; logger?: Logger }
): ContradictionChecker {
  return llm ? new LlmContradictionChecker(llm, opts) : new HeuristicContradictionChecker();
}
