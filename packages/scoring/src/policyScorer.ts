import { silentLogger, type Logger, type RetrievedChunk } from "@policyqa/core";
import type { LlmService } from "@policyqa/llm";
import { analyzeModalVerbs, checkAmbiguity, checkLegalAdvice } from "./language.js";
import { createContradictionChecker, type ContradictionChecker } from "./contradiction.js";
import type { ContradictionResponseParser } from "./contradictionParser.js";
import { calculateConfidence, generateRecommendations, generateWarnings } from "./confidence.js";
import type { ConfidenceReport } from "./types.js";

export type PolicyScorerOptions = {
  /** Enables the model-backed contradiction check. */
  llm?: LlmService | null;
  contradictionChecker?: ContradictionChecker;
  parser?: ContradictionResponseParser;
  logger?: Logger;
};

/**
 * Scores how far a generated answer can be trusted. Keeps no state between
 * calls; the contradiction strategy is fixed at construction.
 */
export class PolicyScorer {
  readonly contradictionChecker: ContradictionChecker;
  private readonly log: Logger;

  constructor(opts: PolicyScorerOptions = {}) {
    this.log = opts.logger ?? silentLogger;
    this.contradictionChecker =
      opts.contradictionChecker ??
      createContradictionChecker(opts.llm, {
        logger: this.log,
        ...(opts.parser && { parser: opts.parser }),
      });
  }

  async score(answer: string, chunks: RetrievedChunk[], query: string): Promise<ConfidenceReport> {
    const ambiguity = checkAmbiguity(answer);
    const modalAnalysis = analyzeModalVerbs(answer);
    const legalAdvice = checkLegalAdvice(answer, query);
    const contradiction = await this.contradictionChecker.check(answer, chunks);

    const checks = { ambiguity, modalAnalysis, contradiction, legalAdvice };
    const confidenceScore = calculateConfidence(checks);

    this.log.debug("scored answer", {
      confidenceScore,
      certainty: modalAnalysis.overallCertainty,
      contradictionMode: contradiction.mode,
    });

    return {
      ...checks,
      confidenceScore,
      warnings: generateWarnings(checks, confidenceScore),
      recommendations: generateRecommendations(checks),
    };
  }
}
