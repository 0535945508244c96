import { errorMessage, silentLogger, type Logger } from "@policyqa/core";
import { formatContext, getCitations, type Retriever } from "@policyqa/retrieval";
import type { PolicyScorer } from "@policyqa/scoring";
import type { AnswerGenerator } from "./answerGenerator.js";
import { noopAuditLog, type AuditLog } from "./auditLog.js";
import type { QueryRequest, QueryResult } from "./types.js";

export const NO_EVIDENCE_ANSWER =
  "I don't have any information to answer this question. Please upload relevant policy documents first.";

export function noEvidenceResult(): QueryResult {
  return {
    answer: NO_EVIDENCE_ANSWER,
    summary: NO_EVIDENCE_ANSWER,
    detailedAnswer: "",
    citations: [],
    confidenceScore: 0,
    warnings: ["No relevant documents found"],
    recommendations: ["Upload university policy documents to get started"],
    followupQuestions: [],
    metadata: { chunksRetrieved: 0 },
  };
}

/**
 * retrieve -> (rerank) -> context + citations -> generate -> score ->
 * follow-ups -> audit. One call per query; nothing is shared between calls.
 */
export class QuestionAnswerer {
  private readonly audit: AuditLog;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      retriever: Retriever;
      generator: AnswerGenerator;
      scorer: PolicyScorer;
      audit?: AuditLog;
      logger?: Logger;
      now?: () => Date;
    }
  ) {
    this.audit = deps.audit ?? noopAuditLog;
    this.log = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async ask(request: QueryRequest): Promise<QueryResult> {
    const { query } = request;

    const retrieved = await this.deps.retriever.retrieve(query, {
      ...(request.topK !== undefined && { topK: request.topK }),
      ...(request.filterByDocument !== undefined && { filterByDocument: request.filterByDocument }),
      ...(request.filterByType !== undefined && { filterByType: request.filterByType }),
    });

    if (retrieved.length === 0) {
      this.log.info("no evidence", { query });
      return noEvidenceResult();
    }

    const chunks = this.deps.retriever.rerank(retrieved, query);
    const context = formatContext(chunks);
    const citations = getCitations(chunks);

    const generated = await this.deps.generator.generateAnswer(query, context, citations);
    const report = await this.deps.scorer.score(generated.answer, chunks, query);
    const followupQuestions = await this.deps.generator.generateFollowupQuestions(query, generated.answer);

    try {
      await this.audit.record({
        type: "query",
        query,
        answer: generated.answer,
        confidence: report.confidenceScore,
        chunksUsed: chunks.length,
        timestamp: this.now().toISOString(),
      });
    } catch (err) {
      this.log.warn("audit log write failed", { error: errorMessage(err) });
    }

    const ok = generated.status === "ok";

    return {
      answer: generated.answer,
      summary: ok ? generated.summary : "",
      detailedAnswer: ok ? generated.detailedAnswer : "",
      citations: generated.citations,
      confidenceScore: report.confidenceScore,
      warnings: report.warnings,
      recommendations: report.recommendations,
      followupQuestions,
      metadata: {
        chunksRetrieved: chunks.length,
        tokensUsed: ok ? generated.tokensUsed : 0,
        model: ok ? generated.model : "unknown",
        policyChecks: {
          ambiguity: report.ambiguity,
          modalVerbs: report.modalAnalysis,
          contradictions: report.contradiction,
          legalAdvice: report.legalAdvice,
        },
      },
    };
  }

  async submitFeedback(feedback: {
    query: string;
    answer: string;
    isCorrect: boolean;
    comment?: string;
  }): Promise<void> {
    await this.audit.record({
      type: "user_feedback",
      query: feedback.query,
      answer: feedback.answer,
      isCorrect: feedback.isCorrect,
      comment: feedback.comment ?? null,
      timestamp: this.now().toISOString(),
    });
  }
}
