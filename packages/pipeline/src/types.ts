import type { Citation, DocumentType } from "@policyqa/core";
import type { AmbiguityCheck, ContradictionCheck, LegalAdviceCheck, ModalAnalysis } from "@policyqa/scoring";

export type QueryRequest = {
  query: string;
  topK?: number;
  /** Restricts retrieval to one filename. */
  filterByDocument?: string;
  filterByType?: DocumentType;
};

export type PolicyChecks = {
  ambiguity: AmbiguityCheck;
  modalVerbs: ModalAnalysis;
  contradictions: ContradictionCheck;
  legalAdvice: LegalAdviceCheck;
};

export type QueryMetadata = {
  chunksRetrieved: number;
  tokensUsed?: number;
  model?: string;
  policyChecks?: PolicyChecks;
};

export type QueryResult = {
  answer: string;
  summary: string;
  detailedAnswer: string;
  citations: Citation[];
  confidenceScore: number;
  warnings: string[];
  recommendations: string[];
  followupQuestions: string[];
  metadata: QueryMetadata;
};

export type JobRecord =
  | { jobId: string; filename: string; status: "processing"; startedAt: string }
  | {
      jobId: string;
      filename: string;
      status: "completed";
      startedAt: string;
      completedAt: string;
      chunksCreated: number;
    }
  | { jobId: string; filename: string; status: "failed"; startedAt: string; failedAt: string; error: string };

export type JobStatus = JobRecord["status"];

export type JobCounts = Record<JobStatus, number> & { total: number };
