export interface AmbiguityCheck {
  hasAmbiguity: boolean;
  phrases: string[];
  count: number;
}

export type CertaintyTier = "high_certainty" | "medium_certainty" | "low_certainty";
export type OverallCertainty = "neutral" | "low" | "medium" | "high";

export interface ModalVerbCount {
  count: number;
  certainty: CertaintyTier;
}

export interface ModalAnalysis {
  /** Only modal words that occur in the answer. */
  modalVerbs: Record<string, ModalVerbCount>;
  overallCertainty: OverallCertainty;
}

export interface LegalAdviceCheck {
  isLegalAdvice: boolean;
  termsInAnswer: string[];
  termsInQuery: string[];
  recommendedOffice: string | null;
}

export interface HeuristicContradictionCheck {
  mode: "heuristic";
  hasContradictions: false;
  multipleSources: boolean;
  sourceCount: number;
  sources: string[];
  confidence: number;
}

export interface LlmContradictionCheck {
  mode: "llm";
  hasContradictions: boolean;
  confidence: number;
  explanation: string;
}

export type ContradictionCheck = HeuristicContradictionCheck | LlmContradictionCheck;

export interface ConfidenceReport {
  ambiguity: AmbiguityCheck;
  modalAnalysis: ModalAnalysis;
  contradiction: ContradictionCheck;
  legalAdvice: LegalAdviceCheck;
  /** In [0, 1], two decimals. Rule-based, not a probability. */
  confidenceScore: number;
  warnings: string[];
  recommendations: string[];
}
