import type {
  AmbiguityCheck,
  ContradictionCheck,
  LegalAdviceCheck,
  ModalAnalysis,
} from "./types.js";

export type ScoringChecks = {
  ambiguity: AmbiguityCheck;
  modalAnalysis: ModalAnalysis;
  contradiction: ContradictionCheck;
  legalAdvice: LegalAdviceCheck;
};

export const PENALTIES = {
  perAmbiguousPhrase: 0.15,
  lowCertainty: 0.2,
  mediumCertainty: 0.1,
  contradictions: 0.3,
  legalAdvice: 0.2,
} as const;

export const LOW_CONFIDENCE_THRESHOLD = 0.5;

/**
 * Additive penalties from 1.0, clamped to [0, 1] and rounded to two decimals.
 * Penalties can overlap (hedged wording often trips both ambiguity and low
 * certainty); they are summed as they are.
 */
export function calculateConfidence(checks: ScoringChecks): number {
  let confidence = 1.0;

  confidence -= PENALTIES.perAmbiguousPhrase * checks.ambiguity.count;

  if (checks.modalAnalysis.overallCertainty === "low") confidence -= PENALTIES.lowCertainty;
  else if (checks.modalAnalysis.overallCertainty === "medium") confidence -= PENALTIES.mediumCertainty;

  if (checks.contradiction.hasContradictions) confidence -= PENALTIES.contradictions;
  if (checks.legalAdvice.isLegalAdvice) confidence -= PENALTIES.legalAdvice;

  confidence = Math.max(0, Math.min(1, confidence));
  return Math.round(confidence * 100) / 100;
}

export const WARNINGS = {
  ambiguity: "This answer contains ambiguous language. Consider consulting official sources.",
  lowCertainty: "The policy contains language indicating flexibility or uncertainty.",
  contradictions: "Potential contradictions detected across source documents.",
  legalAdvice: "This topic may involve legal matters. Consult the legal services office.",
  lowConfidence: "Low confidence answer. Please verify with official university office.",
} as const;

export function generateWarnings(checks: ScoringChecks, confidenceScore: number): string[] {
  const warnings: string[] = [];

  if (checks.ambiguity.hasAmbiguity) warnings.push(WARNINGS.ambiguity);
  if (checks.modalAnalysis.overallCertainty === "low") warnings.push(WARNINGS.lowCertainty);
  if (checks.contradiction.hasContradictions) warnings.push(WARNINGS.contradictions);
  if (checks.legalAdvice.isLegalAdvice) warnings.push(WARNINGS.legalAdvice);
  if (confidenceScore < LOW_CONFIDENCE_THRESHOLD) warnings.push(WARNINGS.lowConfidence);

  return warnings;
}

export function generateRecommendations(checks: ScoringChecks): string[] {
  const recommendations: string[] = [];

  if (checks.ambiguity.hasAmbiguity) {
    recommendations.push("Contact the relevant university department for clarification.");
  }

  const c = checks.contradiction;
  if (c.mode === "heuristic" && c.multipleSources) {
    recommendations.push(
      `This answer references ${c.sourceCount} different policy documents. Review all sources for complete information.`
    );
  }

  if (checks.legalAdvice.isLegalAdvice) {
    recommendations.push("Speak with the university legal services office for legal matters.");
  }

  return recommendations;
}
