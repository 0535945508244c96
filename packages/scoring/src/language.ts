import type {
  AmbiguityCheck,
  CertaintyTier,
  LegalAdviceCheck,
  ModalAnalysis,
  ModalVerbCount,
} from "./types.js";

export const AMBIGUOUS_PHRASES = [
  "it depends",
  "may or may not",
  "unclear",
  "ambiguous",
  "not specified",
  "consult",
  "contact",
  "check with",
] as const;

export const MODAL_VERBS: ReadonlyArray<readonly [string, CertaintyTier]> = [
  ["must", "high_certainty"],
  ["shall", "high_certainty"],
  ["will", "high_certainty"],
  ["required", "high_certainty"],
  ["mandatory", "high_certainty"],
  ["may", "low_certainty"],
  ["might", "low_certainty"],
  ["could", "low_certainty"],
  ["should", "medium_certainty"],
  ["recommended", "medium_certainty"],
];

export const LEGAL_TERMS = [
  "legal action",
  "lawsuit",
  "sue",
  "attorney",
  "lawyer",
  "legal counsel",
  "court",
  "litigation",
] as const;

export const LEGAL_SERVICES_RECOMMENDATION = "Consult legal services office";

/** Case-insensitive substring match; a phrase counts once however often it occurs. */
export function checkAmbiguity(answer: string): AmbiguityCheck {
  const text = answer.toLowerCase();
  const phrases = AMBIGUOUS_PHRASES.filter((p) => text.includes(p));
  return { hasAmbiguity: phrases.length > 0, phrases, count: phrases.length };
}

/**
 * Any high-certainty word makes the answer "high", however many low ones it
 * also has; then "low", then "medium", otherwise "neutral".
 */
export function analyzeModalVerbs(answer: string): ModalAnalysis {
  const text = answer.toLowerCase();
  const modalVerbs: Record<string, ModalVerbCount> = {};

  for (const [word, certainty] of MODAL_VERBS) {
    const count = text.match(new RegExp(`\\b${word}\\b`, "g"))?.length ?? 0;
    if (count > 0) modalVerbs[word] = { count, certainty };
  }

  const tiers = new Set(Object.values(modalVerbs).map((m) => m.certainty));

  let overallCertainty: ModalAnalysis["overallCertainty"] = "neutral";
  if (tiers.has("high_certainty")) overallCertainty = "high";
  else if (tiers.has("low_certainty")) overallCertainty = "low";
  else if (tiers.has("medium_certainty")) overallCertainty = "medium";

  return { modalVerbs, overallCertainty };
}

/** Only terms in the answer raise the flag; query terms are reported alongside. */
export function checkLegalAdvice(answer: string, query: string): LegalAdviceCheck {
  const a = answer.toLowerCase();
  const q = query.toLowerCase();

  const termsInAnswer = LEGAL_TERMS.filter((t) => a.includes(t));
  const termsInQuery = LEGAL_TERMS.filter((t) => q.includes(t));
  const isLegalAdvice = termsInAnswer.length > 0;

  return {
    isLegalAdvice,
    termsInAnswer,
    termsInQuery,
    recommendedOffice: isLegalAdvice ? LEGAL_SERVICES_RECOMMENDATION : null,
  };
}
