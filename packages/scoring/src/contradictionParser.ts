export const DEFAULT_CONTRADICTION_CONFIDENCE = 0.7;

export type ParsedContradictionResponse = {
  hasContradictions: boolean;
  confidence: number;
  explanation: string;
};

/** Turns the checker model's reply into a verdict. Must not throw. */
export interface ContradictionResponseParser {
  parse(text: string): ParsedContradictionResponse;
}

function valueAfterColon(line: string | undefined): string | null {
  if (line === undefined) return null;
  const idx = line.indexOf(":");
  return idx === -1 ? null : line.slice(idx + 1).trim();
}

/**
 * Reads the three-line reply the contradiction prompt asks for:
 *
 *   HAS_CONTRADICTIONS: YES|NO
 *   CONFIDENCE: 0.0-1.0
 *   EXPLANATION: ...
 *
 * "YES" anywhere on the first line is a contradiction. A missing or
 * non-numeric confidence falls back to 0.7; a missing explanation is "".
 */
export const labeledLineParser: ContradictionResponseParser = {
  parse(text) {
    const lines = text.split("\n");

    const hasContradictions = (lines[0] ?? "").includes("YES");

    const rawConfidence = valueAfterColon(lines.find((l) => l.includes("CONFIDENCE")));
    const parsed = rawConfidence === null || rawConfidence === "" ? NaN : Number(rawConfidence);
    const confidence = Number.isFinite(parsed) ? parsed : DEFAULT_CONTRADICTION_CONFIDENCE;

    const explanation = valueAfterColon(lines.find((l) => l.includes("EXPLANATION"))) ?? "";

    return { hasContradictions, confidence, explanation };
  },
};
