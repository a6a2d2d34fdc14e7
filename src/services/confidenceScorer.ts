import { ConfidenceLevel, ValidationReport } from "../types";
import { countWords } from "./responseValidator";

const validationWeight = 0.5;
const lengthWeight = 0.2;
const citationWeight = 0.3;

// Responses of this many words or more get the full length score.
const fullLengthWords = 200;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

// Rounds the stored double itself, so 0.745 (held as 0.74499...) becomes 0.74.
const roundTo2 = (value: number): number => Number(value.toFixed(2));

export const lengthScore = (text: string): number => Math.min(countWords(text) / fullLengthWords, 1);

export const citationScore = (text: string): number => (text.includes('"') || text.includes("'") ? 0.8 : 0.6);

/**
 * Blends the validator's partial confidence with length and citation signals
 * into the final score.
 */
export const calculateConfidence = (response: unknown, validation: ValidationReport): number => {
  const text = typeof response === "string" ? response : String(response);
  const blended =
    clamp01(validation.confidence) * validationWeight +
    lengthScore(text) * lengthWeight +
    citationScore(text) * citationWeight;

  return roundTo2(clamp01(blended));
};

export const getConfidenceLevel = (confidence: number): ConfidenceLevel => {
  if (confidence >= 0.85) return "Very High";
  if (confidence >= 0.7) return "High";
  if (confidence >= 0.5) return "Medium";
  return "Low";
};
