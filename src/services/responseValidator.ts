import { ValidationReport, ValidationStatus } from "../types";
import {
  contradictionClausePattern,
  hallucinationPatterns,
  maxContradictionIssues,
  patternCategories,
  quoteCharacterPattern
} from "./hallucinationPatterns";

const patternPenalty = 0.15;
const contradictionPenalty = 0.1;
const shortResponsePenalty = 0.2;
const missingQuotePenalty = 0.05;

const minWordCount = 20;
const quoteCheckMinChars = 200;

export const countWords = (text: string): number => text.split(/\s+/).filter(Boolean).length;

export const countCharacters = (text: string): number => [...text].length;

const toText = (response: unknown): string => (typeof response === "string" ? response : String(response));

const classify = (issueCount: number): ValidationStatus => {
  if (issueCount > 3) return "failed";
  if (issueCount > 0) return "flagged";
  return "passed";
};

/**
 * Screens a response for hallucination indicators. Each issue lowers the
 * partial confidence by a fixed weight; the issue list keeps check order.
 */
export const validateResponse = (response: unknown): ValidationReport => {
  const text = toText(response);
  const issues: string[] = [];
  let confidence = 1.0;

  for (const category of patternCategories) {
    for (const pattern of hallucinationPatterns[category]) {
      if (pattern.test(text)) {
        issues.push(`Found absolute claim pattern: ${category}`);
        confidence -= patternPenalty;
      }
    }
  }

  const contradictions = text.match(contradictionClausePattern)?.length ?? 0;
  for (let index = 0; index < Math.min(contradictions, maxContradictionIssues); index += 1) {
    issues.push("Potential contradiction detected");
    confidence -= contradictionPenalty;
  }

  if (countWords(text) < minWordCount) {
    issues.push("Response too short (may be incomplete)");
    confidence -= shortResponsePenalty;
  }

  if (countCharacters(text) > quoteCheckMinChars && !quoteCharacterPattern.test(text)) {
    issues.push("No quoted sources found");
    confidence -= missingQuotePenalty;
  }

  return {
    status: classify(issues.length),
    issues,
    confidence: Math.max(0, confidence),
    issueCount: issues.length
  };
};
