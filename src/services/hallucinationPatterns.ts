export type PatternCategory = "absolute_claims" | "invented_facts" | "future_claims" | "unqualified_statements";

// Word boundaries that treat any letter or digit as a word character, not just ASCII.
const wordPattern = (phrase: string, flags = "iu"): RegExp =>
  new RegExp(`(?<![\\p{L}\\p{N}_])${phrase}(?![\\p{L}\\p{N}_])`, flags);

/**
 * Textual cues associated with unsupported or overconfident model claims.
 * Every pattern is a case-insensitive whole-word match.
 */
export const hallucinationPatterns: Readonly<Record<PatternCategory, readonly RegExp[]>> = {
  absolute_claims: [wordPattern("always"), wordPattern("never"), wordPattern("impossible")],
  invented_facts: [wordPattern("I invented"), wordPattern("I created"), wordPattern("I developed")],
  future_claims: [wordPattern("will definitely"), wordPattern("will certainly")],
  unqualified_statements: [wordPattern("proven"), wordPattern("undeniable")]
};

export const patternCategories: readonly PatternCategory[] = [
  "absolute_claims",
  "invented_facts",
  "future_claims",
  "unqualified_statements"
];

// A clause is a run of text between sentence terminators.
export const contradictionClausePattern = new RegExp(
  `[^.!?]*${wordPattern("(?:but|however)", "u").source}[^.!?]*`,
  "gu"
);

export const quoteCharacterPattern = /["'`]/;

export const maxContradictionIssues = 2;
