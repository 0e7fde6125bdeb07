/**
 * confidence.ts
 *
 * Likelihood that a dictionary miss is a genuine misspelling rather than
 * acceptable domain vocabulary. Correct words always score 1.
 */

import type { Category } from "./classify.js";
import { codePointLength } from "./lexicon.js";

const BASE_CONFIDENCE = 0.5;

export const CATEGORY_WEIGHTS: Readonly<Record<Category, number>> = {
  normal: 1.2,
  codeIdentifier: 0.3,
  acronym: 0.4,
  properNoun: 0.6,
  technicalTerm: 0.8,
};

// Letter clusters that are frequently misspelled.
const TYPO_PATTERNS = ["ie", "ei", "tion", "sion", "able", "ible", "ment", "ness", "ough"];

const SHORT_TOKEN_LEN = 3;
const LONG_TOKEN_LEN = 20;

export function calculateConfidence(token: string, category: Category, isCorrect: boolean): number {
  if (isCorrect) return 1;

  let confidence = BASE_CONFIDENCE * CATEGORY_WEIGHTS[category];

  const length = codePointLength(token);
  if (length < SHORT_TOKEN_LEN) confidence *= 0.3;
  else if (length > LONG_TOKEN_LEN) confidence *= 0.7;

  if (token.includes("_") || token.includes("-")) confidence *= 1.1;

  const lower = token.toLowerCase();
  if (TYPO_PATTERNS.some((pattern) => lower.includes(pattern))) confidence *= 1.3;

  return Math.min(1, Math.max(0, confidence));
}
