import type { ConcreteLanguage } from "../language/catalog.js";
import type { Category } from "../nlp/classify.js";

export interface WordCheck {
  /** Normalized form used for lookups. */
  readonly word: string;
  readonly original: string;
  /** UTF-16 offset within the line. */
  readonly start: number;
  /** Exclusive. */
  readonly end: number;
  /** 1-based. */
  readonly line: number;
  /** 1-based; `start + 1`. */
  readonly column: number;
  readonly isCorrect: boolean;
  readonly confidence: number;
  readonly category: Category;
  /** Most likely first. */
  readonly suggestions: readonly string[];
}

export interface DocumentAnalysis {
  totalWords: number;
  misspelledWords: number;
  /** Whole-number percentage. */
  accuracy: number;
  words: WordCheck[];
  suggestionsCount: number;
  language: ConcreteLanguage;
  linesChecked: number;
  checkDurationMs: number;
  likelyCode: boolean;
  fileType: string | null;
}

export interface CheckOptions {
  suggestionsEnabled: boolean;
  caseSensitive: boolean;
  maxSuggestions: number;
  confidenceThreshold: number;
}
