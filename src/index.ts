import { SpellChecker, type SpellCheckerDeps } from "./checker/analyzer.js";
import type { CheckOptions, DocumentAnalysis } from "./checker/types.js";
import { DEFAULT_CONFIG, type Config } from "./config/index.js";
import { languageFromCode, type Language } from "./language/catalog.js";

export { SpellChecker, logAnalysis, type SpellCheckerDeps } from "./checker/analyzer.js";
export { CorrectnessCache } from "./checker/cache.js";
export { looksReasonable, resolveCorrectness, type CorrectnessSource, type ResolveContext } from "./checker/resolve.js";
export type { CheckOptions, DocumentAnalysis, WordCheck } from "./checker/types.js";
export {
  DEFAULT_ACRONYMS,
  DEFAULT_CONFIG,
  clampCheckerOptions,
  loadConfig,
  type CheckerConfig,
  type Config,
  type DictionaryConfig,
  type LexiconConfig,
} from "./config/index.js";
export { Dictionary, findBaseWordList, type DictionaryOptions, type DictionarySource } from "./dictionary/dictionary.js";
export { createAffixOracle, loadBundledEnglishOracle, type AffixOracle } from "./dictionary/hunspell.js";
export { DictionaryManager, type DictionaryManagerOptions } from "./dictionary/manager.js";
export { UserWordStore } from "./dictionary/user-store.js";
export { formatFromPath, readWordListFile, writeWordListFile, type WordListFormat } from "./dictionary/wordlist.js";
export { SpellError, asSpellError, isSpellError, isSpellErrorCode, type SpellErrorCode } from "./errors.js";
export {
  LANGUAGES,
  Languages,
  customLanguage,
  isCjkLanguage,
  languageFromCode,
  normalizeWord,
  sameLanguage,
  type ConcreteLanguage,
  type Language,
} from "./language/catalog.js";
export { detectLanguage, detectLanguageScores, resolveLanguage, type LanguageScore } from "./language/detect.js";
export { classify, type Category } from "./nlp/classify.js";
export { calculateConfidence } from "./nlp/confidence.js";
export { Lexicon } from "./nlp/lexicon.js";
export {
  buildWordList,
  calculateAccuracy,
  extractWords,
  isValidWord,
  mostCommonWords,
  readingTime,
  sanitizeWord,
  wordFrequency,
} from "./nlp/stats.js";
export { editDistance, generateSuggestions } from "./nlp/suggest.js";
export { isCodeDocument, isCodeFile, isLikelyCode, selectPattern, splitLines, tokenizeLine, type Token, type TokenPattern } from "./nlp/tokenize.js";

export interface AnalyzeDeps extends SpellCheckerDeps {
  /** Dictionary locations and lexicon; checker options come from the `options` argument. */
  config?: Config;
}

/**
 * One-shot analysis. Pass a shared `manager` in `deps` to reuse loaded
 * dictionaries across calls.
 */
export function analyze(
  text: string,
  language: Language | string,
  filenameHint: string | null = null,
  options: Partial<CheckOptions> = {},
  deps: AnalyzeDeps = {},
): DocumentAnalysis {
  const { config = DEFAULT_CONFIG, ...checkerDeps } = deps;
  const resolved = typeof language === "string" ? languageFromCode(language) : language;
  const checker = new SpellChecker(
    { ...config, checker: { ...config.checker, ...options, language: resolved.code } },
    checkerDeps,
  );
  return checker.analyze(text, filenameHint);
}
