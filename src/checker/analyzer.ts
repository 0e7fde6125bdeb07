/**
 * analyzer.ts
 *
 * SpellChecker: the entry point that turns a document into a DocumentAnalysis.
 *
 * Pipeline per line, per token:
 *   tokenize → classify → skip rules → resolve → confidence → suggestions
 *
 * State the checker owns (and clears): the correctness cache and the session
 * ignore list. Dictionaries are owned by the DictionaryManager and shared.
 *
 * analyze() never throws. A missing dictionary or an internal error yields an
 * empty analysis and a logged warning so callers can always render a result.
 */

import { DEFAULT_CONFIG, clampCheckerOptions, type Config } from "../config/index.js";
import type { Dictionary } from "../dictionary/dictionary.js";
import { loadBundledEnglishOracle, type AffixOracle } from "../dictionary/hunspell.js";
import { DictionaryManager } from "../dictionary/manager.js";
import { isSpellErrorCode } from "../errors.js";
import {
  Languages,
  asConcreteLanguage,
  isAutoDetect,
  languageFromCode,
  normalizeWord,
  sameLanguage,
  type ConcreteLanguage,
  type Language,
} from "../language/catalog.js";
import { detectLanguage, detectLanguageScores, resolveLanguage, type LanguageScore } from "../language/detect.js";
import { classify } from "../nlp/classify.js";
import { calculateConfidence } from "../nlp/confidence.js";
import { Lexicon } from "../nlp/lexicon.js";
import { calculateAccuracy } from "../nlp/stats.js";
import { generateSuggestions } from "../nlp/suggest.js";
import { isCodeDocument, selectPattern, splitLines, tokenizeLine, type Token } from "../nlp/tokenize.js";
import { CorrectnessCache } from "./cache.js";
import { resolveCorrectness, type ResolveContext } from "./resolve.js";
import type { CheckOptions, DocumentAnalysis, WordCheck } from "./types.js";

export interface SpellCheckerDeps {
  manager?: DictionaryManager;
  cache?: CorrectnessCache;
  lexicon?: Lexicon;
}

// Sentence-ending punctuation, optionally closed by quotes or brackets.
const SENTENCE_END = /[.!?]["'”’)\]]*\s*$/u;

function emptyAnalysis(
  language: ConcreteLanguage,
  fileType: string | null,
  startedAt: number,
): DocumentAnalysis {
  return {
    totalWords: 0,
    misspelledWords: 0,
    accuracy: 100,
    words: [],
    suggestionsCount: 0,
    language,
    linesChecked: 0,
    checkDurationMs: Date.now() - startedAt,
    likelyCode: false,
    fileType,
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SpellChecker {
  private language: Language;
  private options: CheckOptions;
  private readonly defaultLanguage: ConcreteLanguage;
  private readonly manager: DictionaryManager;
  private readonly cache: CorrectnessCache;
  private readonly lexicon: Lexicon;
  private readonly sessionIgnored = new Set<string>();
  private englishOracle: AffixOracle | null = null;

  public constructor(config: Config = DEFAULT_CONFIG, deps: SpellCheckerDeps = {}) {
    const { checker, dictionary, lexicon } = config;
    this.language = languageFromCode(checker.language);
    this.options = clampCheckerOptions({
      suggestionsEnabled: checker.suggestionsEnabled,
      caseSensitive: checker.caseSensitive,
      maxSuggestions: checker.maxSuggestions,
      confidenceThreshold: checker.confidenceThreshold,
    });
    const fallback = languageFromCode(dictionary.defaultLanguage);
    this.defaultLanguage = isAutoDetect(fallback) ? Languages.English : fallback;
    this.manager = deps.manager ?? new DictionaryManager(dictionary);
    this.cache = deps.cache ?? new CorrectnessCache();
    this.lexicon =
      deps.lexicon ?? new Lexicon({ acronyms: lexicon.acronyms, properNouns: lexicon.properNouns });
  }

  /** Builds a checker and, when `dictionary.hunspell` is on, attaches the bundled English affix rules. */
  public static async create(config: Config = DEFAULT_CONFIG, deps: SpellCheckerDeps = {}): Promise<SpellChecker> {
    const checker = new SpellChecker(config, deps);
    if (config.dictionary.hunspell) {
      try {
        checker.useEnglishOracle(await loadBundledEnglishOracle());
      } catch (error) {
        console.warn("[SpellCheck] Hunspell English dictionary unavailable:", describeError(error));
      }
    }
    return checker;
  }

  public get currentLanguage(): Language {
    return this.language;
  }

  public get currentOptions(): Readonly<CheckOptions> {
    return this.options;
  }

  public get dictionaries(): DictionaryManager {
    return this.manager;
  }

  public useEnglishOracle(oracle: AffixOracle | null): void {
    this.englishOracle = oracle;
    const loaded = this.manager.getCachedDictionary(Languages.English);
    if (loaded) loaded.attachOracle(oracle);
    this.cache.invalidateLanguage(Languages.English.code);
  }

  /** Switch language. The cache is cleared before this returns. */
  public setLanguage(language: Language | string): void {
    const next = typeof language === "string" ? languageFromCode(language) : language;
    this.language = next;
    this.cache.clear();
  }

  public updateOptions(patch: Partial<CheckOptions>): void {
    const next = clampCheckerOptions({ ...this.options, ...patch });
    if (next.caseSensitive !== this.options.caseSensitive) this.cache.clear();
    this.options = next;
  }

  public clearCache(): void {
    this.cache.clear();
  }

  public detectLanguage(text: string): ConcreteLanguage {
    return detectLanguage(text);
  }

  public languageScores(text: string): LanguageScore[] {
    return detectLanguageScores(text);
  }

  public analyze(text: string, filenameHint: string | null = null): DocumentAnalysis {
    const startedAt = Date.now();
    const source = String(text ?? "");
    let language = this.targetLanguage();
    try {
      language = resolveLanguage(this.language, source);
      const dictionary = this.dictionaryFor(language);
      return this.runAnalysis(source, dictionary, filenameHint, startedAt);
    } catch (error) {
      if (isSpellErrorCode(error, "DICTIONARY_NOT_FOUND")) {
        console.warn(`[SpellCheck] No dictionary for ${language.name}; nothing checked`);
      } else {
        console.warn(`[SpellCheck] Analysis failed for ${language.name}:`, describeError(error));
      }
      return emptyAnalysis(language, filenameHint, startedAt);
    }
  }

  /** Check one word on its own, as if it appeared mid-sentence. */
  public checkWord(word: string, isCodeContext = false): WordCheck {
    const token = word.trim();
    const dictionary = this.dictionaryFor(resolveLanguage(this.language, token));
    const { check } = this.checkToken(
      { text: token, start: 0, end: token.length },
      1,
      false,
      dictionary,
      this.resolveContext(dictionary, isCodeContext),
    );
    return check;
  }

  public suggest(word: string): string[] {
    const dictionary = this.dictionaryFor(resolveLanguage(this.language, word));
    return generateSuggestions(word, dictionary, this.options.maxSuggestions);
  }

  public async addWord(word: string, language?: Language): Promise<void> {
    await this.dictionaryFor(this.mutationLanguage(language)).addWord(word);
  }

  public async ignoreWord(word: string, language?: Language): Promise<void> {
    await this.dictionaryFor(this.mutationLanguage(language)).ignoreWord(word);
  }

  public async removeWord(word: string, language?: Language): Promise<boolean> {
    return this.dictionaryFor(this.mutationLanguage(language)).removeWord(word);
  }

  /** Accept a word until the checker is discarded or the ignores are cleared. */
  public ignoreForSession(word: string): void {
    const key = word.trim().toLowerCase();
    if (key) this.sessionIgnored.add(key);
  }

  /** Forget session ignores and the persisted ignore list. */
  public async clearIgnored(language?: Language): Promise<void> {
    this.sessionIgnored.clear();
    await this.dictionaryFor(this.mutationLanguage(language)).clearIgnored();
  }

  /** Replace the language's dictionary with the word list at `filePath`; returns its word count. */
  public importDictionary(filePath: string, language?: Language): number {
    const target = this.mutationLanguage(language);
    this.manager.importDictionary(filePath, target);
    this.cache.clear();
    return this.dictionaryFor(target).wordCount;
  }

  public async exportDictionary(filePath: string, language?: Language): Promise<void> {
    await this.dictionaryFor(this.mutationLanguage(language)).exportToFile(filePath);
  }

  public reloadDictionary(language?: Language): void {
    this.manager.reloadDictionary(this.mutationLanguage(language));
    this.cache.clear();
  }

  private targetLanguage(): ConcreteLanguage {
    return isAutoDetect(this.language) ? this.defaultLanguage : this.language;
  }

  private mutationLanguage(language?: Language): ConcreteLanguage {
    if (!language) return this.targetLanguage();
    return isAutoDetect(language) ? this.defaultLanguage : asConcreteLanguage(language);
  }

  private dictionaryFor(language: ConcreteLanguage): Dictionary {
    const dictionary = this.manager.getDictionary(language);
    if (this.englishOracle && sameLanguage(language, Languages.English) && !dictionary.affixOracle) {
      dictionary.attachOracle(this.englishOracle);
    }
    return dictionary;
  }

  private resolveContext(dictionary: Dictionary, isCodeContext: boolean): ResolveContext {
    return {
      dictionary,
      cache: this.cache,
      sessionIgnored: this.sessionIgnored,
      caseSensitive: this.options.caseSensitive,
      isCodeContext,
    };
  }

  private runAnalysis(
    text: string,
    dictionary: Dictionary,
    filenameHint: string | null,
    startedAt: number,
  ): DocumentAnalysis {
    const language = dictionary.language;
    const isCode = isCodeDocument(text, filenameHint);
    const pattern = selectPattern(language, isCode);
    const ctx = this.resolveContext(dictionary, pattern === "code");
    const lines = splitLines(text);
    const words: WordCheck[] = [];
    let totalWords = 0;
    let misspelledWords = 0;
    let suggestionsCount = 0;

    let sentenceStart = true;
    lines.forEach((line, index) => {
      if (!line.trim()) {
        sentenceStart = true;
        return;
      }
      let cursor = 0;
      for (const token of tokenizeLine(line, pattern)) {
        if (SENTENCE_END.test(line.slice(cursor, token.start))) sentenceStart = true;
        const { check, counted } = this.checkToken(token, index + 1, sentenceStart, dictionary, ctx);
        words.push(check);
        if (counted) totalWords += 1;
        if (!check.isCorrect) misspelledWords += 1;
        suggestionsCount += check.suggestions.length;
        sentenceStart = false;
        cursor = token.end;
      }
      if (SENTENCE_END.test(line.slice(cursor))) sentenceStart = true;
    });

    return {
      totalWords,
      misspelledWords,
      accuracy: calculateAccuracy(totalWords - misspelledWords, totalWords),
      words,
      suggestionsCount,
      language,
      linesChecked: lines.length,
      checkDurationMs: Date.now() - startedAt,
      likelyCode: isCode,
      fileType: filenameHint,
    };
  }

  private checkToken(
    token: Token,
    line: number,
    sentenceStart: boolean,
    dictionary: Dictionary,
    ctx: ResolveContext,
  ): { check: WordCheck; counted: boolean } {
    const category = classify(token.text, ctx.isCodeContext, { sentenceStart });
    const base = {
      word: normalizeWord(token.text, dictionary.language),
      original: token.text,
      start: token.start,
      end: token.end,
      line,
      column: token.start + 1,
      category,
    };

    if (this.lexicon.shouldSkip(token.text, category)) {
      return { check: { ...base, isCorrect: true, confidence: 1, suggestions: [] }, counted: false };
    }

    const resolved = resolveCorrectness(token.text, category, ctx);
    const confidence = calculateConfidence(token.text, category, resolved);
    const flagged = !resolved && confidence >= this.options.confidenceThreshold;
    const suggestions =
      flagged && this.options.suggestionsEnabled
        ? generateSuggestions(token.text, dictionary, this.options.maxSuggestions)
        : [];

    return { check: { ...base, isCorrect: !flagged, confidence, suggestions }, counted: true };
  }
}

/** Content-free summary line for logs. */
export function logAnalysis(result: DocumentAnalysis, context = ""): void {
  const prefix = context ? `[SpellCheck:${context}]` : "[SpellCheck]";
  console.log(
    `${prefix} ${result.totalWords} word(s), ${result.misspelledWords} misspelled, ` +
      `accuracy=${result.accuracy}% lang=${result.language.code} lines=${result.linesChecked} ` +
      `suggestions=${result.suggestionsCount} ${result.checkDurationMs}ms`,
  );
}
