/**
 * dictionary.ts
 *
 * One language's known words plus the user's added and ignored words.
 *
 * Base word lists are looked up as `dictionary(<code>).csv`, then
 * `dictionary(<code>).txt`, in each search directory in order. When the
 * language has no list of its own the default language's list stands in.
 *
 * Every stored word is normalized for the dictionary's language, so lookups
 * normalize the query and never the stored data.
 */

import fs from "node:fs";
import path from "node:path";
import { SpellError, isSpellError } from "../errors.js";
import {
  Languages,
  asConcreteLanguage,
  dictionaryFileName,
  isCjkLanguage,
  normalizeWord,
  sameLanguage,
  type ConcreteLanguage,
  type Language,
  type WordListExtension,
} from "../language/catalog.js";
import { codePointLength, hasCodeIdentifierShape, isNumericHeavy } from "../nlp/lexicon.js";
import type { AffixOracle } from "./hunspell.js";
import type { UserWordStore } from "./user-store.js";
import { formatFromPath, readWordListFile, writeWordListFile } from "./wordlist.js";

const BASE_LIST_EXTENSIONS: readonly WordListExtension[] = ["csv", "txt"];

export interface DictionaryOptions {
  searchDirs: readonly string[];
  store: UserWordStore;
  minWordLength?: number;
  defaultLanguage?: ConcreteLanguage;
}

export interface DictionarySource {
  path: string;
  /** Language whose list was read; differs from the dictionary's on fallback. */
  language: ConcreteLanguage;
  fallback: boolean;
}

export function findBaseWordList(language: ConcreteLanguage, searchDirs: readonly string[]): string | null {
  for (const ext of BASE_LIST_EXTENSIONS) {
    const fileName = dictionaryFileName(language, ext);
    for (const dir of searchDirs) {
      const candidate = path.join(dir, fileName);
      if (fs.existsSync(candidate)) return candidate;
    }
  }
  return null;
}

export class Dictionary {
  public readonly language: ConcreteLanguage;
  public readonly minWordLength: number;

  private readonly searchDirs: readonly string[];
  private readonly store: UserWordStore;
  private readonly defaultLanguage: ConcreteLanguage;
  private readonly cjk: boolean;

  private readonly base = new Set<string>();
  private readonly userWords = new Set<string>();
  private readonly ignored = new Set<string>();
  private loaded = false;
  private source: DictionarySource | null = null;
  private oracle: AffixOracle | null = null;

  public constructor(language: Language, options: DictionaryOptions) {
    this.language = asConcreteLanguage(language);
    this.searchDirs = options.searchDirs;
    this.store = options.store;
    this.minWordLength = Math.max(1, Math.floor(options.minWordLength ?? 2));
    this.defaultLanguage = options.defaultLanguage ?? Languages.English;
    this.cjk = isCjkLanguage(this.language);
  }

  public get isLoaded(): boolean {
    return this.loaded;
  }

  public get loadedFrom(): DictionarySource | null {
    return this.source;
  }

  public get wordCount(): number {
    let count = this.base.size;
    for (const word of this.userWords) {
      if (!this.base.has(word)) count += 1;
    }
    return count;
  }

  public get affixOracle(): AffixOracle | null {
    return this.oracle;
  }

  /**
   * Populate from the base word list and the user store. Repeated calls are
   * no-ops once loaded.
   */
  public load(): this {
    if (this.loaded) return this;

    const candidates: DictionarySource[] = [];
    const own = findBaseWordList(this.language, this.searchDirs);
    if (own) candidates.push({ path: own, language: this.language, fallback: false });
    if (!sameLanguage(this.language, this.defaultLanguage)) {
      const fallback = findBaseWordList(this.defaultLanguage, this.searchDirs);
      if (fallback) candidates.push({ path: fallback, language: this.defaultLanguage, fallback: true });
    }

    let lastError: SpellError | null = null;
    for (const candidate of candidates) {
      try {
        this.readBaseList(candidate.path);
      } catch (error) {
        if (!isSpellError(error)) throw error;
        console.warn("[Dictionary] Could not read word list", candidate.path, error.message);
        lastError = error;
        this.base.clear();
        continue;
      }
      if (candidate.fallback) {
        console.warn(
          `[Dictionary] No word list for ${this.language.name}; using ${candidate.language.name} instead`,
        );
      }
      this.finishLoad(candidate);
      return this;
    }

    throw (
      lastError ??
      new SpellError({
        code: "DICTIONARY_NOT_FOUND",
        message: `Could not load dictionary for ${this.language.name}`,
        language: this.language.code,
      })
    );
  }

  /** Load from an explicit word list file instead of searching. */
  public loadFrom(filePath: string): this {
    formatFromPath(filePath);
    this.base.clear();
    this.readBaseList(filePath);
    this.finishLoad({ path: path.resolve(filePath), language: this.language, fallback: false });
    return this;
  }

  /** Merge another word list into the base set; returns how many words were new. */
  public importFromFile(filePath: string): number {
    return this.readBaseList(filePath);
  }

  /** Write every known word (base and user-added), sorted. */
  public async exportToFile(filePath: string): Promise<void> {
    formatFromPath(filePath);
    await writeWordListFile(filePath, this.words());
  }

  public attachOracle(oracle: AffixOracle | null): void {
    this.oracle = oracle;
  }

  /**
   * Returns true when the word should not be flagged: empty or too short,
   * ignored, numeric-heavy, code-shaped in code context, or known.
   */
  public contains(word: string, caseSensitive = false, isCodeContext = false): boolean {
    const trimmed = word.trim();
    if (!trimmed || codePointLength(trimmed) < this.minWordLength) return true;

    const normalized = normalizeWord(trimmed, this.language);
    if (this.ignored.has(normalized)) return true;
    if (!this.cjk && isNumericHeavy(trimmed)) return true;
    if (isCodeContext && hasCodeIdentifierShape(trimmed)) return true;

    const key = caseSensitive ? trimmed : normalized;
    if (this.base.has(key) || this.userWords.has(key)) return true;
    return this.oracle?.correct(trimmed) ?? false;
  }

  public isIgnored(word: string): boolean {
    return this.ignored.has(normalizeWord(word, this.language));
  }

  public hasUserWord(word: string): boolean {
    return this.userWords.has(normalizeWord(word, this.language));
  }

  /** Base and user-added words, sorted. */
  public words(): string[] {
    return [...new Set([...this.base, ...this.userWords])].sort();
  }

  public *iterateWords(): Generator<string> {
    yield* this.base;
    for (const word of this.userWords) {
      if (!this.base.has(word)) yield word;
    }
  }

  public ignoredWords(): string[] {
    return [...this.ignored].sort();
  }

  /**
   * Add to the user dictionary. The word is usable immediately; a failure to
   * persist rejects without undoing the in-memory change.
   */
  public async addWord(word: string): Promise<void> {
    const normalized = this.requireValidWord(word);
    this.userWords.add(normalized);
    const wasIgnored = this.ignored.delete(normalized);
    await this.store.saveAdded(this.language, () => this.userWords);
    if (wasIgnored) await this.store.saveIgnored(this.language, () => this.ignored);
  }

  public async ignoreWord(word: string): Promise<void> {
    const normalized = this.requireValidWord(word);
    this.ignored.add(normalized);
    await this.store.saveIgnored(this.language, () => this.ignored);
  }

  /** Drop a user-added word; returns false when it was never added. */
  public async removeWord(word: string): Promise<boolean> {
    const normalized = normalizeWord(word, this.language);
    if (!this.userWords.delete(normalized)) return false;
    await this.store.saveAdded(this.language, () => this.userWords);
    return true;
  }

  public async clearIgnored(): Promise<void> {
    this.ignored.clear();
    await this.store.saveIgnored(this.language, () => this.ignored);
  }

  private requireValidWord(word: string): string {
    const normalized = normalizeWord(word, this.language);
    if (!normalized || codePointLength(normalized) < this.minWordLength) {
      throw new SpellError({
        code: "INVALID_WORD",
        message: `"${word}" is too short to add (minimum ${this.minWordLength} characters)`,
        language: this.language.code,
      });
    }
    return normalized;
  }

  private readBaseList(filePath: string): number {
    let added = 0;
    for (const entry of readWordListFile(filePath)) {
      const normalized = normalizeWord(entry, this.language);
      if (codePointLength(normalized) < this.minWordLength || this.base.has(normalized)) continue;
      this.base.add(normalized);
      added += 1;
    }
    return added;
  }

  private finishLoad(source: DictionarySource): void {
    if (this.base.size === 0) {
      console.warn(`[Dictionary] EMPTY_DICTIONARY: ${source.path} has no usable words`);
    }
    this.mergeUserData();
    this.source = source;
    this.loaded = true;
  }

  private mergeUserData(): void {
    for (const entry of this.store.readAdded(this.language)) {
      const normalized = normalizeWord(entry, this.language);
      if (codePointLength(normalized) >= this.minWordLength) this.userWords.add(normalized);
    }
    for (const entry of this.store.readIgnored(this.language)) {
      const normalized = normalizeWord(entry, this.language);
      if (normalized && !this.userWords.has(normalized)) this.ignored.add(normalized);
    }
  }
}
