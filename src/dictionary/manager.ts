import fs from "node:fs";
import path from "node:path";
import type { DictionaryConfig } from "../config/types.js";
import {
  LANGUAGES,
  Languages,
  asConcreteLanguage,
  isAutoDetect,
  languageFromCode,
  type ConcreteLanguage,
  type Language,
} from "../language/catalog.js";
import { Dictionary, findBaseWordList } from "./dictionary.js";
import { UserWordStore } from "./user-store.js";

export type DictionaryManagerOptions = Pick<
  DictionaryConfig,
  "searchDirs" | "userDataDir" | "minWordLength" | "defaultLanguage"
>;

/**
 * One loaded Dictionary per language code. Callers receive the shared
 * instance, so a word added through one caller is visible to every other.
 */
export class DictionaryManager {
  private readonly dictionaries = new Map<string, Dictionary>();
  private readonly searchDirs: readonly string[];
  private readonly store: UserWordStore;
  private readonly minWordLength: number;
  private readonly defaultLanguage: ConcreteLanguage;

  public constructor(options: DictionaryManagerOptions) {
    this.store = new UserWordStore(options.userDataDir);
    this.searchDirs = options.searchDirs.map((dir) => path.resolve(dir));
    this.minWordLength = options.minWordLength;
    const fallback = languageFromCode(options.defaultLanguage);
    this.defaultLanguage = isAutoDetect(fallback) ? Languages.English : fallback;
  }

  public get userStore(): UserWordStore {
    return this.store;
  }

  /** Cached dictionary, or a freshly loaded one. Throws when no word list exists. */
  public getDictionary(language: Language): Dictionary {
    const concrete = asConcreteLanguage(language);
    const cached = this.dictionaries.get(concrete.code);
    if (cached) return cached;

    const dictionary = this.create(concrete).load();
    this.dictionaries.set(concrete.code, dictionary);
    return dictionary;
  }

  public getCachedDictionary(language: Language): Dictionary | null {
    if (isAutoDetect(language)) return null;
    return this.dictionaries.get(language.code) ?? null;
  }

  /** Re-read the word lists from disk and replace the cached instance. */
  public reloadDictionary(language: Language): Dictionary {
    const concrete = asConcreteLanguage(language);
    const previous = this.dictionaries.get(concrete.code);
    const dictionary = this.create(concrete).load();
    dictionary.attachOracle(previous?.affixOracle ?? null);
    this.dictionaries.set(concrete.code, dictionary);
    return dictionary;
  }

  /** Build the language's dictionary from `filePath` (plus user data) and make it current. */
  public importDictionary(filePath: string, language: Language): Dictionary {
    const concrete = asConcreteLanguage(language);
    const previous = this.dictionaries.get(concrete.code);
    const dictionary = this.create(concrete).loadFrom(filePath);
    dictionary.attachOracle(previous?.affixOracle ?? null);
    this.dictionaries.set(concrete.code, dictionary);
    console.log(`[Dictionary] Imported ${dictionary.wordCount} words for ${concrete.name} from ${filePath}`);
    return dictionary;
  }

  public async exportDictionary(language: Language, filePath: string): Promise<void> {
    await this.getDictionary(language).exportToFile(filePath);
  }

  public evict(language: Language): boolean {
    if (isAutoDetect(language)) return false;
    return this.dictionaries.delete(language.code);
  }

  public loadedLanguages(): string[] {
    return [...this.dictionaries.keys()].sort();
  }

  /** Languages with a base word list in some search directory (or already loaded). */
  public availableLanguages(): ConcreteLanguage[] {
    const available: ConcreteLanguage[] = [];
    for (const language of LANGUAGES) {
      if (isAutoDetect(language)) continue;
      if (this.dictionaries.has(language.code) || findBaseWordList(language, this.searchDirs)) {
        available.push(language);
      }
    }
    for (const language of this.discoverCustomLanguages()) {
      if (!available.some((known) => known.code === language.code)) available.push(language);
    }
    return available;
  }

  private discoverCustomLanguages(): ConcreteLanguage[] {
    const found: ConcreteLanguage[] = [];
    for (const dir of this.searchDirs) {
      if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) continue;
      for (const name of fs.readdirSync(dir)) {
        const match = /^dictionary\(([^)]+)\)\.(?:csv|txt)$/i.exec(name);
        if (!match) continue;
        const language = languageFromCode(match[1]);
        if (language.kind === "custom") found.push(language);
      }
    }
    return found;
  }

  private create(language: ConcreteLanguage): Dictionary {
    return new Dictionary(language, {
      searchDirs: this.searchDirs,
      store: this.store,
      minWordLength: this.minWordLength,
      defaultLanguage: this.defaultLanguage,
    });
  }
}
