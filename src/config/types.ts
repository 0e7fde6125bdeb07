export interface CheckerConfig {
  /** Language code, or "auto" to detect per document. */
  language: string;
  suggestionsEnabled: boolean;
  caseSensitive: boolean;
  maxSuggestions: number;
  confidenceThreshold: number;
}

export interface DictionaryConfig {
  defaultLanguage: string;
  /** Directories searched, in order, for base word lists. */
  searchDirs: string[];
  /** Holds user-added and ignored word files. */
  userDataDir: string;
  minWordLength: number;
  /** Attach the bundled Hunspell English dictionary to English word lists. */
  hunspell: boolean;
}

export interface LexiconConfig {
  acronyms: string[];
  properNouns: string[];
}

export interface Config {
  checker: CheckerConfig;
  dictionary: DictionaryConfig;
  lexicon: LexiconConfig;
}
