/**
 * catalog.ts
 *
 * Closed set of languages the checker knows about. Built-in languages are
 * frozen singletons; anything else is a Custom language keyed by its code.
 * Two languages are the same language when their codes match.
 */

import { SpellError } from "../errors.js";

export type BuiltinLanguageKind =
  | "english"
  | "afrikaans"
  | "french"
  | "spanish"
  | "german"
  | "chinese"
  | "italian"
  | "portuguese"
  | "russian"
  | "japanese"
  | "korean";

export interface BuiltinLanguage {
  readonly kind: BuiltinLanguageKind;
  readonly code: string;
  readonly name: string;
  readonly cjk: boolean;
}

export interface AutoDetectLanguage {
  readonly kind: "auto";
  readonly code: "auto";
  readonly name: "Auto-detect";
  readonly cjk: false;
}

export interface CustomLanguage {
  readonly kind: "custom";
  readonly code: string;
  readonly name: string;
  readonly cjk: false;
}

export type Language = BuiltinLanguage | AutoDetectLanguage | CustomLanguage;

/** A language that can key a dictionary. */
export type ConcreteLanguage = BuiltinLanguage | CustomLanguage;

function builtin(kind: BuiltinLanguageKind, code: string, name: string, cjk = false): BuiltinLanguage {
  const language: BuiltinLanguage = { kind, code, name, cjk };
  return Object.freeze(language);
}

const AUTO_DETECT: AutoDetectLanguage = Object.freeze({
  kind: "auto",
  code: "auto",
  name: "Auto-detect",
  cjk: false,
});

export const Languages = {
  English: builtin("english", "eng", "English"),
  Afrikaans: builtin("afrikaans", "afr", "Afrikaans"),
  French: builtin("french", "fra", "French"),
  Spanish: builtin("spanish", "spa", "Spanish"),
  German: builtin("german", "deu", "German"),
  Chinese: builtin("chinese", "zho", "Chinese", true),
  Italian: builtin("italian", "ita", "Italian"),
  Portuguese: builtin("portuguese", "por", "Portuguese"),
  Russian: builtin("russian", "rus", "Russian"),
  Japanese: builtin("japanese", "jpn", "Japanese", true),
  Korean: builtin("korean", "kor", "Korean", true),
  AutoDetect: AUTO_DETECT,
} as const;

export const LANGUAGES: readonly Language[] = [
  Languages.English,
  Languages.Afrikaans,
  Languages.French,
  Languages.Spanish,
  Languages.German,
  Languages.Chinese,
  Languages.Italian,
  Languages.Portuguese,
  Languages.Russian,
  Languages.Japanese,
  Languages.Korean,
  Languages.AutoDetect,
];

const ALIASES = new Map<string, Language>();
for (const language of LANGUAGES) {
  ALIASES.set(language.code, language);
  ALIASES.set(language.name.toLowerCase(), language);
}
for (const [alias, language] of [
  ["en", Languages.English],
  ["af", Languages.Afrikaans],
  ["fr", Languages.French],
  ["es", Languages.Spanish],
  ["de", Languages.German],
  ["zh", Languages.Chinese],
  ["it", Languages.Italian],
  ["pt", Languages.Portuguese],
  ["ru", Languages.Russian],
  ["ja", Languages.Japanese],
  ["ko", Languages.Korean],
  ["autodetect", Languages.AutoDetect],
] as const) {
  ALIASES.set(alias, language);
}

export function customLanguage(code: string, name?: string): CustomLanguage {
  const normalized = code.trim().toLowerCase();
  const language: CustomLanguage = { kind: "custom", code: normalized, name: name?.trim() || normalized, cjk: false };
  return Object.freeze(language);
}

/**
 * Resolve a code, two-letter code or English name to a language.
 * Empty input is English; unknown codes become Custom languages.
 */
export function languageFromCode(code: string): Language {
  const normalized = String(code ?? "").trim().toLowerCase();
  if (!normalized) return Languages.English;
  return ALIASES.get(normalized) ?? customLanguage(normalized);
}

export function sameLanguage(a: Language, b: Language): boolean {
  return a.code === b.code;
}

export function isAutoDetect(language: Language): language is AutoDetectLanguage {
  return language.kind === "auto";
}

export function isCjkLanguage(language: Language): boolean {
  switch (language.kind) {
    case "chinese":
    case "japanese":
    case "korean":
      return true;
    case "english":
    case "afrikaans":
    case "french":
    case "spanish":
    case "german":
    case "italian":
    case "portuguese":
    case "russian":
    case "auto":
    case "custom":
      return false;
  }
}

/**
 * Normalize a word for storage or lookup: verbatim for CJK scripts,
 * lower-cased everywhere else.
 */
export function normalizeWord(word: string, language: Language): string {
  const trimmed = word.trim();
  return isCjkLanguage(language) ? trimmed : trimmed.toLowerCase();
}

export type WordListExtension = "csv" | "txt";

export function dictionaryFileName(language: ConcreteLanguage, ext: WordListExtension): string {
  return `dictionary(${language.code}).${ext}`;
}

export function userWordsFileName(language: ConcreteLanguage): string {
  return `user(${language.code}).txt`;
}

export function ignoredWordsFileName(language: ConcreteLanguage): string {
  return `ignored(${language.code}).txt`;
}

/** Narrow to a dictionary-keyable language; AutoDetect has to be resolved first. */
export function asConcreteLanguage(language: Language): ConcreteLanguage {
  if (language.kind === "auto") {
    throw new SpellError({
      code: "UNRESOLVED_LANGUAGE",
      message: "Auto-detect must be resolved to a concrete language before dictionary lookup",
      language: language.code,
    });
  }
  return language;
}
