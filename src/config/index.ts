import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { CheckerConfig, Config } from "./types.js";

export type { CheckerConfig, Config, DictionaryConfig, LexiconConfig } from "./types.js";

const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".spellscope", "config.json");
const DEFAULT_USER_DATA_DIR = path.join(os.homedir(), ".spellscope", "user_dictionaries");

export const DEFAULT_ACRONYMS: readonly string[] = [
  "API", "HTTP", "HTTPS", "URL", "URI", "HTML", "CSS", "JS", "TS",
  "JSON", "XML", "SQL", "CPU", "GPU", "RAM", "ROM", "USB",
  "SSD", "HDD", "LAN", "WAN", "VPN", "DNS", "IP", "TCP", "UDP",
];

export const DEFAULT_CONFIG: Config = {
  checker: {
    language: "eng",
    suggestionsEnabled: true,
    caseSensitive: false,
    maxSuggestions: 5,
    confidenceThreshold: 0.7,
  },
  dictionary: {
    defaultLanguage: "eng",
    searchDirs: [
      path.join(process.cwd(), "src", "dictionary"),
      path.join(process.cwd(), "dictionary"),
      DEFAULT_USER_DATA_DIR,
      process.cwd(),
    ],
    userDataDir: DEFAULT_USER_DATA_DIR,
    minWordLength: 2,
    hunspell: false,
  },
  lexicon: {
    acronyms: [...DEFAULT_ACRONYMS],
    properNouns: [],
  },
};

function readJsonFile(filePath: string): unknown {
  try {
    const raw = fs.readFileSync(filePath, "utf8");
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function asRecord(value: unknown): Record<string, unknown> {
  return value && typeof value === "object" && !Array.isArray(value) ? { ...value } : {};
}

function pickString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function pickNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function pickBoolean(record: Record<string, unknown>, key: string): boolean | undefined {
  const value = record[key];
  return typeof value === "boolean" ? value : undefined;
}

function pickStringArray(record: Record<string, unknown>, key: string): string[] | undefined {
  const value = record[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string").map((item) => item.trim()).filter(Boolean);
}

function applyFileOverrides(base: Config, raw: unknown): Config {
  const root = asRecord(raw);
  const checker = asRecord(root.checker);
  const dictionary = asRecord(root.dictionary);
  const lexicon = asRecord(root.lexicon);
  return {
    checker: {
      language: pickString(checker, "language") ?? base.checker.language,
      suggestionsEnabled: pickBoolean(checker, "suggestionsEnabled") ?? base.checker.suggestionsEnabled,
      caseSensitive: pickBoolean(checker, "caseSensitive") ?? base.checker.caseSensitive,
      maxSuggestions: pickNumber(checker, "maxSuggestions") ?? base.checker.maxSuggestions,
      confidenceThreshold: pickNumber(checker, "confidenceThreshold") ?? base.checker.confidenceThreshold,
    },
    dictionary: {
      defaultLanguage: pickString(dictionary, "defaultLanguage") ?? base.dictionary.defaultLanguage,
      searchDirs: pickStringArray(dictionary, "searchDirs") ?? base.dictionary.searchDirs,
      userDataDir: pickString(dictionary, "userDataDir") ?? base.dictionary.userDataDir,
      minWordLength: pickNumber(dictionary, "minWordLength") ?? base.dictionary.minWordLength,
      hunspell: pickBoolean(dictionary, "hunspell") ?? base.dictionary.hunspell,
    },
    lexicon: {
      acronyms: pickStringArray(lexicon, "acronyms") ?? base.lexicon.acronyms,
      properNouns: pickStringArray(lexicon, "properNouns") ?? base.lexicon.properNouns,
    },
  };
}

function toNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toIntInRange(
  value: string | undefined,
  fallback: number,
  minValue: number,
  maxValue: number,
): number {
  const parsed = Math.floor(toNumber(value, fallback));
  return Math.max(minValue, Math.min(maxValue, parsed));
}

function toFloatInRange(
  value: string | undefined,
  fallback: number,
  minValue: number,
  maxValue: number,
): number {
  const parsed = toNumber(value, fallback);
  return Math.max(minValue, Math.min(maxValue, parsed));
}

function toBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
    return false;
  }
  return fallback;
}

function splitCsv(value: string | undefined, fallback: string[]): string[] {
  if (!value || !value.trim()) return fallback;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function resolveEnvOverrides(base: Config, env: NodeJS.ProcessEnv): Config {
  return {
    checker: {
      ...base.checker,
      language: env.SPELLSCOPE_LANGUAGE?.trim() || base.checker.language,
      suggestionsEnabled: toBoolean(env.SPELLSCOPE_SUGGESTIONS, base.checker.suggestionsEnabled),
      caseSensitive: toBoolean(env.SPELLSCOPE_CASE_SENSITIVE, base.checker.caseSensitive),
      maxSuggestions: toIntInRange(env.SPELLSCOPE_MAX_SUGGESTIONS, base.checker.maxSuggestions, 0, MAX_SUGGESTIONS_LIMIT),
      confidenceThreshold: toFloatInRange(
        env.SPELLSCOPE_CONFIDENCE_THRESHOLD,
        base.checker.confidenceThreshold,
        0,
        1,
      ),
    },
    dictionary: {
      ...base.dictionary,
      defaultLanguage: env.SPELLSCOPE_DEFAULT_LANGUAGE?.trim() || base.dictionary.defaultLanguage,
      searchDirs: splitCsv(env.SPELLSCOPE_DICTIONARY_DIRS, base.dictionary.searchDirs),
      userDataDir: env.SPELLSCOPE_USER_DATA_DIR?.trim() || base.dictionary.userDataDir,
      minWordLength: toIntInRange(env.SPELLSCOPE_MIN_WORD_LENGTH, base.dictionary.minWordLength, 1, 64),
      hunspell: toBoolean(env.SPELLSCOPE_HUNSPELL, base.dictionary.hunspell),
    },
    lexicon: {
      ...base.lexicon,
      acronyms: splitCsv(env.SPELLSCOPE_ACRONYMS, base.lexicon.acronyms),
      properNouns: splitCsv(env.SPELLSCOPE_PROPER_NOUNS, base.lexicon.properNouns),
    },
  };
}

export const MAX_SUGGESTIONS_LIMIT = 50;

/** Bounds the numeric checker options: suggestions 0..50, threshold 0..1. */
export function clampCheckerOptions<T extends Pick<CheckerConfig, "maxSuggestions" | "confidenceThreshold">>(
  options: T,
): T {
  return {
    ...options,
    maxSuggestions: Math.max(0, Math.min(MAX_SUGGESTIONS_LIMIT, Math.floor(options.maxSuggestions))),
    confidenceThreshold: Math.max(0, Math.min(1, options.confidenceThreshold)),
  };
}

function clampConfig(config: Config): Config {
  return {
    ...config,
    checker: clampCheckerOptions(config.checker),
    dictionary: {
      ...config.dictionary,
      minWordLength: Math.max(1, Math.min(64, Math.floor(config.dictionary.minWordLength))),
      searchDirs: config.dictionary.searchDirs.map((dir) => path.resolve(dir)),
      userDataDir: path.resolve(config.dictionary.userDataDir),
    },
  };
}

/**
 * Defaults, then the JSON config file, then SPELLSCOPE_* environment
 * variables. A missing or malformed file contributes nothing.
 */
export function loadConfig(configPath = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): Config {
  const mergedFromFile = applyFileOverrides(DEFAULT_CONFIG, readJsonFile(configPath));
  return clampConfig(resolveEnvOverrides(mergedFromFile, env));
}

export { DEFAULT_CONFIG_PATH, DEFAULT_USER_DATA_DIR };
