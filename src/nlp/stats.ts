/**
 * stats.ts
 *
 * Text statistics that sit beside spell checking: word extraction and
 * frequency, reading time, accuracy, and building a word list from a corpus.
 */

import { isCjkLanguage, normalizeWord, type Language } from "../language/catalog.js";
import { codePointLength } from "./lexicon.js";
import { splitLines, tokenizeLine, type TokenPattern } from "./tokenize.js";

const WORDS_PER_MINUTE = 200;

// Keywords and short forms that carry no spelling signal in source code.
const CODE_SYMBOLS = new Set([
  "var", "val", "fn", "def", "func", "cls", "obj", "arr", "vec", "str",
  "int", "num", "bool", "float", "double", "char", "byte", "ptr", "ref",
  "mut", "const", "static", "pub", "priv", "prot", "async", "await",
  "try", "catch", "throw", "null", "nil", "none", "some", "ok", "err",
  "true", "false", "self", "this", "super", "new", "del", "inc", "dec",
]);

export interface WordCount {
  word: string;
  count: number;
}

export interface ReadingTime {
  minutes: number;
  seconds: number;
}

function isCodeNoise(word: string): boolean {
  if (CODE_SYMBOLS.has(word)) return true;
  if (word.includes("_") && word.length > 5) return true;
  return /\p{Lu}/u.test(word) && word.length > 3;
}

function* tokens(text: string, pattern: TokenPattern): Generator<string> {
  for (const line of splitLines(text)) {
    for (const token of tokenizeLine(line, pattern)) yield token.text;
  }
}

/**
 * Words in document order. Prose and code words are lower-cased; CJK runs
 * are kept verbatim. Code mode drops keywords and identifier-like words.
 */
export function extractWords(text: string, isCjk: boolean, isCode: boolean): string[] {
  if (isCjk) return [...tokens(text, "cjk")];
  if (isCode) {
    const out: string[] = [];
    for (const word of tokens(text, "code")) {
      if (!isCodeNoise(word)) out.push(word.toLowerCase());
    }
    return out;
  }
  return [...tokens(text, "prose")].map((word) => word.toLowerCase());
}

export function wordFrequency(text: string, isCjk: boolean, isCode: boolean): Map<string, number> {
  const freq = new Map<string, number>();
  for (const word of extractWords(text, isCjk, isCode)) {
    freq.set(word, (freq.get(word) ?? 0) + 1);
  }
  return freq;
}

/** Highest counts first; equal counts alphabetically. */
export function mostCommonWords(freq: ReadonlyMap<string, number>, n: number): WordCount[] {
  return [...freq.entries()]
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0))
    .slice(0, Math.max(0, n));
}

export function readingTime(text: string): ReadingTime {
  const words = extractWords(text, false, false).length;
  return {
    minutes: Math.floor(words / WORDS_PER_MINUTE),
    seconds: Math.floor(((words % WORDS_PER_MINUTE) * 60) / WORDS_PER_MINUTE),
  };
}

/** Whole-number percentage; an empty document is 100% accurate. */
export function calculateAccuracy(correct: number, total: number): number {
  if (total <= 0) return 100;
  return Math.round((correct / total) * 100);
}

/** Keep letters and digits, plus apostrophes and hyphens that sit between letters. */
export function sanitizeWord(word: string): string {
  const chars = [...word.trim()];
  let out = "";
  chars.forEach((ch, i) => {
    if (/[\p{L}\p{N}]/u.test(ch)) {
      out += ch;
    } else if ((ch === "'" || ch === "-") && /\p{L}/u.test(chars[i - 1] ?? "") && /\p{L}/u.test(chars[i + 1] ?? "")) {
      out += ch;
    }
  });
  return out;
}

export function isValidWord(word: string): boolean {
  const trimmed = word.trim();
  return codePointLength(trimmed) >= 2 && /\p{L}/u.test(trimmed);
}

/** Distinct normalized words, sorted, ready to write out as a dictionary file. */
export function buildWordList(text: string, language: Language, minLength = 2): string[] {
  const pattern: TokenPattern = isCjkLanguage(language) ? "cjk" : "prose";
  const words = new Set<string>();
  for (const token of tokens(text, pattern)) {
    const word = normalizeWord(sanitizeWord(token), language);
    if (codePointLength(word) >= minLength && isValidWord(word)) words.add(word);
  }
  return [...words].sort();
}
