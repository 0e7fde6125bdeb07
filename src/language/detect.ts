/**
 * detect.ts
 *
 * Heuristic language detection from raw text: share of common function words
 * for Latin-script languages, and script ranges for CJK text.
 */

import fs from "node:fs";
import { Languages, isAutoDetect, languageFromCode, type ConcreteLanguage, type Language } from "./catalog.js";

const COMMON_WORDS_URL = new URL("../../data/common-words.json", import.meta.url);

const MAX_WORDS_CHECKED = 50;
const MIN_SCORE = 10;
const ACCEPT_SCORE = 25;
const CJK_RATIO = 0.3;

export interface LanguageScore {
  language: ConcreteLanguage;
  score: number;
}

let commonWords: Map<ConcreteLanguage, Set<string>> | null = null;

function loadCommonWords(): Map<ConcreteLanguage, Set<string>> {
  if (commonWords) return commonWords;
  const raw: unknown = JSON.parse(fs.readFileSync(COMMON_WORDS_URL, "utf8"));
  const out = new Map<ConcreteLanguage, Set<string>>();
  if (raw && typeof raw === "object" && !Array.isArray(raw)) {
    for (const [code, words] of Object.entries(raw)) {
      const language = languageFromCode(code);
      if (isAutoDetect(language) || !Array.isArray(words)) continue;
      out.set(language, new Set(words.filter((w): w is string => typeof w === "string")));
    }
  }
  commonWords = out;
  return out;
}

const isHan = (cp: number) => cp >= 0x4e00 && cp <= 0x9fff;
const isKana = (cp: number) => (cp >= 0x3040 && cp <= 0x309f) || (cp >= 0x30a0 && cp <= 0x30ff);
const isHangul = (cp: number) => cp >= 0xac00 && cp <= 0xd7af;

export function isCjkText(text: string): boolean {
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (isHan(cp) || isKana(cp) || isHangul(cp)) return true;
  }
  return false;
}

/**
 * Up to three candidate languages, best first. Non-CJK text with fewer than
 * three words is assumed to be English.
 */
export function detectLanguageScores(text: string): LanguageScore[] {
  const cjk = detectCjkScript(text);
  const words = text.toLowerCase().split(/\s+/).filter(Boolean);
  if (words.length < 3 && !cjk) return [{ language: Languages.English, score: 100 }];

  const scores = new Map<ConcreteLanguage, number>();
  const sample = words.slice(0, MAX_WORDS_CHECKED);

  for (const [language, common] of loadCommonWords()) {
    const matches = sample.filter((word) => common.has(word)).length;
    const score = (matches / Math.max(sample.length, 1)) * 100;
    if (score > MIN_SCORE) scores.set(language, score);
  }

  if (cjk) scores.set(cjk, 100);
  if (scores.size === 0) scores.set(Languages.English, 80);

  return [...scores.entries()]
    .map(([language, score]) => ({ language, score }))
    .sort((a, b) => b.score - a.score)
    .slice(0, 3);
}

/** The CJK language whose script dominates the text, if any. */
function detectCjkScript(text: string): ConcreteLanguage | null {
  let han = 0;
  let kana = 0;
  let hangul = 0;
  let total = 0;
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    total += 1;
    if (isHan(cp)) han += 1;
    else if (isKana(cp)) kana += 1;
    else if (isHangul(cp)) hangul += 1;
  }

  if ((han + kana + hangul) / Math.max(total, 1) <= CJK_RATIO) return null;
  // Kana only appears in Japanese, so it outranks shared Han characters.
  if (kana > 0) return Languages.Japanese;
  if (han > 0) return Languages.Chinese;
  return Languages.Korean;
}

export function detectLanguage(text: string): ConcreteLanguage {
  if (!text.trim()) return Languages.English;
  const [best] = detectLanguageScores(text);
  if (best && best.score > ACCEPT_SCORE) return best.language;
  return Languages.English;
}

/** AutoDetect resolves against the text; every other language passes through. */
export function resolveLanguage(language: Language, text: string): ConcreteLanguage {
  return isAutoDetect(language) ? detectLanguage(text) : language;
}
