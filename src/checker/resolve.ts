/**
 * resolve.ts
 *
 * Decides whether one token is correctly spelled. Lookup order:
 *
 *   session ignore list → dictionary ignore list → user words
 *     → cached membership → dictionary membership
 *
 * A membership miss can still be accepted by category: names and acronyms
 * that look like words, and short code identifiers.
 *
 * Ignore and user hits are never cached because they change without a
 * cache clear. Membership verdicts are cached per language, per lookup form
 * and per code context.
 */

import type { Dictionary } from "../dictionary/dictionary.js";
import { normalizeWord } from "../language/catalog.js";
import type { Category } from "../nlp/classify.js";
import { codePointLength } from "../nlp/lexicon.js";
import type { CorrectnessCache } from "./cache.js";

export type CorrectnessSource = Pick<Dictionary, "language" | "contains" | "isIgnored" | "hasUserWord">;

export interface ResolveContext {
  dictionary: CorrectnessSource;
  cache: CorrectnessCache;
  /** Lower-cased, matched case-insensitively whatever the document's language. */
  sessionIgnored: ReadonlySet<string>;
  caseSensitive: boolean;
  isCodeContext: boolean;
}

const MIN_LETTER_RATIO = 0.7;
const MAX_REPEAT_RUN = 4;
const SHORT_NAME_LEN = 4;
const MAX_LENIENT_IDENTIFIER_LEN = 15;

/** Mostly letters, no long run of one character, and a vowel unless very short. */
export function looksReasonable(token: string): boolean {
  const chars = [...token];
  if (chars.length === 0) return false;

  const letters = chars.filter((ch) => /\p{L}/u.test(ch)).length;
  if (letters / chars.length <= MIN_LETTER_RATIO) return false;

  let run = 1;
  for (let i = 1; i < chars.length; i++) {
    run = chars[i] === chars[i - 1] ? run + 1 : 1;
    if (run > MAX_REPEAT_RUN) return false;
  }

  return chars.length <= SHORT_NAME_LEN || /[aeiouy]/i.test(token);
}

function acceptedByCategory(token: string, category: Category): boolean {
  switch (category) {
    case "properNoun":
    case "acronym":
      return looksReasonable(token);
    case "codeIdentifier":
      return codePointLength(token) <= MAX_LENIENT_IDENTIFIER_LEN;
    case "normal":
    case "technicalTerm":
      return false;
  }
}

function cacheWord(token: string, normalized: string, ctx: ResolveContext): string {
  const lookup = ctx.caseSensitive ? token.trim() : normalized;
  return ctx.isCodeContext ? `code:${lookup}` : lookup;
}

export function resolveCorrectness(token: string, category: Category, ctx: ResolveContext): boolean {
  const { dictionary, cache } = ctx;
  const normalized = normalizeWord(token, dictionary.language);

  if (ctx.sessionIgnored.has(token.trim().toLowerCase())) return true;
  if (dictionary.isIgnored(normalized)) return true;
  if (dictionary.hasUserWord(normalized)) return true;

  const key = cacheWord(token, normalized, ctx);
  let known = cache.get(dictionary.language.code, key);
  if (known === null) {
    known = dictionary.contains(token, ctx.caseSensitive, ctx.isCodeContext);
    cache.set(dictionary.language.code, key, known);
  }

  return known || acceptedByCategory(token, category);
}
