/**
 * suggest.ts
 *
 * Correction candidates for a misspelled token.
 *
 * Candidates are dictionary words within two characters of the token's length
 * and within edit distance 2, plus whatever the dictionary's affix oracle
 * proposes. Ranking:
 *   1. Smallest edit distance (optimal string alignment, so "teh" → "the" is 1)
 *   2. Pure adjacent transposition of the input
 *   3. Smallest length difference
 *   4. Alphabetical
 * The token's casing pattern is restored onto each suggestion.
 */

import type { Dictionary } from "../dictionary/dictionary.js";
import { normalizeWord } from "../language/catalog.js";

export const MAX_SUGGESTION_DISTANCE = 2;
const MAX_LENGTH_DELTA = 2;

interface RankedCandidate {
  word: string;
  dist: number;
  lenDiff: number;
  isPureTransposition: boolean;
}

/**
 * Optimal string alignment distance (Damerau-Levenshtein restricted to one
 * edit per substring), capped at `cap + 1`. Works on code points.
 */
export function editDistance(a: string, b: string, cap = 3): number {
  const left = [...a];
  const right = [...b];
  const la = left.length;
  const lb = right.length;
  if (Math.abs(la - lb) > cap) return cap + 1;

  let prev2 = new Array<number>(lb + 1).fill(0);
  let prev = Array.from({ length: lb + 1 }, (_, i) => i);
  let curr = new Array<number>(lb + 1).fill(0);

  for (let i = 1; i <= la; i++) {
    curr[0] = i;
    for (let j = 1; j <= lb; j++) {
      const cost = left[i - 1] === right[j - 1] ? 0 : 1;
      curr[j] = Math.min(curr[j - 1] + 1, prev[j] + 1, prev[j - 1] + cost);
      if (i > 1 && j > 1 && left[i - 1] === right[j - 2] && left[i - 2] === right[j - 1]) {
        curr[j] = Math.min(curr[j], prev2[j - 2] + 1);
      }
    }
    [prev2, prev, curr] = [prev, curr, prev2];
  }
  return Math.min(prev[lb], cap + 1);
}

/** True when `b` is `a` with exactly one pair of adjacent characters swapped. */
export function isPureSwap(a: string, b: string): boolean {
  const left = [...a];
  const right = [...b];
  if (left.length !== right.length) return false;
  const pos: number[] = [];
  for (let i = 0; i < left.length; i++) {
    if (left[i] !== right[i]) pos.push(i);
    if (pos.length > 2) return false;
  }
  return (
    pos.length === 2 &&
    pos[1] === pos[0] + 1 &&
    left[pos[0]] === right[pos[1]] &&
    left[pos[1]] === right[pos[0]]
  );
}

/** All-caps input gives all-caps output, Capitalized gives Capitalized, anything else verbatim. */
export function matchCasing(original: string, suggestion: string): string {
  if (!original || !suggestion) return suggestion;
  const hasLetters = original.toLowerCase() !== original.toUpperCase();
  if (hasLetters && original === original.toUpperCase() && [...original].length > 1) {
    return suggestion.toUpperCase();
  }
  const [first, ...rest] = [...original];
  const tail = rest.join("");
  if (first !== first.toLowerCase() && tail === tail.toLowerCase()) {
    const [head, ...others] = [...suggestion];
    return head.toUpperCase() + others.join("");
  }
  return suggestion;
}

function rank(target: string, word: string): RankedCandidate | null {
  const lenDiff = Math.abs([...word].length - [...target].length);
  if (lenDiff > MAX_LENGTH_DELTA) return null;
  const dist = editDistance(target, word, MAX_SUGGESTION_DISTANCE);
  if (dist > MAX_SUGGESTION_DISTANCE) return null;
  return { word, dist, lenDiff, isPureTransposition: dist === 1 && isPureSwap(target, word) };
}

function compareCandidates(a: RankedCandidate, b: RankedCandidate): number {
  if (a.dist !== b.dist) return a.dist - b.dist;
  if (a.isPureTransposition !== b.isPureTransposition) return a.isPureTransposition ? -1 : 1;
  if (a.lenDiff !== b.lenDiff) return a.lenDiff - b.lenDiff;
  return a.word < b.word ? -1 : a.word > b.word ? 1 : 0;
}

export function generateSuggestions(token: string, dictionary: Dictionary, maxSuggestions: number): string[] {
  if (maxSuggestions <= 0) return [];
  const target = normalizeWord(token, dictionary.language);
  if (!target) return [];

  const ranked = new Map<string, RankedCandidate>();
  const consider = (word: string) => {
    const normalized = normalizeWord(word, dictionary.language);
    if (!normalized || normalized === target || ranked.has(normalized)) return;
    const candidate = rank(target, normalized);
    if (candidate) ranked.set(normalized, candidate);
  };

  for (const word of dictionary.iterateWords()) consider(word);
  for (const word of dictionary.affixOracle?.suggest(token) ?? []) consider(word);

  return [...ranked.values()]
    .sort(compareCandidates)
    .slice(0, maxSuggestions)
    .map((candidate) => matchCasing(token.trim(), candidate.word));
}
