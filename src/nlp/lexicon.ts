/**
 * lexicon.ts
 *
 * Token-skip heuristics for spell checking.
 *
 * Two kinds of rules live here:
 *
 *   - Structural/orthographic shape tests that say "this token is not a
 *     dictionary word at all": numeric-heavy tokens, and in code context
 *     identifiers shaped like snake_case, camelCase or FooManager.
 *   - Per-category skip lists: known acronyms and known proper nouns are
 *     reported correct without a dictionary lookup, as are trivially short,
 *     numeric, hex and dunder code identifiers.
 *
 * Skip lists are owned by a Lexicon instance so each checker can carry its
 * own and tests stay isolated.
 */

import type { Category } from "./classify.js";

export const MIN_NUMERIC_LETTERS = 3;
const MAX_SKIPPED_IDENTIFIER_LEN = 3;

const CODE_PREFIXES = ["get_", "set_", "is_", "has_"];
const CODE_SUFFIXES = ["_t", "_ptr", "Handler", "Service", "Manager", "Factory"];

export function codePointLength(token: string): number {
  return [...token].length;
}

/** A digit is present and there are fewer than three letters: 4th, v2, x86. */
export function isNumericHeavy(token: string): boolean {
  if (!/\p{N}/u.test(token)) return false;
  const letters = token.match(/\p{L}/gu)?.length ?? 0;
  return letters < MIN_NUMERIC_LETTERS;
}

/**
 * Returns true if the token is shaped like a code identifier, independent of
 * how the classifier categorised it.
 */
export function hasCodeIdentifierShape(token: string): boolean {
  // snake_case with the underscore inside the word
  if (token.includes("_") && !token.startsWith("_") && !token.endsWith("_")) return true;

  // camelCase or PascalCase with multiple humps: myFunction, getUserById, XMLParser
  if (/\p{Ll}\p{Lu}/u.test(token) || /\p{Lu}{2,}\p{Ll}/u.test(token)) return true;

  if (CODE_PREFIXES.some((prefix) => token.startsWith(prefix))) return true;
  if (CODE_SUFFIXES.some((suffix) => token.length > suffix.length && token.endsWith(suffix))) return true;

  return false;
}

export interface LexiconOptions {
  acronyms?: Iterable<string>;
  properNouns?: Iterable<string>;
}

export class Lexicon {
  private readonly acronyms = new Set<string>();
  private readonly properNouns = new Set<string>();

  public constructor(options: LexiconOptions = {}) {
    this.addAcronyms(options.acronyms ?? []);
    this.addProperNouns(options.properNouns ?? []);
  }

  /** Case-insensitive. */
  public addAcronyms(words: Iterable<string>): void {
    for (const w of words) {
      const key = w.trim().toLowerCase();
      if (key) this.acronyms.add(key);
    }
  }

  /** Case-insensitive. */
  public addProperNouns(words: Iterable<string>): void {
    for (const w of words) {
      const key = w.trim().toLowerCase();
      if (key) this.properNouns.add(key);
    }
  }

  public isKnownAcronym(token: string): boolean {
    return this.acronyms.has(token.toLowerCase());
  }

  public isKnownProperNoun(token: string): boolean {
    return this.properNouns.has(token.toLowerCase());
  }

  /**
   * Returns true if this token should be reported correct without any
   * dictionary lookup or tracking.
   */
  public shouldSkip(token: string, category: Category): boolean {
    switch (category) {
      case "acronym":
        return this.isKnownAcronym(token);
      case "codeIdentifier":
        return (
          codePointLength(token) <= MAX_SKIPPED_IDENTIFIER_LEN ||
          /^\p{N}+$/u.test(token) ||
          token.startsWith("0x") ||
          token.includes("__")
        );
      case "properNoun":
        return this.isKnownProperNoun(token);
      case "normal":
      case "technicalTerm":
        return false;
    }
  }
}
