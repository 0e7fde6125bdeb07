/**
 * classify.ts
 *
 * Assigns each token a semantic category. Rules are an ordered table and the
 * first match wins: a short all-caps token is an acronym even though it also
 * starts with a capital letter.
 */

export type Category = "normal" | "codeIdentifier" | "acronym" | "properNoun" | "technicalTerm";

export interface TokenPosition {
  /** First word of the document or of a sentence. */
  sentenceStart?: boolean;
}

interface ClassifyContext {
  token: string;
  chars: string[];
  isCodeContext: boolean;
  position: TokenPosition;
}

interface CategoryRule {
  category: Category;
  matches(ctx: ClassifyContext): boolean;
}

const MAX_ACRONYM_LEN = 6;
const MIN_PROPER_NOUN_LEN = 3;
const MIN_TECHNICAL_TERM_LEN = 6;

// Capitalized function words that are not names.
const COMMON_CAPITALIZED = new Set(["I", "A", "The", "And", "But", "Or", "For", "Nor", "Yet", "So"]);

const isUpper = (ch: string) => /\p{Lu}/u.test(ch);
const isLower = (ch: string) => /\p{Ll}/u.test(ch);
const isDigit = (ch: string) => /\p{N}/u.test(ch);

export const CATEGORY_RULES: readonly CategoryRule[] = [
  {
    category: "acronym",
    matches: ({ chars }) =>
      chars.length <= MAX_ACRONYM_LEN && chars.every((ch) => isUpper(ch) || isDigit(ch) || ch === "_"),
  },
  {
    category: "properNoun",
    matches: ({ token, chars, position }) =>
      isUpper(chars[0]) &&
      chars.length >= MIN_PROPER_NOUN_LEN &&
      !COMMON_CAPITALIZED.has(token) &&
      !position.sentenceStart,
  },
  {
    category: "codeIdentifier",
    matches: ({ token, chars, isCodeContext }) =>
      isCodeContext &&
      (token.includes("_") ||
        (chars.some(isUpper) && chars.some(isLower)) ||
        token.startsWith("get_") ||
        token.startsWith("set_") ||
        token.endsWith("_t") ||
        token.endsWith("_ptr")),
  },
  {
    category: "technicalTerm",
    matches: ({ token, chars }) => token.includes("-") && chars.length >= MIN_TECHNICAL_TERM_LEN,
  },
];

export function classify(token: string, isCodeContext: boolean, position: TokenPosition = {}): Category {
  if (!token) return "normal";
  const ctx: ClassifyContext = { token, chars: [...token], isCodeContext, position };
  for (const rule of CATEGORY_RULES) {
    if (rule.matches(ctx)) return rule.category;
  }
  return "normal";
}
