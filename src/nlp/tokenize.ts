/**
 * tokenize.ts
 *
 * Splits a document into lines and each line into candidate words. One token
 * pattern is chosen per document:
 *
 *   cjk    runs of Han/Kana/Hangul, or Latin words, for CJK languages
 *   code   ASCII identifiers of three or more characters, underscores included
 *   prose  Unicode letter runs with embedded apostrophes and hyphens
 *
 * Offsets are UTF-16 indices into the line, end exclusive.
 */

import fs from "node:fs";
import path from "node:path";
import { isCjkLanguage, type Language } from "../language/catalog.js";
import { codePointLength } from "./lexicon.js";

const CODE_EXTENSIONS_URL = new URL("../../data/code-extensions.json", import.meta.url);

export type TokenPattern = "cjk" | "code" | "prose";

export interface Token {
  text: string;
  start: number;
  end: number;
}

export const MIN_TOKEN_LENGTH = 2;

const PATTERN_SOURCES: Record<TokenPattern, string> = {
  cjk: String.raw`[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]+|\p{Script=Latin}\p{M}*(?:[\p{Script=Latin}\p{M}'-]*\p{Script=Latin}\p{M}*)?`,
  code: String.raw`(?<![A-Za-z0-9_])[A-Za-z_][A-Za-z_'-]+[A-Za-z_](?![A-Za-z0-9_])`,
  prose: String.raw`(?<![\p{L}\p{M}\p{N}_])\p{L}\p{M}*(?:[\p{L}\p{M}'-]*\p{L}\p{M}*)?(?![\p{L}\p{M}\p{N}_])`,
};

const CODE_INDICATORS = [
  "{",
  "}",
  "->",
  "=>",
  "fn ",
  "def ",
  "function ",
  "class ",
  "import ",
  "export ",
  "#include",
  "pub ",
  "let ",
  "const ",
  "var ",
  "return ",
];
const CODE_SNIFF_LINES = 10;
const MIN_CODE_INDICATOR_LINES = 2;

let codeExtensions: Set<string> | null = null;

function loadCodeExtensions(): Set<string> {
  if (codeExtensions) return codeExtensions;
  const raw: unknown = JSON.parse(fs.readFileSync(CODE_EXTENSIONS_URL, "utf8"));
  const list = Array.isArray(raw) ? raw.filter((ext): ext is string => typeof ext === "string") : [];
  codeExtensions = new Set(list.map((ext) => ext.toLowerCase()));
  return codeExtensions;
}

export function isCodeFile(filename: string | null | undefined): boolean {
  if (!filename) return false;
  const ext = path.extname(filename).slice(1).toLowerCase();
  return ext.length > 0 && loadCodeExtensions().has(ext);
}

/** Lines holding a code indicator among the first ten; two or more means code. */
export function isLikelyCode(text: string): boolean {
  const lines = splitLines(text);
  if (lines.length < 3) return false;

  let indicators = 0;
  for (const line of lines.slice(0, CODE_SNIFF_LINES)) {
    const trimmed = line.trim();
    const semicolon = trimmed.includes(";") && !trimmed.startsWith("//");
    if (semicolon || CODE_INDICATORS.some((marker) => trimmed.includes(marker))) indicators += 1;
  }
  return indicators >= MIN_CODE_INDICATOR_LINES;
}

/** Splits on \n and \r\n. A trailing newline does not produce an empty last line. */
export function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** Source by file extension, or by the shape of the text when there is no such hint. */
export function isCodeDocument(text: string, filenameHint?: string | null): boolean {
  return isCodeFile(filenameHint) || isLikelyCode(text);
}

export function selectPattern(language: Language, isCode: boolean): TokenPattern {
  if (isCjkLanguage(language)) return "cjk";
  return isCode ? "code" : "prose";
}

export function* tokenizeLine(line: string, pattern: TokenPattern): Generator<Token> {
  const regex = new RegExp(PATTERN_SOURCES[pattern], "gu");
  for (const match of line.matchAll(regex)) {
    const text = match[0];
    if (codePointLength(text) < MIN_TOKEN_LENGTH) continue;
    const start = match.index ?? 0;
    yield { text, start, end: start + text.length };
  }
}
