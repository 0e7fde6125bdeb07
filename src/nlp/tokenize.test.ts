import assert from "node:assert/strict";
import test from "node:test";

import { Languages } from "../language/catalog.js";
import { isCodeDocument, isCodeFile, isLikelyCode, selectPattern, splitLines, tokenizeLine } from "./tokenize.js";

test("splitLines ignores a trailing newline and handles CRLF", () => {
  assert.deepEqual(splitLines("a\nb\r\nc\n"), ["a", "b", "c"]);
  assert.deepEqual(splitLines("one"), ["one"]);
  assert.deepEqual(splitLines(""), []);
});

test("prose tokens keep inner apostrophes and hyphens and skip digit-bound words", () => {
  const tokens = [...tokenizeLine("The quick-brown fox's den, fox2 a", "prose")];
  assert.deepEqual(tokens, [
    { text: "The", start: 0, end: 3 },
    { text: "quick-brown", start: 4, end: 15 },
    { text: "fox's", start: 16, end: 21 },
    { text: "den", start: 22, end: 25 },
  ]);
});

test("prose tokens cover accented letters", () => {
  const tokens = [...tokenizeLine("naïve café", "prose")].map((token) => token.text);
  assert.deepEqual(tokens, ["naïve", "café"]);
});

test("code tokens keep underscores and need three characters", () => {
  const tokens = [...tokenizeLine("let get_value_t = 1; x86 isOk()", "code")];
  assert.deepEqual(tokens, [
    { text: "let", start: 0, end: 3 },
    { text: "get_value_t", start: 4, end: 15 },
    { text: "isOk", start: 25, end: 29 },
  ]);
});

test("CJK tokens are script runs alongside Latin words", () => {
  const tokens = [...tokenizeLine("これは日本語です test", "cjk")];
  assert.deepEqual(tokens, [
    { text: "これは日本語です", start: 0, end: 8 },
    { text: "test", start: 9, end: 13 },
  ]);
});

test("tokenizeLine restarts for every call", () => {
  const first = [...tokenizeLine("alpha beta", "prose")];
  const second = [...tokenizeLine("alpha beta", "prose")];
  assert.deepEqual(first, second);
  assert.equal(first.length, 2);
});

test("isLikelyCode needs three lines and two indicator lines", () => {
  assert.equal(isLikelyCode("fn main() {\n    let x = 1;\n}\n"), true);
  assert.equal(isLikelyCode("Hello there.\nHow are you?\nFine thanks."), false);
  assert.equal(isLikelyCode("{\n}"), false);
  assert.equal(isLikelyCode("// a; b\n// c; d\nplain"), false);
});

test("isCodeFile matches known source extensions case-insensitively", () => {
  assert.equal(isCodeFile("src/main.go"), true);
  assert.equal(isCodeFile("App.TSX"), true);
  assert.equal(isCodeFile("README.md"), false);
  assert.equal(isCodeFile("Makefile"), false);
  assert.equal(isCodeFile(null), false);
});

test("selectPattern prefers CJK, then code, then prose", () => {
  assert.equal(selectPattern(Languages.Japanese, true), "cjk");
  assert.equal(selectPattern(Languages.English, true), "code");
  assert.equal(selectPattern(Languages.English, false), "prose");
});

test("isCodeDocument trusts the file extension before the text", () => {
  assert.equal(isCodeDocument("hello", "main.go"), true);
  assert.equal(isCodeDocument("fn main() {\n    let x = 1;\n}\n", null), true);
  assert.equal(isCodeDocument("hello world", "notes.md"), false);
});
