import assert from "node:assert/strict";
import test from "node:test";

import { Languages } from "../language/catalog.js";
import {
  buildWordList,
  calculateAccuracy,
  extractWords,
  isValidWord,
  mostCommonWords,
  readingTime,
  sanitizeWord,
  wordFrequency,
} from "./stats.js";

test("extractWords lower-cases prose words", () => {
  assert.deepEqual(extractWords("The cat's hat-stand, 42 x", false, false), ["the", "cat's", "hat-stand"]);
});

test("extractWords drops keywords and identifiers in code", () => {
  assert.deepEqual(extractWords("const user_name = getUser(); return value;", false, true), ["return", "value"]);
});

test("extractWords keeps CJK runs verbatim", () => {
  assert.deepEqual(extractWords("日本語 Test", true, false), ["日本語", "Test"]);
});

test("mostCommonWords orders by count, then alphabetically", () => {
  const freq = wordFrequency("beta alpha beta gamma beta alpha delta", false, false);
  assert.equal(freq.get("beta"), 3);
  assert.deepEqual(mostCommonWords(freq, 2), [
    { word: "beta", count: 3 },
    { word: "alpha", count: 2 },
  ]);
  assert.deepEqual(
    mostCommonWords(freq, 10).map((entry) => entry.word),
    ["beta", "alpha", "delta", "gamma"],
  );
});

test("readingTime assumes two hundred words per minute", () => {
  assert.deepEqual(readingTime("word ".repeat(250)), { minutes: 1, seconds: 15 });
  assert.deepEqual(readingTime(""), { minutes: 0, seconds: 0 });
});

test("calculateAccuracy rounds to a whole percentage", () => {
  assert.equal(calculateAccuracy(7, 10), 70);
  assert.equal(calculateAccuracy(2, 3), 67);
  assert.equal(calculateAccuracy(0, 0), 100);
});

test("sanitizeWord keeps inner apostrophes and hyphens only", () => {
  assert.equal(sanitizeWord("  'hello-world'! "), "hello-world");
  assert.equal(sanitizeWord("R2-D2"), "R2D2");
  assert.equal(sanitizeWord(""), "");
});

test("isValidWord needs a letter and two characters", () => {
  assert.equal(isValidWord("a1"), true);
  assert.equal(isValidWord("12"), false);
  assert.equal(isValidWord(" x "), false);
});

test("buildWordList returns distinct normalized words", () => {
  assert.deepEqual(buildWordList("Apple apple Banana ok a", Languages.English, 3), ["apple", "banana"]);
});
