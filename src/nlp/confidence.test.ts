import assert from "node:assert/strict";
import test from "node:test";

import { calculateConfidence } from "./confidence.js";

const close = (actual: number, expected: number) =>
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${expected}, got ${actual}`);

test("correct words always score 1", () => {
  assert.equal(calculateConfidence("anything", "codeIdentifier", true), 1);
});

test("misses are weighted by category", () => {
  close(calculateConfidence("quikc", "normal", false), 0.6);
  close(calculateConfidence("Teh", "normal", false), 0.6);
  close(calculateConfidence("Londn", "properNoun", false), 0.3);
  close(calculateConfidence("getVal", "codeIdentifier", false), 0.15);
  close(calculateConfidence("XQZ", "acronym", false), 0.2);
});

test("very short and very long tokens are damped", () => {
  close(calculateConfidence("qz", "normal", false), 0.18);
  close(calculateConfidence("abcdefghijklmnopqrstu", "normal", false), 0.42);
});

test("separators and typo-prone clusters raise confidence", () => {
  close(calculateConfidence("wrd-thing", "technicalTerm", false), 0.44);
  close(calculateConfidence("recieve", "normal", false), 0.78);
  close(calculateConfidence("beleive-thing", "technicalTerm", false), 0.572);
});

test("scores stay within [0, 1]", () => {
  const score = calculateConfidence("definately-achievable-arrangement", "normal", false);
  assert.ok(score >= 0 && score <= 1);
});
