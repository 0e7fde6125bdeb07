import assert from "node:assert/strict";
import test from "node:test";

import { Languages } from "./catalog.js";
import { detectLanguage, detectLanguageScores, isCjkText, resolveLanguage } from "./detect.js";

test("detectLanguage picks English from common function words", () => {
  assert.equal(detectLanguage("the cat and the dog with their friends"), Languages.English);
});

test("detectLanguageScores ranks German above Afrikaans for German text", () => {
  const scores = detectLanguageScores("der Hund und die Katze sind nicht im Haus");
  assert.equal(scores[0].language, Languages.German);
  assert.equal(scores[1].language, Languages.Afrikaans);
  assert.ok(scores[0].score > scores[1].score);
  assert.equal(scores.length, 2);
});

test("short non-CJK text defaults to English", () => {
  assert.deepEqual(detectLanguageScores("hi there"), [{ language: Languages.English, score: 100 }]);
  assert.equal(detectLanguage("   "), Languages.English);
});

test("unrecognised words fall back to English at 80", () => {
  assert.deepEqual(detectLanguageScores("xyz qqq zzz"), [{ language: Languages.English, score: 80 }]);
  assert.equal(detectLanguage("xyz qqq zzz"), Languages.English);
});

test("CJK scripts are detected without whitespace-separated words", () => {
  assert.equal(detectLanguage("これは日本語です"), Languages.Japanese);
  assert.equal(detectLanguage("中文文本"), Languages.Chinese);
  assert.equal(detectLanguage("한국어 문장"), Languages.Korean);
  assert.ok(isCjkText("abc 漢"));
  assert.ok(!isCjkText("plain text"));
});

test("resolveLanguage only rewrites AutoDetect", () => {
  assert.equal(resolveLanguage(Languages.French, "der und die das"), Languages.French);
  assert.equal(resolveLanguage(Languages.AutoDetect, "der und die das mit"), Languages.German);
});
