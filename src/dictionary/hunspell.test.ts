import assert from "node:assert/strict";
import test from "node:test";

import { createAffixOracle, loadBundledEnglishOracle } from "./hunspell.js";

test("createAffixOracle answers membership from an inline Hunspell pair", () => {
  const oracle = createAffixOracle("SET UTF-8\n", "2\nhello\nworld\n");
  assert.equal(oracle.correct("hello"), true);
  assert.equal(oracle.correct("world"), true);
  assert.equal(oracle.correct("helo"), false);
});

test("the bundled English oracle accepts inflected forms and is loaded once", async () => {
  const [first, second] = await Promise.all([loadBundledEnglishOracle(), loadBundledEnglishOracle()]);
  assert.equal(first, second);
  assert.equal(first.correct("walked"), true);
  assert.equal(first.correct("wlaked"), false);
  assert.equal(await loadBundledEnglishOracle(), first);
});
