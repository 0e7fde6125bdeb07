import assert from "node:assert/strict";
import test from "node:test";

import { CorrectnessCache } from "./cache.js";

test("verdicts are keyed by language code and word", () => {
  const cache = new CorrectnessCache();
  cache.set("eng", "hello", true);
  cache.set("fra", "hello", false);

  assert.equal(cache.get("eng", "hello"), true);
  assert.equal(cache.get("fra", "hello"), false);
  assert.equal(cache.get("deu", "hello"), null);
  assert.equal(CorrectnessCache.key("eng", "hello"), "eng_hello");
  assert.equal(cache.size(), 2);
});

test("invalidateLanguage only drops that language", () => {
  const cache = new CorrectnessCache();
  cache.set("eng", "one", true);
  cache.set("eng", "two", false);
  cache.set("fra", "un", true);

  cache.invalidateLanguage("eng");
  assert.equal(cache.has("eng", "one"), false);
  assert.equal(cache.has("fra", "un"), true);
  assert.equal(cache.size(), 1);
});

test("clear empties the cache", () => {
  const cache = new CorrectnessCache();
  cache.set("eng", "one", true);
  cache.clear();
  assert.equal(cache.size(), 0);
});

test("oldest entries are evicted past the limit", () => {
  const cache = new CorrectnessCache({ maxEntries: 2 });
  cache.set("eng", "a1", true);
  cache.set("eng", "b2", true);
  cache.set("eng", "c3", false);

  assert.equal(cache.has("eng", "a1"), false);
  assert.equal(cache.get("eng", "b2"), true);
  assert.equal(cache.get("eng", "c3"), false);
});
