import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { DEFAULT_CONFIG, DictionaryManager, analyze, type Config } from "./index.js";

test("analyze runs a one-shot check with per-call options", () => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "spellscope-index-"));
  try {
    fs.writeFileSync(path.join(root, "dictionary(eng).txt"), "the\nquick\nfox\n");
    const config: Config = {
      ...DEFAULT_CONFIG,
      dictionary: { ...DEFAULT_CONFIG.dictionary, searchDirs: [root], userDataDir: path.join(root, "user") },
    };
    const manager = new DictionaryManager(config.dictionary);

    const strict = analyze("Teh quikc fox", "en", null, { confidenceThreshold: 0.6, maxSuggestions: 1 }, { config, manager });
    assert.equal(strict.misspelledWords, 2);
    assert.equal(strict.accuracy, 33);
    assert.deepEqual(strict.words[0].suggestions, ["The"]);

    const lenient = analyze("Teh quikc fox", "eng", null, {}, { config, manager });
    assert.equal(lenient.misspelledWords, 0);
    assert.deepEqual(manager.loadedLanguages(), ["eng"]);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});
