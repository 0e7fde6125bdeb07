import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { SpellError } from "../errors.js";
import { Languages, customLanguage } from "../language/catalog.js";
import { DictionaryManager } from "./manager.js";

const hasCode = (code: string) => (error: unknown) => error instanceof SpellError && error.code === code;

async function withManager(run: (manager: DictionaryManager, dictDir: string, root: string) => Promise<void> | void) {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "spellscope-manager-"));
  const dictDir = path.join(root, "dicts");
  fs.mkdirSync(dictDir);
  fs.writeFileSync(path.join(dictDir, "dictionary(eng).txt"), "apple\nbanana\n");
  const manager = new DictionaryManager({
    searchDirs: [dictDir],
    userDataDir: path.join(root, "user"),
    minWordLength: 2,
    defaultLanguage: "eng",
  });
  try {
    await run(manager, dictDir, root);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
}

test("getDictionary loads once and hands out the shared instance", async () => {
  await withManager((manager) => {
    assert.equal(manager.getCachedDictionary(Languages.English), null);
    const first = manager.getDictionary(Languages.English);
    const second = manager.getDictionary(Languages.English);
    assert.equal(first, second);
    assert.equal(manager.getCachedDictionary(Languages.English), first);
    assert.deepEqual(manager.loadedLanguages(), ["eng"]);
  });
});

test("getDictionary rejects AutoDetect", async () => {
  await withManager((manager) => {
    assert.throws(() => manager.getDictionary(Languages.AutoDetect), hasCode("UNRESOLVED_LANGUAGE"));
    assert.equal(manager.getCachedDictionary(Languages.AutoDetect), null);
  });
});

test("reloadDictionary replaces the slot with a fresh read from disk", async () => {
  await withManager((manager, dictDir) => {
    const before = manager.getDictionary(Languages.English);
    fs.writeFileSync(path.join(dictDir, "dictionary(eng).txt"), "apple\nbanana\ncherry\n");
    const after = manager.reloadDictionary(Languages.English);

    assert.notEqual(after, before);
    assert.equal(after.contains("cherry"), true);
    assert.equal(manager.getDictionary(Languages.English), after);
  });
});

test("importDictionary builds the slot from the given file plus user data", async () => {
  await withManager(async (manager, _dictDir, root) => {
    await manager.getDictionary(Languages.English).addWord("gizmo");
    const imported = path.join(root, "imported.csv");
    fs.writeFileSync(imported, "word\nkiwi\nmango\n");

    const dictionary = manager.importDictionary(imported, Languages.English);
    assert.deepEqual(dictionary.words(), ["gizmo", "kiwi", "mango"]);
    assert.equal(dictionary.contains("apple"), false);
  });
});

test("exportDictionary writes the current words", async () => {
  await withManager(async (manager, _dictDir, root) => {
    const target = path.join(root, "out.txt");
    await manager.exportDictionary(Languages.English, target);
    assert.equal(fs.readFileSync(target, "utf8"), "apple\nbanana\n");
  });
});

test("evict drops the cached instance", async () => {
  await withManager((manager) => {
    const first = manager.getDictionary(Languages.English);
    assert.equal(manager.evict(Languages.English), true);
    assert.equal(manager.evict(Languages.English), false);
    assert.notEqual(manager.getDictionary(Languages.English), first);
  });
});

test("availableLanguages lists languages with a word list, including custom ones", async () => {
  await withManager((manager, dictDir) => {
    fs.writeFileSync(path.join(dictDir, "dictionary(deu).csv"), "word\nhaus\n");
    fs.writeFileSync(path.join(dictDir, "dictionary(tlh).txt"), "qapla\n");
    const codes = manager.availableLanguages().map((language) => language.code);
    assert.deepEqual(codes, ["eng", "deu", "tlh"]);
  });
});

test("custom languages load their own list", async () => {
  await withManager((manager, dictDir) => {
    fs.writeFileSync(path.join(dictDir, "dictionary(tlh).txt"), "qapla\n");
    const dictionary = manager.getDictionary(customLanguage("tlh"));
    assert.equal(dictionary.contains("Qapla"), true);
    assert.equal(dictionary.contains("apple"), false);
  });
});
