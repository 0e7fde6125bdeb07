import assert from "node:assert/strict";
import test from "node:test";

import { SpellError, asSpellError, isSpellErrorCode } from "./errors.js";

test("asSpellError prefixes the underlying message and keeps the cause", () => {
  const cause = new Error("EACCES: permission denied");
  const wrapped = asSpellError(cause, { code: "IO", message: "Could not write word list a.txt", path: "a.txt" });

  assert.equal(wrapped.code, "IO");
  assert.equal(wrapped.message, "Could not write word list a.txt: EACCES: permission denied");
  assert.equal(wrapped.path, "a.txt");
  assert.equal(wrapped.cause, cause);
});

test("asSpellError passes SpellErrors through and stringifies other values", () => {
  const original = new SpellError({ code: "INVALID_WORD", message: "too short" });
  assert.equal(asSpellError(original, { code: "IO" }), original);
  assert.equal(asSpellError("disk full").message, "disk full");
  assert.equal(asSpellError("disk full").code, "IO");
});

test("isSpellErrorCode matches only the given code", () => {
  const error = new SpellError({ code: "DICTIONARY_NOT_FOUND", message: "none" });
  assert.equal(isSpellErrorCode(error, "DICTIONARY_NOT_FOUND"), true);
  assert.equal(isSpellErrorCode(error, "IO"), false);
  assert.equal(isSpellErrorCode(new Error("none"), "DICTIONARY_NOT_FOUND"), false);
});
