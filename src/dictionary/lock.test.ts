import assert from "node:assert/strict";
import test from "node:test";

import { acquireWriteLock, withWriteLock } from "./lock.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

test("withWriteLock runs tasks for the same key one at a time, in order", async () => {
  const events: string[] = [];
  const first = withWriteLock("eng", async () => {
    events.push("first:start");
    await tick();
    events.push("first:end");
  });
  const second = withWriteLock("eng", async () => {
    events.push("second:start");
    events.push("second:end");
  });
  await Promise.all([first, second]);
  assert.deepEqual(events, ["first:start", "first:end", "second:start", "second:end"]);
});

test("locks on different keys do not wait for each other", async () => {
  const release = await acquireWriteLock("fra");
  let ran = false;
  await withWriteLock("deu", async () => {
    ran = true;
  });
  assert.equal(ran, true);
  release();
});

test("the lock is released when the task throws", async () => {
  await assert.rejects(
    withWriteLock("spa", async () => {
      throw new Error("boom");
    }),
    /boom/,
  );
  const value = await withWriteLock("spa", async () => 42);
  assert.equal(value, 42);
});

test("a held lock delays queued tasks until it is released", async () => {
  const release = await acquireWriteLock("ita");
  let ran = false;
  const pending = withWriteLock("ita", async () => {
    ran = true;
  });
  await tick();
  assert.equal(ran, false);

  release();
  release();
  await pending;
  assert.equal(ran, true);
});
