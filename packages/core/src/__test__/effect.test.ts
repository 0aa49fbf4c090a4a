import { describe, test } from "node:test";
import * as assert from "node:assert";
import { asyncEffect, syncEffect } from "../effect";

describe("Effect wrappers", () => {
  test("Sync wrap returns the value directly", () => {
    assert.strictEqual(syncEffect.wrap(() => 42), 42);
    assert.strictEqual(syncEffect.flatten(() => "done"), "done");
  });

  test("Sync wrap lets errors escape unchanged", () => {
    const failure = new Error("boom");
    assert.throws(
      () =>
        syncEffect.wrap(() => {
          throw failure;
        }),
      (error: unknown) => error === failure
    );
  });

  test("Async wrap defers the computation", async () => {
    let ran = false;
    const result = asyncEffect.wrap(() => {
      ran = true;
      return 42;
    });
    assert.strictEqual(ran, false);
    assert.strictEqual(await result, 42);
    assert.strictEqual(ran, true);
  });

  test("Async wrap rejects with the original error", async () => {
    const failure = new Error("boom");
    await assert.rejects(
      asyncEffect.wrap(() => {
        throw failure;
      }),
      (error: unknown) => error === failure
    );
  });

  test("Async flatten does not nest promises", async () => {
    const value = await asyncEffect.flatten(() => Promise.resolve(7));
    assert.strictEqual(value, 7);
  });

  test("RunToPromise turns a sync failure into a rejection", async () => {
    const failure = new Error("boom");
    await assert.rejects(
      syncEffect.runToPromise<number>(() => {
        throw failure;
      }),
      (error: unknown) => error === failure
    );
    assert.strictEqual(await syncEffect.runToPromise(() => 3), 3);
    assert.strictEqual(await asyncEffect.runToPromise(() => Promise.resolve(4)), 4);
  });
});
