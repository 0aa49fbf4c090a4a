import { describe, test } from "node:test";
import * as assert from "node:assert";
import Uri from "../models/uri";
import { InvalidUriError } from "../errors";

describe("Uri", () => {
  test("Splits the path into segments", () => {
    const uri = Uri.parse("http://example.org/a/b/c");
    assert.deepStrictEqual(uri.path, ["a", "b", "c"]);
  });

  test("Drops empty segments and decodes escapes", () => {
    const uri = Uri.parse("http://example.org//a%20b/c/");
    assert.deepStrictEqual(uri.path, ["a b", "c"]);
  });

  test("Keeps malformed escapes verbatim", () => {
    const uri = Uri.parse("http://example.org/100%zz");
    assert.deepStrictEqual(uri.path, ["100%zz"]);
  });

  test("Root path has no segments", () => {
    assert.deepStrictEqual(Uri.parse("http://example.org").path, []);
  });

  test("Exposes query parameters, last value wins", () => {
    const uri = Uri.parse("http://example.org/d?p=v&q=1&q=2");
    assert.deepStrictEqual({ ...uri.paramsMap }, { p: "v", q: "2" });
    assert.strictEqual(uri.param("p"), "v");
    assert.strictEqual(uri.param("missing"), undefined);
  });

  test("Missing parameters named like object members are undefined", () => {
    const uri = Uri.parse("http://example.org/d");
    assert.strictEqual(uri.param("constructor"), undefined);
    assert.strictEqual(uri.param("toString"), undefined);
    assert.strictEqual(uri.paramsMap.valueOf, undefined);
    assert.strictEqual("hasOwnProperty" in uri.paramsMap, false);
  });

  test("Parameters named like object members are read from the query", () => {
    const uri = Uri.parse("http://example.org/d?constructor=c");
    assert.strictEqual(uri.param("constructor"), "c");
    assert.deepStrictEqual(Object.keys(uri.paramsMap), ["constructor"]);
  });

  test("Exposes scheme, host and port", () => {
    const uri = Uri.parse("https://api.example.org:8443/x");
    assert.strictEqual(uri.scheme, "https");
    assert.strictEqual(uri.host, "api.example.org");
    assert.strictEqual(uri.port, 8443);
    assert.strictEqual(Uri.parse("http://example.org").port, undefined);
  });

  test("Matches path prefixes and suffixes", () => {
    const uri = Uri.parse("http://example.org/a/b/c");
    assert.strictEqual(uri.pathStartsWith("a", "b"), true);
    assert.strictEqual(uri.pathStartsWith("b"), false);
    assert.strictEqual(uri.pathStartsWith("a", "b", "c", "d"), false);
    assert.strictEqual(uri.pathEndsWith("b", "c"), true);
    assert.strictEqual(uri.pathEndsWith("a"), false);
    assert.strictEqual(uri.pathEndsWith(), true);
  });

  test("Accepts URL instances", () => {
    const uri = Uri.parse(new URL("http://example.org/users?id=1"));
    assert.strictEqual(uri.toString(), "http://example.org/users?id=1");
  });

  test("Rejects relative or malformed URLs", () => {
    assert.throws(
      () => Uri.parse("/relative/path"),
      (error: unknown) =>
        error instanceof InvalidUriError &&
        error.message === "Invalid URL format: /relative/path" &&
        error.input === "/relative/path"
    );
  });
});
