import { describe, test } from "node:test";
import * as assert from "node:assert";
import HttpRequest, { isHttpMethod } from "../models/http-request";
import { asByteArray, ResponseAsString } from "../body/response-as";
import { TextBody } from "../body/raw-body";
import { syncEffect } from "../effect";
import type { Backend } from "../backend";
import type { HttpResponse } from "../models/http-response";

describe("HttpRequest", () => {
  test("Factories set method and URI", () => {
    const request = HttpRequest.post("http://example.org/users", "payload");
    assert.strictEqual(request.method, "POST");
    assert.deepStrictEqual(request.uri.path, ["users"]);
    assert.strictEqual(request.data, "payload");
    assert.strictEqual(request.toString(), "POST http://example.org/users");
  });

  test("Reads the body as UTF-8 text by default", () => {
    const request = HttpRequest.get("http://example.org");
    assert.ok(request.responseAs instanceof ResponseAsString);
    assert.strictEqual(request.responseAs.charset, "utf-8");
  });

  test("Header returns a new request", () => {
    const original = HttpRequest.get("http://example.org");
    const withHeader = original.header("Accept", "text/plain");
    assert.deepStrictEqual(original.headers, {});
    assert.deepStrictEqual(withHeader.headers, { Accept: "text/plain" });
  });

  test("Response replaces the response spec", () => {
    const request = HttpRequest.get("http://example.org").response(
      asByteArray()
    );
    assert.strictEqual(request.responseAs.kind, "bytes");
  });

  test("MapResponse chains transforms", () => {
    const request = HttpRequest.get("http://example.org")
      .mapResponse((text) => parseInt(text, 10))
      .mapResponse((value) => value * 2);
    assert.deepStrictEqual(request.responseAs.adjust(new TextBody("10")), {
      matched: true,
      value: 20,
    });
  });

  test("Send hands the request to the backend", () => {
    const seen: string[] = [];
    const backend: Backend<"sync"> = {
      effect: syncEffect,
      send<T>(request: HttpRequest<T>): HttpResponse<T> {
        seen.push(request.toString());
        return {
          status: 204,
          statusText: "No Content",
          headers: {},
          body: { ok: false, reason: "status", error: "" },
        };
      },
    };

    const response = HttpRequest.delete("http://example.org/users/1").send(
      backend
    );
    assert.strictEqual(response.status, 204);
    assert.deepStrictEqual(seen, ["DELETE http://example.org/users/1"]);
  });

  test("Recognizes HTTP methods", () => {
    assert.strictEqual(isHttpMethod("PATCH"), true);
    assert.strictEqual(isHttpMethod("patch"), false);
    assert.strictEqual(isHttpMethod("FETCH"), false);
  });
});
