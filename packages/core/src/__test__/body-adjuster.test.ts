import { describe, test } from "node:test";
import * as assert from "node:assert";
import { adjustBody } from "../body/body-adjuster";
import { asAny, asByteArray, asString, ignore } from "../body/response-as";
import {
  BytesBody,
  OpaqueBody,
  StreamBody,
  TextBody,
  describeRawBody,
  streamOf,
  toJsonText,
  toRawBody,
} from "../body/raw-body";

const encoder = new TextEncoder();

describe("Raw body classification", () => {
  test("Strings are text, byte arrays are bytes", () => {
    assert.ok(toRawBody("hello") instanceof TextBody);
    assert.ok(toRawBody(encoder.encode("hello")) instanceof BytesBody);
  });

  test("Other values are opaque", () => {
    assert.ok(toRawBody(10) instanceof OpaqueBody);
    assert.ok(toRawBody({ id: 1 }) instanceof OpaqueBody);
    assert.ok(toRawBody(undefined) instanceof OpaqueBody);
  });

  test("Raw bodies are kept", () => {
    const stream = streamOf(encoder.encode("a"));
    assert.strictEqual(toRawBody(stream), stream);
  });

  test("Serializes opaque values as JSON when they have a JSON form", () => {
    assert.strictEqual(toJsonText({ id: 1 }), '{"id":1}');
    assert.strictEqual(toJsonText(10n), undefined);
    const circular: { self?: unknown } = {};
    circular.self = circular;
    assert.strictEqual(toJsonText(circular), undefined);
  });

  test("Describes raw bodies", () => {
    assert.strictEqual(describeRawBody(new TextBody("abc")), "text(3 chars)");
    assert.strictEqual(describeRawBody(new BytesBody(new Uint8Array(4))), "bytes(4)");
    assert.strictEqual(describeRawBody(streamOf()), "stream");
    assert.strictEqual(describeRawBody(new OpaqueBody(10)), "other(number)");
  });
});

describe("Body adjustment", () => {
  test("Ignore accepts any body", () => {
    assert.deepStrictEqual(adjustBody(ignore(), 10), {
      matched: true,
      value: undefined,
    });
    assert.deepStrictEqual(adjustBody(ignore(), "text"), {
      matched: true,
      value: undefined,
    });
  });

  test("AsString keeps text", () => {
    assert.deepStrictEqual(adjustBody(asString(), "hello"), {
      matched: true,
      value: "hello",
    });
  });

  test("AsString decodes bytes with the charset", () => {
    const latin1 = new Uint8Array([0x63, 0x61, 0x66, 0xe9]);
    assert.deepStrictEqual(adjustBody(asString("latin1"), latin1), {
      matched: true,
      value: "café",
    });
    assert.deepStrictEqual(adjustBody(asString(), encoder.encode("café")), {
      matched: true,
      value: "café",
    });
  });

  test("AsString drains streams, keeping split characters whole", () => {
    const bytes = encoder.encode("zażółć");
    const stream = new StreamBody([bytes.slice(0, 3), bytes.slice(3)]);
    assert.deepStrictEqual(adjustBody(asString(), stream), {
      matched: true,
      value: "zażółć",
    });
  });

  test("AsString does not match other values", () => {
    assert.deepStrictEqual(adjustBody(asString(), 10), { matched: false });
    assert.deepStrictEqual(adjustBody(asString(), { id: 1 }), {
      matched: false,
    });
  });

  test("AsByteArray encodes text and concatenates streams", () => {
    assert.deepStrictEqual(
      adjustBody(asByteArray(), "ab"),
      { matched: true, value: new Uint8Array([0x61, 0x62]) }
    );
    assert.deepStrictEqual(
      adjustBody(asByteArray(), streamOf(new Uint8Array([1]), new Uint8Array([2, 3]))),
      { matched: true, value: new Uint8Array([1, 2, 3]) }
    );
    assert.deepStrictEqual(adjustBody(asByteArray(), 10), { matched: false });
  });

  test("A stream can only be read once", () => {
    const stream = streamOf(encoder.encode("once"));
    assert.deepStrictEqual(adjustBody(asString(), stream), {
      matched: true,
      value: "once",
    });
    assert.deepStrictEqual(adjustBody(asString(), stream), {
      matched: true,
      value: "",
    });
  });

  test("AsAny hands over the stubbed value", () => {
    const user = { id: 1 };
    assert.deepStrictEqual(adjustBody(asAny(), 10), { matched: true, value: 10 });
    assert.deepStrictEqual(adjustBody(asAny(), "ten"), {
      matched: true,
      value: "ten",
    });
    const adjusted = adjustBody(asAny(), user);
    assert.ok(adjusted.matched);
    assert.strictEqual(adjusted.value, user);
  });

  test("AsAny drains streams into bytes", () => {
    assert.deepStrictEqual(
      adjustBody(asAny(), streamOf(new Uint8Array([1]), new Uint8Array([2]))),
      { matched: true, value: new Uint8Array([1, 2]) }
    );
  });

  test("Mapped applies the transform after the inner spec", () => {
    const spec = asString().map((text) => text.length);
    assert.deepStrictEqual(adjustBody(spec, "four"), {
      matched: true,
      value: 4,
    });
  });

  test("Mapped does not call the transform on a mismatch", () => {
    let calls = 0;
    const spec = asString().map((text) => {
      calls += 1;
      return text;
    });
    assert.deepStrictEqual(adjustBody(spec, 10), { matched: false });
    assert.strictEqual(calls, 0);
  });

  test("Errors thrown by the transform propagate", () => {
    const failure = new Error("bad number");
    const spec = asString().map(() => {
      throw failure;
    });
    assert.throws(
      () => adjustBody(spec, "x"),
      (error: unknown) => error === failure
    );
  });

  test("Specs describe themselves", () => {
    assert.strictEqual(String(asString()), "asString(utf-8)");
    assert.strictEqual(String(asByteArray().map(String)), "asByteArray.map");
    assert.strictEqual(String(ignore()), "ignore");
    assert.strictEqual(String(asAny()), "asAny");
  });
});
