/**
 * Raw values a stub can answer with, before they are decoded into what the
 * request asked for. The union is closed: decoding switches on `type`.
 */

export class TextBody {
  public readonly type = "text";

  constructor(public readonly value: string) {}
}

export class BytesBody {
  public readonly type = "bytes";

  constructor(public readonly value: Uint8Array) {}
}

/**
 * A byte stream. It can be read once: the source iterator is taken when the
 * body is created, and decoding a stream that was already read yields no
 * bytes.
 */
export class StreamBody {
  public readonly type = "stream";
  public readonly value: Iterator<Uint8Array>;

  constructor(source: Iterable<Uint8Array>) {
    this.value = source[Symbol.iterator]();
  }
}

/**
 * Any other value (numbers, plain objects, ...). It is handed over untouched
 * and never coerced to text or bytes.
 */
export class OpaqueBody {
  public readonly type = "other";

  constructor(public readonly value: unknown) {}
}

export type RawBody = TextBody | BytesBody | StreamBody | OpaqueBody;

export function isRawBody(value: unknown): value is RawBody {
  return (
    value instanceof TextBody ||
    value instanceof BytesBody ||
    value instanceof StreamBody ||
    value instanceof OpaqueBody
  );
}

/**
 * Classifies a stubbed value: strings are text, `Uint8Array`s (Buffers
 * included) are bytes, raw bodies stay as they are, everything else is
 * opaque. Streams are never inferred; build them with {@link streamOf}.
 */
export function toRawBody(value: unknown): RawBody {
  if (isRawBody(value)) {
    return value;
  }
  if (typeof value === "string") {
    return new TextBody(value);
  }
  if (value instanceof Uint8Array) {
    return new BytesBody(value);
  }
  return new OpaqueBody(value);
}

export function streamOf(...chunks: Uint8Array[]): StreamBody {
  return new StreamBody(chunks);
}

export function describeRawBody(body: RawBody): string {
  switch (body.type) {
    case "text":
      return `text(${body.value.length} chars)`;
    case "bytes":
      return `bytes(${body.value.byteLength})`;
    case "stream":
      return "stream";
    case "other":
      return `other(${typeof body.value})`;
  }
}

/**
 * Serializes an opaque stubbed value as JSON.
 *
 * @returns The JSON text, or `undefined` when the value has no JSON form
 * (functions, `undefined`, bigints, circular structures)
 */
export function toJsonText(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}
