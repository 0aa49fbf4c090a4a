import { collectChunks, decodeChunks } from "../utils/chunk-collector";
import type { RawBody } from "./raw-body";

/**
 * Outcome of converting a raw body: either the converted value, or a
 * mismatch when the raw value cannot become what was asked for.
 */
export type Adjusted<T> =
  | { readonly matched: true; readonly value: T }
  | { readonly matched: false };

export const mismatch: Adjusted<never> = { matched: false };

export function matched<T>(value: T): Adjusted<T> {
  return { matched: true, value };
}

/**
 * Text, bytes and streams become text; other values do not match.
 * Numbers are not text.
 */
export function decodeText(raw: RawBody, charset: string): Adjusted<string> {
  switch (raw.type) {
    case "text":
      return matched(raw.value);
    case "bytes":
      return matched(new TextDecoder(charset).decode(raw.value));
    case "stream":
      return matched(decodeChunks(raw.value, charset));
    case "other":
      return mismatch;
  }
}

/**
 * Bytes and streams become bytes, text is encoded as UTF-8; other values do
 * not match.
 */
export function decodeBytes(raw: RawBody): Adjusted<Uint8Array> {
  switch (raw.type) {
    case "text":
      return matched(new TextEncoder().encode(raw.value));
    case "bytes":
      return matched(raw.value);
    case "stream":
      return matched(collectChunks(raw.value));
    case "other":
      return mismatch;
  }
}

/**
 * Hands over the stubbed value itself. Streams are drained into bytes.
 */
export function decodeAny(raw: RawBody): Adjusted<unknown> {
  return matched(raw.type === "stream" ? collectChunks(raw.value) : raw.value);
}
