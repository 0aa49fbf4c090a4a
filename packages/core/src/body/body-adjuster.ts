import type { Adjusted } from "./decoders";
import { toRawBody } from "./raw-body";
import type { ResponseAs } from "./response-as";

/**
 * Converts a stubbed body into the type `spec` decodes to.
 *
 * Values that are not already a {@link RawBody} are classified first, so
 * `adjustBody(asString(), "10")`, `adjustBody(asString(), bytes)` and
 * `adjustBody(asString(), streamOf(bytes))` all decode to text, while
 * `adjustBody(asString(), 10)` is a mismatch.
 *
 * @param spec - How the caller wants the body decoded
 * @param raw - The stubbed body
 * @returns The decoded value, or a mismatch
 * @throws Whatever a mapping function inside `spec` throws
 */
export function adjustBody<T>(
  spec: ResponseAs<T>,
  raw: unknown
): Adjusted<T> {
  return spec.adjust(toRawBody(raw));
}
