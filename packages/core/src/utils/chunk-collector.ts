/**
 * Concatenates byte chunks into a single array.
 *
 * @param chunks - The chunks, in order
 * @returns A new array holding every byte of every chunk
 */
export function concatChunks(chunks: readonly Uint8Array[]): Uint8Array {
  const totalBytes = chunks.reduce((total, chunk) => total + chunk.length, 0);
  const combined = new Uint8Array(totalBytes);
  let offset = 0;
  for (const chunk of chunks) {
    combined.set(chunk, offset);
    offset += chunk.length;
  }
  return combined;
}

/**
 * Drains a byte iterator and returns everything it produced.
 * The iterator is left exhausted.
 *
 * @param source - The iterator to read from
 */
export function collectChunks(source: Iterator<Uint8Array>): Uint8Array {
  const chunks: Uint8Array[] = [];
  while (true) {
    const { done, value } = source.next();
    if (done) {
      break;
    }
    chunks.push(value);
  }
  return concatChunks(chunks);
}

/**
 * Decodes a byte iterator as text, chunk by chunk, so that multi-byte
 * characters split across chunks come out whole.
 *
 * @param source - The iterator to read from
 * @param encoding - Any label `TextDecoder` accepts
 * @throws {RangeError} If the encoding is not supported
 */
export function decodeChunks(
  source: Iterator<Uint8Array>,
  encoding: string
): string {
  const decoder = new TextDecoder(encoding);
  let text = "";
  while (true) {
    const { done, value } = source.next();
    if (done) {
      break;
    }
    text += decoder.decode(value, { stream: true });
  }
  return text + decoder.decode();
}
