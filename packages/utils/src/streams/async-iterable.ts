import { encodeString } from "./encoding.js";

/**
 * Anything that can be fed to a store or a process as bytes.
 */
export type ByteSource = Uint8Array | string | Iterable<Uint8Array> | AsyncIterable<Uint8Array>;

/**
 * Check if input is async iterable.
 */
export function isAsyncIterable<T>(input: unknown): input is AsyncIterable<T> {
  return input !== null && typeof input === "object" && Symbol.asyncIterator in input;
}

/**
 * Normalize sync or async iterable to async iterable.
 */
export function asAsyncIterable<T>(input: AsyncIterable<T> | Iterable<T>): AsyncIterable<T> {
  if (isAsyncIterable<T>(input)) {
    return input;
  }
  return {
    async *[Symbol.asyncIterator]() {
      yield* input;
    },
  };
}

/**
 * Turn a byte source into a stream of non-empty chunks.
 *
 * Strings are UTF-8 encoded. A single Uint8Array is yielded as one chunk
 * rather than iterated byte by byte.
 */
export async function* toByteChunks(source: ByteSource): AsyncGenerator<Uint8Array> {
  if (typeof source === "string") {
    if (source.length > 0) yield encodeString(source);
    return;
  }
  if (source instanceof Uint8Array) {
    if (source.length > 0) yield source;
    return;
  }
  for await (const chunk of asAsyncIterable(source)) {
    if (chunk.length > 0) yield chunk;
  }
}
