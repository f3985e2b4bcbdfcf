import { concatBytes } from "./collect.js";
import { decodeStrictString } from "./encoding.js";

/** NUL byte, the record separator of git's `-z` output. */
export const NUL = 0;

/**
 * Converts an async stream of Uint8Array chunks into delimiter-separated
 * string tokens.
 *
 * Splitting happens on raw bytes before UTF-8 decoding, so a multi-byte
 * character cut across two chunks is reassembled correctly. Empty tokens
 * (two delimiters in a row) are yielded as "" since they carry meaning
 * in NUL-framed protocols. Trailing bytes without a final delimiter are
 * yielded as a last token.
 *
 * Tokens are decoded strictly: a token that is not valid UTF-8 fails the
 * stream with Utf8DecodeError instead of being altered.
 *
 * @param input The input byte stream
 * @param delimiter Separator byte (NUL by default)
 */
export async function* toTokens(
  input: Iterable<Uint8Array> | AsyncIterable<Uint8Array>,
  delimiter: number = NUL,
): AsyncGenerator<string> {
  let pending: Uint8Array[] = [];

  for await (const chunk of input) {
    let start = 0;
    for (let i = chunk.indexOf(delimiter); i >= 0; i = chunk.indexOf(delimiter, start)) {
      pending.push(chunk.subarray(start, i));
      yield decodeStrictString(concatBytes(pending));
      pending = [];
      start = i + 1;
    }
    if (start < chunk.length) {
      // Copy: the producer may reuse its buffer.
      pending.push(chunk.slice(start));
    }
  }

  if (pending.length > 0) {
    yield decodeStrictString(concatBytes(pending));
  }
}
