const encoder = new TextEncoder();
const decoder = new TextDecoder();
const strictDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Bytes that are not valid UTF-8 where text was required.
 */
export class Utf8DecodeError extends Error {
  constructor(
    readonly bytes: Uint8Array,
    options?: ErrorOptions,
  ) {
    super(`Invalid UTF-8 in ${bytes.length} byte(s)`, options);
    this.name = "Utf8DecodeError";
  }
}

/**
 * Encode string to UTF-8 bytes.
 */
export function encodeString(text: string): Uint8Array {
  return encoder.encode(text);
}

/**
 * Decode UTF-8 bytes to string. Malformed sequences become U+FFFD.
 */
export function decodeString(data: Uint8Array): string {
  return decoder.decode(data);
}

/**
 * Decode UTF-8 bytes to string, refusing malformed sequences.
 *
 * @throws Utf8DecodeError when the bytes are not valid UTF-8
 */
export function decodeStrictString(data: Uint8Array): string {
  try {
    return strictDecoder.decode(data);
  } catch (error) {
    throw new Utf8DecodeError(data, { cause: error });
  }
}

/**
 * Drop one trailing "\n" (and a preceding "\r"), the way command output
 * is usually read.
 */
export function chomp(text: string): string {
  if (text.endsWith("\r\n")) return text.slice(0, -2);
  if (text.endsWith("\n")) return text.slice(0, -1);
  return text;
}
