/**
 * Object identifier (content hash in hex format)
 *
 * Produced only by the object store. SHA-1 ids have 40 hex characters,
 * abbreviated forms are accepted wherever the store accepts them.
 */
export type ObjectId = string;

/**
 * Id used to represent the absence of an object.
 */
export const ZERO_OBJECT_ID: ObjectId = "0000000000000000000000000000000000000000";

/**
 * Well-known SHA-1 of the empty tree.
 */
export const EMPTY_TREE_ID: ObjectId = "4b825dc642cb6eb9a060e54bf8d69288fbee4904";

/**
 * Check whether the id denotes "no object".
 *
 * Any all-zero string counts, so abbreviated zero ids work too.
 * The empty string is zero as well.
 */
export function isZeroId(id: ObjectId): boolean {
  for (let i = 0; i < id.length; i++) {
    if (id.charCodeAt(i) !== 0x30) {
      return false;
    }
  }
  return true;
}

/**
 * Short form of an id for log output.
 */
export function shortId(id: ObjectId): string {
  return id.length < 7 ? id : id.slice(0, 7);
}
