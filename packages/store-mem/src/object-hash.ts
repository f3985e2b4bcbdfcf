/**
 * Git-compatible object hashing
 *
 * Ids are the SHA-1 of "<type> <size>\0<content>", so objects stored in
 * memory get the same ids git would give them.
 */

import { createHash } from "node:crypto";
import { type ObjectId, type ObjectType, type TreeEntry, compareTreeEntries } from "@treesmith/core";
import { concatBytes, encodeString } from "@treesmith/utils";

const FULL_ID = /^[0-9a-f]{40}$/;

export function isFullObjectId(id: string): boolean {
  return FULL_ID.test(id);
}

/**
 * Compute the id of an object from its type and raw content.
 */
export function hashObject(type: ObjectType, content: Uint8Array): ObjectId {
  return createHash("sha1")
    .update(encodeString(`${type} ${content.length}\0`))
    .update(content)
    .digest("hex");
}

/**
 * Serialize tree entries in git's binary tree format:
 *
 *   <mode-without-leading-zero> SP <name> NUL <20-byte id>
 *
 * Entries are written in canonical order; the input is not modified.
 */
export function encodeTree(entries: readonly TreeEntry[]): Uint8Array {
  const parts: Uint8Array[] = [];
  for (const entry of [...entries].sort(compareTreeEntries)) {
    parts.push(encodeString(`${entry.mode.toString(8)} ${entry.name}\0`));
    parts.push(Uint8Array.from(Buffer.from(entry.id, "hex")));
  }
  return concatBytes(parts);
}
