import { FileMode } from "../files/index.js";
import type { ObjectId } from "../id/index.js";
import type { ObjectType } from "../objects/index.js";
import { isObjectType } from "../objects/index.js";
import { InvalidEntryError } from "../errors/index.js";

/**
 * Tree entry representing a file or subdirectory
 *
 * - mode: File mode (octal value as number)
 * - type: Object type the entry points to
 * - id: ObjectId of the content (blob), subtree (tree) or gitlink (commit)
 * - name: a single path segment, never containing "/"
 */
export interface TreeEntry {
  mode: number;
  type: ObjectType;
  id: ObjectId;
  name: string;
}

/**
 * Write instruction for the tree patch engine.
 *
 * Unlike TreeEntry, `path` may span several directory levels.
 * A missing or zero mode means a regular file.
 */
export interface BlobInfo {
  mode?: number;
  id: ObjectId;
  path: string;
}

/**
 * Check that a single tree entry can be written to a tree.
 *
 * @throws InvalidEntryError describing the first problem found
 */
export function validateTreeEntry(entry: TreeEntry): void {
  const { name } = entry;
  if (name === "" || name === "." || name === "..") {
    throw new InvalidEntryError(`Invalid entry name: ${JSON.stringify(name)}`);
  }
  if (name.includes("/")) {
    throw new InvalidEntryError(`Entry name ${JSON.stringify(name)} contains a slash`);
  }
  if (name.includes("\0")) {
    throw new InvalidEntryError(`Entry name ${JSON.stringify(name)} contains a NUL byte`);
  }
  if (!entry.mode) {
    throw new InvalidEntryError(`Mode not set for ${JSON.stringify(name)}`);
  }
  if (!isObjectType(entry.type)) {
    throw new InvalidEntryError(`Type not set for ${JSON.stringify(name)}`);
  }
  if ((entry.type === "tree") !== (entry.mode === FileMode.TREE)) {
    throw new InvalidEntryError(
      `Mode ${entry.mode.toString(8)} does not match type ${entry.type} for ${JSON.stringify(name)}`,
    );
  }
  if (!entry.id) {
    throw new InvalidEntryError(`Object id not set for ${JSON.stringify(name)}`);
  }
}

/**
 * Compare tree entries for canonical Git sorting.
 *
 * Git sorts tree entries by name, treating directories as if they
 * had a trailing '/'.
 */
export function compareTreeEntries(a: TreeEntry, b: TreeEntry): number {
  const aName = a.mode === FileMode.TREE ? `${a.name}/` : a.name;
  const bName = b.mode === FileMode.TREE ? `${b.name}/` : b.name;
  return compareNames(aName, bName);
}

/**
 * Plain name order, used for patch bookkeeping.
 */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
