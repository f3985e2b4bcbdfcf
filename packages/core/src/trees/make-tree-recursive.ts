import { InvalidEntryError } from "../errors/index.js";
import { FileMode } from "../files/index.js";
import type { ObjectId } from "../id/index.js";
import { objectTypeForMode } from "../objects/index.js";
import type { ObjectStore, StoreCallOptions } from "../store/index.js";
import type { BlobInfo, TreeEntry } from "./tree-entry.js";
import { normalizeTreePath } from "./tree-paths.js";

interface DirNode {
  dirs: Map<string, DirNode>;
  files: Map<string, TreeEntry>;
}

function newDirNode(): DirNode {
  return { dirs: new Map(), files: new Map() };
}

/**
 * Build a tree from scratch out of blobs at multi-level paths.
 *
 * Unlike ObjectStore.makeTree, paths may contain slashes: intermediate
 * directories are created and stored bottom-up. A later blob at the same
 * path replaces an earlier one.
 *
 * @returns Id of the root tree (the empty tree when there are no blobs)
 * @throws InvalidEntryError if a path uses a blob as a directory
 */
export async function makeTreeRecursive(
  store: ObjectStore,
  blobs: Iterable<BlobInfo>,
  options: StoreCallOptions = {},
): Promise<ObjectId> {
  const root = newDirNode();

  for (const blob of blobs) {
    const path = normalizeTreePath(blob.path);
    const segments = path.split("/");
    const name = segments.pop() ?? path;

    let node = root;
    for (const segment of segments) {
      if (node.files.has(segment)) {
        throw new InvalidEntryError(`Cannot create ${path}: ${segment} is a file`);
      }
      let child = node.dirs.get(segment);
      if (!child) {
        child = newDirNode();
        node.dirs.set(segment, child);
      }
      node = child;
    }
    if (node.dirs.has(name)) {
      throw new InvalidEntryError(`Cannot write ${path}: it is a directory`);
    }
    const mode = blob.mode || FileMode.REGULAR_FILE;
    node.files.set(name, { mode, type: objectTypeForMode(mode), id: blob.id, name });
  }

  return storeDir(store, root, options);
}

async function storeDir(
  store: ObjectStore,
  node: DirNode,
  options: StoreCallOptions,
): Promise<ObjectId> {
  const entries: TreeEntry[] = [...node.files.values()];
  for (const [name, child] of node.dirs) {
    const id = await storeDir(store, child, options);
    entries.push({ mode: FileMode.TREE, type: "tree", id, name });
  }
  const { id } = await store.makeTree(entries, options);
  return id;
}
