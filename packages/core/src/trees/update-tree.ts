/**
 * Tree patch engine
 *
 * Applies path-keyed blob writes and deletes to an existing tree and
 * returns the id of the resulting tree. Only the directories on the way
 * from an edited path to the root are read and rewritten; every other
 * subtree keeps its id without being listed.
 *
 * Directories are rebuilt deepest first. Each rebuilt directory queues
 * its new id (or, when it ended up empty, its removal) into the parent's
 * patch, so by the time a directory is processed all of its changed
 * children are known.
 */

import { toArray } from "@treesmith/utils";

import { InvalidEntryError, isObjectNotFound } from "../errors/index.js";
import { FileMode } from "../files/index.js";
import { isZeroId, type ObjectId, shortId } from "../id/index.js";
import type { Logger } from "../logging/index.js";
import { objectTypeForMode } from "../objects/index.js";
import type { ObjectStore } from "../store/index.js";
import { throwIfAborted } from "../utils/index.js";
import { assertPatchesApplied, DirectoryPatch } from "./directory-patch.js";
import { type BlobInfo, compareNames, type TreeEntry } from "./tree-entry.js";
import { dirDepth, normalizeTreePath, parentDir, ROOT_DIR, splitTreePath } from "./tree-paths.js";

/**
 * Edits to apply to a tree.
 */
export interface UpdateTreeRequest {
  /** Tree to start from; the zero id stands for an empty tree */
  baseTree: ObjectId;
  /** Blobs to write, keyed by slash-separated path */
  writes?: Iterable<BlobInfo>;
  /** Paths to remove; paths that do not exist are ignored */
  deletes?: Iterable<string>;
}

export interface UpdateTreeOptions {
  signal?: AbortSignal;
  logger?: Logger;
  /**
   * Rebuild sibling directories of the same depth concurrently.
   * The result does not depend on this flag.
   */
  parallel?: boolean;
}

/**
 * Apply writes and deletes to a tree.
 *
 * Writes are queued before deletes, so deleting a path that is also
 * written removes it. Directories left without entries are removed from
 * their parent; the root tree is always written, even when empty.
 *
 * @returns Id of the new tree, or `baseTree` itself when there is nothing to do
 * @throws InvalidEntryError for a path that cannot be stored, or when one
 *   request edits both a path and a path below it
 * @throws InternalInvariantError if an edit would be lost
 */
export async function updateTree(
  store: ObjectStore,
  request: UpdateTreeRequest,
  options: UpdateTreeOptions = {},
): Promise<ObjectId> {
  const { baseTree } = request;
  const { signal, logger } = options;
  const writes = [...(request.writes ?? [])];
  const deletes = [...(request.deletes ?? [])];
  if (writes.length === 0 && deletes.length === 0) {
    return baseTree;
  }
  throwIfAborted(signal);

  const patches = new Map<string, DirectoryPatch>();
  const patchFor = (dir: string): DirectoryPatch => {
    let patch = patches.get(dir);
    if (!patch) {
      patch = new DirectoryPatch(dir);
      patches.set(dir, patch);
    }
    return patch;
  };

  const edited = new Map<string, "write" | "delete">();
  for (const blob of writes) {
    const path = normalizeTreePath(blob.path);
    const { dir, name } = splitTreePath(path);
    const mode = blob.mode || FileMode.REGULAR_FILE;
    patchFor(dir).write({ mode, type: objectTypeForMode(mode), id: blob.id, name });
    edited.set(path, "write");
  }
  for (const path of deletes) {
    const normalized = normalizeTreePath(path);
    const { dir, name } = splitTreePath(normalized);
    patchFor(dir).delete(name);
    edited.set(normalized, "delete");
  }
  checkNestedEdits(edited);

  // Every ancestor of an edited directory changes too.
  for (const dir of [...patches.keys()]) {
    for (let current = dir; current !== ROOT_DIR; current = parentDir(current)) {
      patchFor(parentDir(current));
    }
  }

  const readDir = async (id: ObjectId): Promise<TreeEntry[]> => {
    const entries = await toArray(store.listTree(id, { signal }));
    return entries.sort((a, b) => compareNames(a.name, b.name));
  };

  const resolveDir = async (dir: string): Promise<ObjectId | undefined> => {
    if (isZeroId(baseTree)) {
      return undefined;
    }
    try {
      return await store.hashAt(baseTree, dir, { signal });
    } catch (error) {
      if (isObjectNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  };

  const rebuild = async (dir: string): Promise<void> => {
    throwIfAborted(signal);
    const patch = patchFor(dir);
    const currentId = await resolveDir(dir);
    const entries = patch.apply(currentId === undefined ? [] : await readDir(currentId));

    const parent = patchFor(parentDir(dir));
    const { name } = splitTreePath(dir);
    if (entries.length === 0) {
      logger?.debug?.(`update-tree: ${dir} is empty, removing it`);
      parent.delete(name);
      return;
    }
    const { id } = await store.makeTree(entries, { signal });
    logger?.debug?.(`update-tree: rebuilt ${dir} as ${shortId(id)}`);
    parent.write({ mode: FileMode.TREE, type: "tree", id, name });
  };

  const dirs = [...patches.keys()]
    .filter((dir) => dir !== ROOT_DIR)
    .sort((a, b) => dirDepth(b) - dirDepth(a) || compareNames(a, b));

  if (options.parallel) {
    for (const level of groupByDepth(dirs)) {
      await Promise.all(level.map(rebuild));
    }
  } else {
    for (const dir of dirs) {
      await rebuild(dir);
    }
  }

  throwIfAborted(signal);
  const rootEntries = patchFor(ROOT_DIR).apply(isZeroId(baseTree) ? [] : await readDir(baseTree));
  assertPatchesApplied(patches.values());
  const { id } = await store.makeTree(rootEntries, { signal });
  logger?.debug?.(`update-tree: ${shortId(baseTree)} -> ${shortId(id)}`);
  return id;
}

/**
 * Reject a request that edits a path and also something below it: the
 * rebuilt directory would replace the write or delete of its own name.
 */
function checkNestedEdits(edited: ReadonlyMap<string, "write" | "delete">): void {
  for (const path of edited.keys()) {
    for (let dir = parentDir(path); dir !== ROOT_DIR; dir = parentDir(dir)) {
      const kind = edited.get(dir);
      if (kind === "write") {
        throw new InvalidEntryError(`Cannot create ${path}: ${dir} is a file`);
      }
      if (kind === "delete") {
        throw new InvalidEntryError(`Cannot edit ${path}: ${dir} is deleted`);
      }
    }
  }
}

/**
 * Split directories (already sorted deepest first) into runs of equal depth.
 */
function groupByDepth(dirs: string[]): string[][] {
  const levels: string[][] = [];
  let depth = -1;
  for (const dir of dirs) {
    const d = dirDepth(dir);
    if (d !== depth) {
      levels.push([]);
      depth = d;
    }
    levels[levels.length - 1].push(dir);
  }
  return levels;
}
