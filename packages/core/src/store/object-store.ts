/**
 * Object store contract
 *
 * The tree patch engine and the merge-tree client are written against
 * this interface only. Implementations wrap an external content-addressed
 * store (the git executable) or keep objects in memory for tests.
 */

import type { ByteSource } from "@treesmith/utils";

import type { ObjectId } from "../id/index.js";
import type { MergeTreeRequest } from "../merge/merge-tree-types.js";
import type { TreeEntry } from "../trees/tree-entry.js";

/**
 * Options shared by every store call.
 */
export interface StoreCallOptions {
  /**
   * Cancels the call. The underlying process is terminated and the call
   * fails with OperationCanceledError.
   */
  signal?: AbortSignal;
}

export interface ListTreeOptions extends StoreCallOptions {
  /**
   * List all non-tree entries of the tree recursively, with names
   * rewritten to full paths. Subtrees themselves are not listed.
   */
  recurse?: boolean;
}

/**
 * Result of storing a tree.
 */
export interface MakeTreeResult {
  /** Id of the stored tree */
  id: ObjectId;
  /** Number of entries written */
  count: number;
}

/**
 * Content-addressed object store.
 *
 * Every call is independent: no locks are held and nothing is shared
 * between calls, so one store may serve concurrent callers.
 */
export interface ObjectStore {
  /**
   * Store a blob.
   *
   * @returns ObjectId of the blob
   * @throws StoreIOError on transport failure
   */
  writeBlob(content: ByteSource, options?: StoreCallOptions): Promise<ObjectId>;

  /**
   * Stream the content of a blob.
   *
   * @throws ObjectNotFoundError (through the stream) if the blob is unknown
   */
  readBlob(id: ObjectId, options?: StoreCallOptions): AsyncIterable<Uint8Array>;

  /**
   * Lazily list a tree's entries.
   *
   * The sequence is finite and can be iterated once. Stopping early
   * releases the underlying resources. Errors, including
   * ObjectNotFoundError, surface while iterating.
   */
  listTree(id: ObjectId, options?: ListTreeOptions): AsyncIterable<TreeEntry>;

  /**
   * Store a tree from entries given in any order.
   *
   * @throws InvalidEntryError for an entry that cannot be stored
   */
  makeTree(
    entries: Iterable<TreeEntry> | AsyncIterable<TreeEntry>,
    options?: StoreCallOptions,
  ): Promise<MakeTreeResult>;

  /**
   * Resolve the object at `path` inside a tree-ish. An empty path
   * resolves the tree-ish itself.
   *
   * @throws ObjectNotFoundError when nothing exists there
   */
  hashAt(treeish: string, path: string, options?: StoreCallOptions): Promise<ObjectId>;

  /**
   * Run the store's tree merge and stream its raw NUL-framed output.
   *
   * Use `mergeTree` to get a parsed result.
   */
  streamMergeTree(request: MergeTreeRequest, options?: StoreCallOptions): AsyncIterable<Uint8Array>;
}
