/**
 * In-memory ObjectStore implementation
 *
 * Keeps blobs and trees in a Map keyed by their git object id, so trees
 * built here hash exactly like trees built by git. Used by the test
 * suites and as the backing store of the fake git executor.
 */

import {
  EMPTY_TREE_ID,
  FileMode,
  InvalidEntryError,
  type ListTreeOptions,
  type MakeTreeResult,
  type MergeTreeRequest,
  type ObjectId,
  ObjectNotFoundError,
  type ObjectStore,
  type StoreCallOptions,
  type TreeEntry,
  compareTreeEntries,
  normalizeTreePath,
  throwIfAborted,
  validateTreeEntry,
} from "@treesmith/core";
import { type ByteSource, collect, toByteChunks } from "@treesmith/utils";

import { encodeMergeTreeOutput } from "./merge/merge-tree-writer.js";
import { mergeTrees } from "./merge/merge-trees.js";
import { encodeTree, hashObject, isFullObjectId } from "./object-hash.js";

type StoredObject =
  | { type: "blob"; content: Uint8Array }
  | { type: "tree"; entries: readonly TreeEntry[] };

/**
 * In-memory ObjectStore.
 *
 * Entries handed to makeTree may point at ids the store has never seen;
 * only the id format is checked, as git's mktree does with --missing.
 */
export class MemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<ObjectId, StoredObject>();

  constructor() {
    this.objects.set(EMPTY_TREE_ID, { type: "tree", entries: [] });
  }

  /** Number of stored objects, the empty tree included */
  get size(): number {
    return this.objects.size;
  }

  has(id: ObjectId): boolean {
    return this.objects.has(id);
  }

  /** Type of a stored object, undefined for unknown ids */
  typeOf(id: ObjectId): "blob" | "tree" | undefined {
    return this.objects.get(id)?.type;
  }

  async writeBlob(content: ByteSource, options: StoreCallOptions = {}): Promise<ObjectId> {
    throwIfAborted(options.signal);
    const bytes = await collect(toByteChunks(content));
    throwIfAborted(options.signal);
    const id = hashObject("blob", bytes);
    if (!this.objects.has(id)) {
      this.objects.set(id, { type: "blob", content: bytes });
    }
    return id;
  }

  async *readBlob(id: ObjectId, options: StoreCallOptions = {}): AsyncGenerator<Uint8Array> {
    throwIfAborted(options.signal);
    const object = this.objects.get(id);
    if (object?.type !== "blob") {
      throw new ObjectNotFoundError(id, `Not a valid blob: ${id}`);
    }
    yield object.content.slice();
  }

  async *listTree(id: ObjectId, options: ListTreeOptions = {}): AsyncGenerator<TreeEntry> {
    throwIfAborted(options.signal);
    const entries = this.getTree(id);
    if (!options.recurse) {
      for (const entry of entries) {
        yield { ...entry };
      }
      return;
    }
    yield* this.walkTree(entries, "", options.signal);
  }

  async makeTree(
    entries: Iterable<TreeEntry> | AsyncIterable<TreeEntry>,
    options: StoreCallOptions = {},
  ): Promise<MakeTreeResult> {
    throwIfAborted(options.signal);
    const collected: TreeEntry[] = [];
    const names = new Set<string>();
    for await (const entry of entries) {
      validateTreeEntry(entry);
      if (!isFullObjectId(entry.id)) {
        throw new InvalidEntryError(
          `Invalid object id ${JSON.stringify(entry.id)} for ${JSON.stringify(entry.name)}`,
        );
      }
      if (names.has(entry.name)) {
        throw new InvalidEntryError(`Duplicate entry name: ${JSON.stringify(entry.name)}`);
      }
      names.add(entry.name);
      collected.push({ mode: entry.mode, type: entry.type, id: entry.id, name: entry.name });
    }
    throwIfAborted(options.signal);

    collected.sort(compareTreeEntries);
    const id = hashObject("tree", encodeTree(collected));
    if (!this.objects.has(id)) {
      this.objects.set(id, { type: "tree", entries: collected });
    }
    return { id, count: collected.length };
  }

  async hashAt(treeish: string, path: string, options: StoreCallOptions = {}): Promise<ObjectId> {
    throwIfAborted(options.signal);
    const ref = `${treeish}:${path}`;
    const root = this.objects.get(treeish);
    if (root?.type !== "tree") {
      throw new ObjectNotFoundError(ref, `Not a valid tree: ${treeish}`);
    }
    if (path === "" || path === ".") {
      return treeish;
    }

    let current: ObjectId = treeish;
    for (const segment of normalizeTreePath(path).split("/")) {
      const object = this.objects.get(current);
      if (object?.type !== "tree") {
        throw new ObjectNotFoundError(ref);
      }
      const entry = object.entries.find((e) => e.name === segment);
      if (!entry) {
        throw new ObjectNotFoundError(ref);
      }
      current = entry.id;
    }
    return current;
  }

  async *streamMergeTree(
    request: MergeTreeRequest,
    options: StoreCallOptions = {},
  ): AsyncGenerator<Uint8Array> {
    const output = await mergeTrees(this, request, options);
    yield encodeMergeTreeOutput(output);
  }

  /**
   * Entries of a stored tree, in canonical order.
   *
   * @throws ObjectNotFoundError if the id is not a stored tree
   */
  getTree(id: ObjectId): readonly TreeEntry[] {
    const object = this.objects.get(id);
    if (object?.type !== "tree") {
      throw new ObjectNotFoundError(id, `Not a tree object: ${id}`);
    }
    return object.entries;
  }

  private async *walkTree(
    entries: readonly TreeEntry[],
    prefix: string,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<TreeEntry> {
    for (const entry of entries) {
      throwIfAborted(signal);
      const path = prefix + entry.name;
      if (entry.mode === FileMode.TREE) {
        yield* this.walkTree(this.getTree(entry.id), `${path}/`, signal);
      } else {
        yield { ...entry, name: path };
      }
    }
  }
}
