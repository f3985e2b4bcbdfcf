import { InternalInvariantError } from "../errors/index.js";
import { compareNames, type TreeEntry } from "./tree-entry.js";

/**
 * Pending edits for one directory of a tree.
 *
 * Writes and deletes are kept sorted by name so that applying the patch
 * is a single linear merge with the directory's current listing. A name
 * is either pending a write or pending a delete; the last call wins.
 *
 * A patch is applied exactly once. Queuing more edits afterwards means
 * a child directory was rebuilt after its parent, which would lose data,
 * so it throws instead.
 */
export class DirectoryPatch {
  private writes: TreeEntry[] = [];
  private deletes: string[] = [];
  private applied = false;

  /**
   * @param dir Directory path, "." for the root
   */
  constructor(readonly dir: string) {}

  /** True once apply() has run. */
  get consumed(): boolean {
    return this.applied;
  }

  /** Number of pending edits. */
  get size(): number {
    return this.writes.length + this.deletes.length;
  }

  /**
   * Queue a write of an entry, replacing any pending edit of that name.
   */
  write(entry: TreeEntry): void {
    this.checkOpen(entry.name);
    removeSorted(this.deletes, entry.name, (name) => name);

    const index = searchSorted(this.writes, entry.name, (e) => e.name);
    if (index >= 0) {
      this.writes[index] = entry;
    } else {
      this.writes.splice(-index - 1, 0, entry);
    }
  }

  /**
   * Queue a delete of a name, replacing any pending write of that name.
   */
  delete(name: string): void {
    this.checkOpen(name);
    removeSorted(this.writes, name, (e) => e.name);

    const index = searchSorted(this.deletes, name, (n) => n);
    if (index < 0) {
      this.deletes.splice(-index - 1, 0, name);
    }
  }

  /**
   * Merge the pending edits into the directory's current entries.
   *
   * Matching deletes drop entries, matching writes replace them, and
   * unmatched writes are inserted. Unmatched deletes are no-ops. The
   * patch is empty and sealed afterwards.
   *
   * @param existing Current entries, sorted by name
   * @returns New entries, sorted by name
   */
  apply(existing: readonly TreeEntry[]): TreeEntry[] {
    this.checkOpen();
    const { writes, deletes } = this;
    const result: TreeEntry[] = [];
    let w = 0;
    let d = 0;

    for (const entry of existing) {
      while (w < writes.length && compareNames(writes[w].name, entry.name) < 0) {
        result.push(writes[w++]);
      }
      while (d < deletes.length && compareNames(deletes[d], entry.name) < 0) {
        d++;
      }
      if (w < writes.length && writes[w].name === entry.name) {
        result.push(writes[w++]);
      } else if (d < deletes.length && deletes[d] === entry.name) {
        d++;
      } else {
        result.push(entry);
      }
    }
    while (w < writes.length) {
      result.push(writes[w++]);
    }

    this.writes = [];
    this.deletes = [];
    this.applied = true;
    return result;
  }

  private checkOpen(name?: string): void {
    if (this.applied) {
      const what = name === undefined ? "" : ` (edit of ${JSON.stringify(name)})`;
      throw new InternalInvariantError(
        `Patch for directory ${JSON.stringify(this.dir)} was already applied${what}`,
      );
    }
  }
}

/**
 * Check that every patch was applied and nothing is left pending.
 *
 * @throws InternalInvariantError naming the first patch that was not
 */
export function assertPatchesApplied(patches: Iterable<DirectoryPatch>): void {
  for (const patch of patches) {
    if (!patch.consumed || patch.size > 0) {
      throw new InternalInvariantError(
        `Patch for directory ${JSON.stringify(patch.dir)} was not applied (${patch.size} pending)`,
      );
    }
  }
}

/**
 * Binary search by key. Returns the index when found, or
 * `-(insertionPoint) - 1` when not.
 */
function searchSorted<T>(items: readonly T[], key: string, keyOf: (item: T) => string): number {
  let low = 0;
  let high = items.length - 1;
  while (low <= high) {
    const mid = (low + high) >>> 1;
    const cmp = compareNames(keyOf(items[mid]), key);
    if (cmp < 0) {
      low = mid + 1;
    } else if (cmp > 0) {
      high = mid - 1;
    } else {
      return mid;
    }
  }
  return -low - 1;
}

function removeSorted<T>(items: T[], key: string, keyOf: (item: T) => string): void {
  const index = searchSorted(items, key, keyOf);
  if (index >= 0) {
    items.splice(index, 1);
  }
}
