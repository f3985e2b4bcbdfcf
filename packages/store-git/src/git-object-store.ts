import {
  InvalidEntryError,
  type ListTreeOptions,
  type MakeTreeResult,
  type MergeTreeRequest,
  type ObjectId,
  ObjectNotFoundError,
  type ObjectStore,
  ProtocolError,
  type StoreCallOptions,
  StoreIOError,
  type TreeEntry,
  formatTreeRecord,
  parseTreeRecord,
  protocolErrorFrom,
  throwIfAborted,
  validateTreeEntry,
} from "@treesmith/core";
import { type ByteSource, decodeString, toTokens } from "@treesmith/utils";

import type { GitRunner } from "./git-runner.js";

const MISSING_OBJECT = /Not a valid object name/i;
const MISSING_TREE = /not a tree object|Not a valid object name/i;

/**
 * ObjectStore backed by the git executable.
 *
 * Each call runs one plumbing command in the repository. Nothing is
 * cached between calls.
 */
export class GitObjectStore implements ObjectStore {
  constructor(private readonly runner: GitRunner) {}

  async writeBlob(content: ByteSource, options: StoreCallOptions = {}): Promise<ObjectId> {
    return this.runner.output(["hash-object", "-w", "--stdin", "-t", "blob"], {
      input: content,
      signal: options.signal,
    });
  }

  async *readBlob(id: ObjectId, options: StoreCallOptions = {}): AsyncGenerator<Uint8Array> {
    try {
      yield* this.runner.stream(["cat-file", "blob", id], { signal: options.signal });
    } catch (error) {
      throw notFoundFrom(error, id, MISSING_OBJECT);
    }
  }

  async *listTree(id: ObjectId, options: ListTreeOptions = {}): AsyncGenerator<TreeEntry> {
    const args = ["ls-tree", "-z", "--full-tree"];
    if (options.recurse) {
      args.push("-r");
    }
    args.push(id);

    try {
      for await (const record of toTokens(this.runner.stream(args, { signal: options.signal }))) {
        yield parseTreeRecord(record);
      }
    } catch (error) {
      throw notFoundFrom(protocolErrorFrom(error, "git ls-tree"), id, MISSING_TREE);
    }
  }

  async makeTree(
    entries: Iterable<TreeEntry> | AsyncIterable<TreeEntry>,
    options: StoreCallOptions = {},
  ): Promise<MakeTreeResult> {
    throwIfAborted(options.signal);
    const names = new Set<string>();
    let input = "";
    for await (const entry of entries) {
      validateTreeEntry(entry);
      if (names.has(entry.name)) {
        throw new InvalidEntryError(`Duplicate entry name: ${JSON.stringify(entry.name)}`);
      }
      names.add(entry.name);
      input += `${formatTreeRecord(entry)}\0`;
    }

    const id = await this.runner.output(["mktree", "-z"], { input, signal: options.signal });
    return { id, count: names.size };
  }

  async hashAt(treeish: string, path: string, options: StoreCallOptions = {}): Promise<ObjectId> {
    return this.revParse(`${treeish}:${path}`, options);
  }

  streamMergeTree(
    request: MergeTreeRequest,
    options: StoreCallOptions = {},
  ): AsyncIterable<Uint8Array> {
    // One request per line: [<base> -- ]<branch1> <branch2>
    const base = request.mergeBase ? `${request.mergeBase} -- ` : "";
    const input = `${base}${request.branch1} ${request.branch2}\n`;
    const config = request.conflictStyle
      ? { "merge.conflictStyle": request.conflictStyle }
      : undefined;

    return this.runner.stream(["merge-tree", "--write-tree", "--stdin", "-z"], {
      input,
      config,
      signal: options.signal,
      okExitCodes: [0, 1],
    });
  }

  /**
   * Tree of a tree-ish, e.g. the tree of a commit.
   *
   * @throws ObjectNotFoundError if `ref` does not resolve to a tree
   */
  async peelToTree(ref: string, options: StoreCallOptions = {}): Promise<ObjectId> {
    return this.revParse(`${ref}^{tree}`, options);
  }

  /**
   * Commit a commit-ish points to, e.g. the commit of a branch or tag.
   *
   * @throws ObjectNotFoundError if `ref` does not resolve to a commit
   */
  async peelToCommit(ref: string, options: StoreCallOptions = {}): Promise<ObjectId> {
    return this.revParse(`${ref}^{commit}`, options);
  }

  /**
   * Best common ancestor of two commits.
   *
   * @throws StoreIOError if there is none
   */
  async mergeBase(a: string, b: string, options: StoreCallOptions = {}): Promise<ObjectId> {
    return this.runner.output(["merge-base", a, b], { signal: options.signal });
  }

  /**
   * Whether commit `a` is an ancestor of commit `b`.
   * A commit counts as its own ancestor.
   */
  async isAncestor(a: string, b: string, options: StoreCallOptions = {}): Promise<boolean> {
    const args = ["merge-base", "--is-ancestor", a, b];
    const result = await this.runner.run(args, { signal: options.signal });
    this.runner.checkExit(args, result.exitCode, result.stderr, { okExitCodes: [0, 1] });
    return result.exitCode === 0;
  }

  private async revParse(ref: string, options: StoreCallOptions): Promise<ObjectId> {
    const result = await this.runner.run(["rev-parse", "--verify", "--quiet", "--end-of-options", ref], {
      signal: options.signal,
    });
    if (result.exitCode !== 0) {
      throw new ObjectNotFoundError(ref);
    }
    const id = decodeString(result.stdout).trim();
    if (id === "") {
      throw new ProtocolError(`git rev-parse printed nothing for ${JSON.stringify(ref)}`);
    }
    return id;
  }
}

function notFoundFrom(error: unknown, ref: string, pattern: RegExp): unknown {
  if (error instanceof StoreIOError && pattern.test(error.stderr ?? "")) {
    return new ObjectNotFoundError(ref, undefined, { cause: error });
  }
  return error;
}
