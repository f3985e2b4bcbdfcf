/**
 * Git-backed object store
 *
 * Runs git plumbing commands (hash-object, cat-file, ls-tree, mktree,
 * rev-parse, merge-tree) against a repository on disk.
 */

export * from "./git-executor.js";
export * from "./git-object-store.js";
export * from "./git-repository.js";
export * from "./git-runner.js";
