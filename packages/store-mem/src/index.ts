/**
 * In-memory object store
 *
 * Git-compatible object ids and an in-process tree merge, for tests and
 * ephemeral work. No persistence.
 */

export * from "./memory-object-store.js";
export { mergeText, type MergeTextInput, type MergeTextResult } from "./merge/merge-blobs.js";
export { encodeMergeTreeOutput } from "./merge/merge-tree-writer.js";
export { mergeTrees } from "./merge/merge-trees.js";
export { encodeTree, hashObject, isFullObjectId } from "./object-hash.js";
