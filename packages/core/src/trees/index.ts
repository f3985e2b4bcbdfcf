export * from "./directory-patch.js";
export * from "./make-tree-recursive.js";
export * from "./tree-entry.js";
export * from "./tree-paths.js";
export * from "./tree-record.js";
export * from "./update-tree.js";
