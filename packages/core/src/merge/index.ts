export * from "./merge-conflict.js";
export * from "./merge-stage.js";
export * from "./merge-tree.js";
export * from "./merge-tree-parser.js";
export * from "./merge-tree-types.js";
