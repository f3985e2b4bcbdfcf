/**
 * Object model, store contract and tree engines.
 */

export * from "./errors/index.js";
export * from "./files/index.js";
export * from "./id/index.js";
export * from "./logging/index.js";
export * from "./merge/index.js";
export * from "./objects/index.js";
export * from "./store/index.js";
export * from "./trees/index.js";
export * from "./utils/index.js";
