export * from "./store-errors.js";
export * from "./vcs-error.js";
