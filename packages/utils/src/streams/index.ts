export * from "./async-iterable.js";
export * from "./collect.js";
export * from "./encoding.js";
export * from "./to-tokens.js";
