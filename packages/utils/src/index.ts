export * from "./streams/index.js";
