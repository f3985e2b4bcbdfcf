export * from "./object-types.js";
