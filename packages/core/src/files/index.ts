export * from "./file-mode.js";
