export * from "./abort.js";
