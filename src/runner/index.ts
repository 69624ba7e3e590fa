export * from "./merge.js";
export * from "./check.js";
