export * from "./cycleDetector.js";
export * from "./consistency.js";
export * from "./validator.js";
export * from "./optimizer.js";
