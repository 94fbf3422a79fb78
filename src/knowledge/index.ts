export * from "./types.js";
export * from "./cache.js";
export * from "./reliability.js";
export * from "./mcpSource.js";
export * from "./provider.js";
export * from "./security.js";
