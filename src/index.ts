export * from "./scheduler/index.js";
export * from "./schemas/index.js";
export * from "./sync/index.js";
