// packages/engine/src/index.ts
export * from "./issue.js";
export * from "./schema.js";
export * from "./dependency-graph.js";
export * from "./executor.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./store-watcher.js";

export * from "../../bql/src/index.js";
export * from "../../cache/src/index.js";
