export * from "./config/index.js";
export * from "./errors.js";
export * from "./export/index.js";
export * from "./ingest/index.js";
export * from "./logging/index.js";
export * from "./report/index.js";
export * from "./stats/index.js";
