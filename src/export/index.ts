export { exportRepository, writeDocument } from "./exporter.js";
export type { ExportDeps, ExportResult, ExportSummary } from "./types.js";
