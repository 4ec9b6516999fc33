export { serializeDocument } from "./document-serializer.js";
export type { DocumentInput } from "./document-serializer.js";
export { escapeAttribute, escapeText } from "./markup-escape.js";
export { renderAsciiTable, renderSummary, summaryRows } from "./summary-renderer.js";
export type { SummaryInput } from "./summary-renderer.js";
export { TreeRenderer } from "./tree-renderer.js";
export type { TreeRendererDeps } from "./tree-renderer.js";
export type { ConfigBlock, RenderedTree, SummaryRow } from "./types.js";
