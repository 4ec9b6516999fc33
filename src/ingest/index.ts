export { ContentBuffer, NO_EXTENSION_KEY } from "./content-buffer.js";
export type { BufferOutcome, ContentBufferDeps } from "./content-buffer.js";
export { FilterEngine } from "./filter-engine.js";
export { annotateLines, countLines } from "./line-annotator.js";
export type { AnnotationResult } from "./line-annotator.js";
export { convertNotebook, createNotebookConverter } from "./notebook-converter.js";
export { compareStrings } from "./ordering.js";
export { PathNormalizer, hostFlavor, resolveRoot } from "./path-normalizer.js";
export { DEFAULT_ENCODING, TokenCounter, loadTiktokenTokenizer } from "./tokenizer.js";
export { Traverser } from "./traverser.js";
export type { TraverserDeps } from "./traverser.js";
export type {
  BufferOptions,
  BufferTotals,
  ExtensionStats,
  FileStatistics,
  NotebookConverter,
  SelectedFile,
  Tokenizer,
  TraversalOrigin,
} from "./types.js";
