import type { ExportConfig } from "../config/types.js";
import type {
  BufferTotals,
  ExtensionStats,
  NotebookConverter,
  SelectedFile,
  Tokenizer,
} from "../ingest/types.js";
import type { Logger } from "../logging/types.js";
import type { DirectoryAggregate } from "../stats/types.js";

export interface ExportDeps {
  readonly logger?: Logger;
  readonly tokenizer?: Tokenizer | null;
  readonly convertNotebook?: NotebookConverter;
}

export interface ExportSummary {
  readonly outputPath: string;
  readonly totals: BufferTotals;
  readonly byExtension: ReadonlyMap<string, ExtensionStats>;
  readonly tokenizerName?: string;
}

export interface ExportResult {
  readonly config: ExportConfig;
  readonly document: string;
  readonly records: readonly SelectedFile[];
  readonly aggregates: DirectoryAggregate;
  readonly summary: ExportSummary;
}
