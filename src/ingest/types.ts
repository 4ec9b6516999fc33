export interface FileStatistics {
  readonly lines: number;
  readonly tokens: number;
}

export interface SelectedFile {
  readonly displayPath: string;
  readonly absolutePath: string;
  readonly content: string;
  readonly convertedFromNotebook: boolean;
  readonly annotationInterval: number;
  readonly external: boolean;
  readonly stats: FileStatistics;
}

export interface ExtensionStats {
  readonly files: number;
  readonly lines: number;
  readonly tokens: number;
}

export interface BufferTotals {
  readonly files: number;
  readonly lines: number;
  readonly tokens: number;
}

export type TraversalOrigin = "internal" | "external";

export interface BufferOptions {
  readonly forceInclude?: boolean;
}

export interface Tokenizer {
  readonly name: string;
  count(text: string): number;
  dispose(): void;
}

export type NotebookConverter = (rawJson: string) => string;
