export interface RenderedTree {
  readonly root: string;
  readonly text: string;
}

export interface ConfigBlock {
  readonly source: string;
  readonly snapshot: Readonly<Record<string, unknown>>;
}

export interface SummaryRow {
  readonly extension: string;
  readonly files: number;
  readonly lines: number;
  readonly tokens: number;
}
