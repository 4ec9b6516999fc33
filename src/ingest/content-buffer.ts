import fs from "node:fs/promises";
import type { ExportConfig } from "../config/types.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logging/types.js";
import type { FilterEngine } from "./filter-engine.js";
import { annotateLines, countLines } from "./line-annotator.js";
import type { PathNormalizer } from "./path-normalizer.js";
import type { TokenCounter } from "./tokenizer.js";
import type {
  BufferOptions,
  BufferTotals,
  ExtensionStats,
  NotebookConverter,
  SelectedFile,
} from "./types.js";

export const NO_EXTENSION_KEY = "._no_extension_";
const NOTEBOOK_EXTENSION = ".ipynb";

export interface ContentBufferDeps {
  readonly config: ExportConfig;
  readonly paths: PathNormalizer;
  readonly filters: FilterEngine;
  readonly tokens: TokenCounter;
  readonly convertNotebook: NotebookConverter;
  readonly logger?: Logger;
}

export type BufferOutcome = "buffered" | "excluded" | "duplicate" | "skipped";

export class ContentBuffer {
  private readonly files: SelectedFile[] = [];
  private readonly seen = new Set<string>();
  private readonly byExtension = new Map<string, ExtensionStats>();
  private totalLines = 0;
  private totalTokens = 0;

  constructor(private readonly deps: ContentBufferDeps) {}

  async buffer(
    absolutePath: string,
    options: BufferOptions = {},
  ): Promise<BufferOutcome> {
    const { config, paths, filters, logger } = this.deps;
    const filePath = paths.normalize(absolutePath);

    if (!(await isRegularFile(filePath))) {
      logger?.warn(`Skipping non-file path: ${filePath}`);
      return "skipped";
    }

    const displayPath = this.displayPathFor(filePath);
    if (filters.shouldExcludeFile(filePath, displayPath)) {
      return "excluded";
    }
    if (!options.forceInclude && !filters.admitsExtension(filePath)) {
      return "excluded";
    }
    if (this.seen.has(filePath)) {
      return "duplicate";
    }

    const extension = paths.extension(filePath);
    let text: string;
    try {
      text = (await fs.readFile(filePath)).toString("utf8");
    } catch (error) {
      logger?.warn(`Error reading file ${filePath}: ${errorMessage(error)}`);
      return "skipped";
    }

    const convertedFromNotebook = extension === NOTEBOOK_EXTENSION;
    if (convertedFromNotebook) {
      text = this.deps.convertNotebook(text);
    }

    const stats = {
      lines: countLines(text),
      tokens: this.deps.tokens.count(text, displayPath),
    };
    const annotated = annotateLines(text, extension, config.lineNumbers);

    this.files.push({
      displayPath,
      absolutePath: filePath,
      content: annotated.content,
      convertedFromNotebook,
      annotationInterval: annotated.interval,
      external: !paths.isUnder(config.rootPath, filePath),
      stats,
    });
    this.seen.add(filePath);
    this.recordExtension(extension || NO_EXTENSION_KEY, stats.lines, stats.tokens);
    this.totalLines += stats.lines;
    this.totalTokens += stats.tokens;
    return "buffered";
  }

  records(): readonly SelectedFile[] {
    return this.files;
  }

  extensionStats(): ReadonlyMap<string, ExtensionStats> {
    return this.byExtension;
  }

  totals(): BufferTotals {
    return {
      files: this.files.length,
      lines: this.totalLines,
      tokens: this.totalTokens,
    };
  }

  displayPathFor(absolutePath: string): string {
    const { config, paths } = this.deps;
    if (paths.isUnder(config.rootPath, absolutePath)) {
      return paths.normalize(paths.relative(config.rootPath, absolutePath));
    }
    return paths.normalize(absolutePath);
  }

  private recordExtension(key: string, lines: number, tokens: number): void {
    const current = this.byExtension.get(key) ?? { files: 0, lines: 0, tokens: 0 };
    this.byExtension.set(key, {
      files: current.files + 1,
      lines: current.lines + lines,
      tokens: current.tokens + tokens,
    });
  }
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
