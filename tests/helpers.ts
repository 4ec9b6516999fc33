import fs from "node:fs/promises";
import path from "node:path";
import { buildExportConfig } from "../src/config/config-builder.js";
import {
  BLACKLISTED_DIRS,
  BLACKLISTED_FILES,
  DATA_FILE_EXTENSIONS,
  DEFAULT_ANNOTATE_EXTENSIONS,
  DEFAULT_COMMENT_TOKENS,
} from "../src/config/defaults.js";
import type { ExportConfig, RawExportConfig } from "../src/config/types.js";
import type { FileStatistics, SelectedFile, Tokenizer } from "../src/ingest/types.js";
import type { LogLevel, Logger } from "../src/logging/types.js";

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
}

export class CollectingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  child(): Logger {
    return this;
  }

  messages(level: LogLevel): string[] {
    return this.entries
      .filter((entry) => entry.level === level)
      .map((entry) => entry.message);
  }
}

/**
 * Counts whitespace-separated words.
 */
export function wordTokenizer(): Tokenizer {
  return {
    name: "words",
    count: (text) => text.split(/\s+/).filter((word) => word.length > 0).length,
    dispose: () => undefined,
  };
}

/**
 * `count` lines of one word each, without a trailing newline.
 */
export function linesOf(count: number, stem = "line"): string {
  return Array.from({ length: count }, (_, index) => `${stem}${index + 1}`).join(
    "\n",
  );
}

export async function mkdir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function writeText(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, "utf8");
}

export async function loadTestConfig(
  raw: RawExportConfig,
  cwd: string,
  logger?: Logger,
): Promise<ExportConfig> {
  return await buildExportConfig(
    { raw, sourceLabel: "test-config" },
    { cwd, logger },
  );
}

/**
 * A resolved POSIX configuration that needs no filesystem.
 */
export function testConfig(
  rootPath: string,
  overrides: Partial<ExportConfig> = {},
): ExportConfig {
  return {
    rootPath,
    sourceLabel: "test-config",
    flavor: "posix",
    dirsToTraverse: ["."],
    additionalDirs: [],
    topLevelFiles: { kind: "none" },
    extensions: { kind: "all" },
    subdirsToExclude: [],
    filesToExclude: [],
    filesToInclude: [],
    alwaysExcludePatterns: ["export.txt"],
    blacklistedDirs: new Set<string>(BLACKLISTED_DIRS),
    blacklistedFiles: new Set<string>(BLACKLISTED_FILES),
    depth: { kind: "unbounded" },
    exhaustiveDirTree: false,
    dirsForTree: [],
    lineNumbers: {
      interval: 25,
      minLength: 150,
      prefix: "|LN|",
      annotateExtensions: new Set<string>(DEFAULT_ANNOTATE_EXTENSIONS),
      commentTokens: new Map(Object.entries(DEFAULT_COMMENT_TOKENS)),
      dataExtensions: new Set<string>(DATA_FILE_EXTENSIONS),
    },
    pathRewrites: [],
    outputPath: path.posix.join(rootPath, "export.txt"),
    dumpConfig: false,
    ...overrides,
  };
}

/**
 * A buffered-file record for renderer and aggregator tests. `absolutePath`
 * is POSIX; records outside `rootPath` are external.
 */
export function selectedFile(
  absolutePath: string,
  rootPath: string,
  stats: FileStatistics,
  content = "",
): SelectedFile {
  const external = !absolutePath.startsWith(rootPath + "/");
  return {
    displayPath: external
      ? absolutePath
      : path.posix.relative(rootPath, absolutePath),
    absolutePath,
    content,
    convertedFromNotebook: false,
    annotationInterval: 0,
    external,
    stats,
  };
}
