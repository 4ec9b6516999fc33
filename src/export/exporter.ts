import fs from "node:fs/promises";
import path from "node:path";
import { configSnapshot } from "../config/config-serializer.js";
import type { ExportConfig } from "../config/types.js";
import { OutputError, errorMessage } from "../errors.js";
import { ContentBuffer } from "../ingest/content-buffer.js";
import { FilterEngine } from "../ingest/filter-engine.js";
import { createNotebookConverter } from "../ingest/notebook-converter.js";
import { PathNormalizer } from "../ingest/path-normalizer.js";
import { TokenCounter } from "../ingest/tokenizer.js";
import { Traverser } from "../ingest/traverser.js";
import { serializeDocument } from "../report/document-serializer.js";
import { TreeRenderer } from "../report/tree-renderer.js";
import type { RenderedTree } from "../report/types.js";
import { StatsAggregator } from "../stats/stats-aggregator.js";
import type { ExportDeps, ExportResult } from "./types.js";

export async function exportRepository(
  config: ExportConfig,
  deps: ExportDeps = {},
): Promise<ExportResult> {
  const logger = deps.logger?.child({ scope: "export" });
  const paths = new PathNormalizer(config.flavor, logger);
  const filters = new FilterEngine(config, paths);
  const tokenizer = deps.tokenizer ?? null;
  const buffer = new ContentBuffer({
    config,
    paths,
    filters,
    tokens: new TokenCounter(tokenizer, logger),
    convertNotebook: deps.convertNotebook ?? createNotebookConverter(logger),
    logger,
  });
  const traverser = new Traverser({ config, paths, filters, buffer, logger });

  logger?.info(`Starting export for repo: ${config.rootPath}`);
  if (config.topLevelFiles.kind !== "none") {
    logger?.info("Processing top-level files");
    await traverser.includeTopLevelFiles();
  }
  for (const dir of config.dirsToTraverse) {
    await traverser.walk(dir, "internal");
  }
  for (const dir of config.additionalDirs) {
    await traverser.walk(dir, "external");
  }
  await traverser.includeExplicitFiles();

  logger?.info("File gathering complete. Computing stats and generating output");
  const records = buffer.records();
  const stats = new StatsAggregator(records, paths);
  const renderer = new TreeRenderer({ config, paths, filters, stats, records });

  const trees: RenderedTree[] = [
    { root: config.rootPath, text: renderer.render(config.rootPath) },
  ];
  for (const externalRoot of config.additionalDirs) {
    if (!(await isDirectory(externalRoot))) {
      logger?.warn(
        `External directory ${externalRoot} not found or not a directory; skipping tree`,
      );
      continue;
    }
    trees.push({ root: externalRoot, text: renderer.render(externalRoot) });
  }

  const document = serializeDocument({
    config: config.dumpConfig
      ? { source: config.sourceLabel, snapshot: configSnapshot(config) }
      : undefined,
    trees,
    records,
    sep: paths.sep,
  });

  return {
    config,
    document,
    records,
    aggregates: stats.directoryAggregates(),
    summary: {
      outputPath: config.outputPath,
      totals: buffer.totals(),
      byExtension: buffer.extensionStats(),
      tokenizerName: tokenizer?.name,
    },
  };
}

export async function writeDocument(
  outputPath: string,
  document: string,
): Promise<void> {
  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, document, "utf8");
  } catch (error) {
    throw new OutputError(
      `Error writing output file ${outputPath}: ${errorMessage(error)}`,
      outputPath,
      { cause: error },
    );
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}
