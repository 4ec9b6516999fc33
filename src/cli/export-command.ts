import { buildExportConfig } from "../config/config-builder.js";
import { resolveTarget } from "../config/config-loader.js";
import { exportRepository, writeDocument } from "../export/exporter.js";
import type { ExportResult } from "../export/types.js";
import { loadTiktokenTokenizer } from "../ingest/tokenizer.js";
import type { Tokenizer } from "../ingest/types.js";
import type { Logger } from "../logging/types.js";
import { renderSummary } from "../report/summary-renderer.js";
import { resolveConfigsDirectory } from "./runtime-paths.js";

export interface ExportCommandOptions {
  readonly target: string;
  readonly dumpConfig?: boolean;
  readonly out?: string;
  readonly depth?: number;
  readonly summary?: boolean;
  readonly cwd?: string;
  readonly configDirs?: readonly string[];
  readonly loadTokenizer?: (logger: Logger) => Promise<Tokenizer | null>;
}

export async function runExportCommand(
  options: ExportCommandOptions,
  logger: Logger,
): Promise<ExportResult> {
  const cwd = options.cwd ?? process.cwd();
  const searchDirs = options.configDirs ?? (await defaultConfigDirs());
  const loaded = await resolveTarget(options.target, { cwd, searchDirs, logger });
  const config = await buildExportConfig(loaded, {
    cwd,
    logger,
    overrides: {
      dumpConfig: options.dumpConfig ? true : undefined,
      depth: options.depth,
      outputPath: options.out,
    },
  });

  const loadTokenizer = options.loadTokenizer ?? loadTiktokenTokenizer;
  const tokenizer = await loadTokenizer(logger);
  let result: ExportResult;
  try {
    result = await exportRepository(config, { logger, tokenizer });
  } finally {
    tokenizer?.dispose();
  }

  await writeDocument(config.outputPath, result.document);
  if (options.summary !== false) {
    for (const line of renderSummary(result.summary).split("\n")) {
      logger.info(line);
    }
  }
  return result;
}

async function defaultConfigDirs(): Promise<string[]> {
  const bundled = await resolveConfigsDirectory();
  return bundled ? [bundled] : [];
}
