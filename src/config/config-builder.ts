import fs from "node:fs/promises";
import { ConfigError } from "../errors.js";
import { PathNormalizer, resolveRoot } from "../ingest/path-normalizer.js";
import type { Logger } from "../logging/types.js";
import {
  BLACKLISTED_DIRS,
  BLACKLISTED_FILES,
  DATA_FILE_EXTENSIONS,
  DEFAULT_ALWAYS_EXCLUDE_PATTERNS,
  DEFAULT_ANNOTATE_EXTENSIONS,
  DEFAULT_COMMENT_TOKENS,
  DEFAULT_EXPORT_NAME,
  DEFAULT_LINE_NUMBER_INTERVAL,
  DEFAULT_LINE_NUMBER_MIN_LENGTH,
  DEFAULT_LINE_NUMBER_PREFIX,
  UNBOUNDED_DEPTH,
} from "./defaults.js";
import type {
  DepthLimit,
  ExportConfig,
  ExtensionFilter,
  LineNumberOptions,
  LoadedConfig,
  PathFlavor,
  RawExportConfig,
  TopLevelFiles,
} from "./types.js";

export interface BuildConfigOptions {
  readonly cwd?: string;
  readonly flavor?: PathFlavor;
  readonly logger?: Logger;
  readonly overrides?: ConfigOverrides;
}

export interface ConfigOverrides {
  readonly dumpConfig?: boolean;
  readonly depth?: number;
  readonly outputPath?: string;
}

export async function buildExportConfig(
  loaded: LoadedConfig,
  options: BuildConfigOptions = {},
): Promise<ExportConfig> {
  const cwd = options.cwd ?? process.cwd();
  const logger = options.logger;
  const overrides = options.overrides ?? {};
  const paths = new PathNormalizer(options.flavor, logger);
  const raw = resolveRoot(loaded.raw, paths, cwd);
  const rewrites = raw.path_rewrites ?? [];
  const rootPath = raw.repo_root;

  await assertDirectory(rootPath);

  const depthValue = overrides.depth ?? raw.depth ?? UNBOUNDED_DEPTH;
  if (!Number.isInteger(depthValue) || depthValue < UNBOUNDED_DEPTH) {
    throw new ConfigError(
      `depth must be -1 (unbounded) or a non-negative integer, got ${depthValue}`,
      "depth",
    );
  }

  const outputPath = overrides.outputPath
    ? paths.resolve(overrides.outputPath, cwd, rewrites)
    : resolveOutputPath(raw, rootPath, paths, cwd, logger);

  const alwaysExclude: string[] = [
    ...(raw.always_exclude_patterns ?? DEFAULT_ALWAYS_EXCLUDE_PATTERNS),
  ];
  const outputName = paths.basename(outputPath);
  if (!alwaysExclude.includes(outputName)) {
    alwaysExclude.push(outputName);
  }

  const additionalDirs = (raw.additional_dirs_to_traverse ?? []).map(
    (entry) => {
      const rewritten = paths.toSystemForm(paths.rewrite(entry, rewrites));
      if (!paths.isAbsolute(rewritten)) {
        logger?.warn(
          `Path '${entry}' in additional_dirs_to_traverse is relative; resolving against ${cwd}`,
        );
      }
      return paths.resolve(entry, cwd, rewrites);
    },
  );

  // Relative entries stay relative; they are resolved against the root.
  const filesToInclude = (raw.files_to_include ?? []).map((entry) =>
    paths.toSystemForm(paths.rewrite(entry, rewrites)),
  );

  const relative = (entries: readonly string[] | undefined): string[] =>
    (entries ?? []).map((entry) => paths.toSystemForm(entry));

  return {
    rootPath,
    sourceLabel: loaded.sourceLabel,
    flavor: paths.flavor,
    dirsToTraverse: relative(raw.dirs_to_traverse),
    additionalDirs,
    topLevelFiles: parseTopLevel(raw.include_top_level_files),
    extensions: parseExtensions(raw.included_extensions),
    subdirsToExclude: relative(raw.subdirs_to_exclude),
    filesToExclude: relative(raw.files_to_exclude),
    filesToInclude,
    alwaysExcludePatterns: alwaysExclude,
    blacklistedDirs: new Set<string>(BLACKLISTED_DIRS),
    blacklistedFiles: new Set<string>(BLACKLISTED_FILES),
    depth: toDepthLimit(depthValue),
    exhaustiveDirTree: raw.exhaustive_dir_tree ?? false,
    dirsForTree: relative(raw.dirs_for_tree),
    lineNumbers: buildLineNumberOptions(raw),
    pathRewrites: rewrites,
    outputPath,
    dumpConfig: overrides.dumpConfig ?? raw.dump_config ?? false,
  };
}

export function normalizeExtension(value: string): string {
  const lower = value.trim().toLowerCase();
  if (!lower || lower.startsWith(".")) {
    return lower;
  }
  return `.${lower}`;
}

function resolveOutputPath(
  raw: RawExportConfig,
  rootPath: string,
  paths: PathNormalizer,
  cwd: string,
  logger: Logger | undefined,
): string {
  const exportName = paths.toSystemForm(raw.export_name ?? DEFAULT_EXPORT_NAME);
  if (paths.isAbsolute(exportName)) {
    if (raw.output_dir) {
      logger?.warn(
        `export_name '${exportName}' is absolute; ignoring output_dir`,
      );
    }
    return exportName;
  }
  if (raw.output_dir) {
    const outputDir = paths.resolve(raw.output_dir, cwd, raw.path_rewrites);
    return paths.toSystemForm(paths.join(outputDir, exportName));
  }
  return paths.toSystemForm(paths.join(rootPath, exportName));
}

function parseTopLevel(
  value: RawExportConfig["include_top_level_files"],
): TopLevelFiles {
  if (value === undefined || value === "none") {
    return { kind: "none" };
  }
  if (value === "all") {
    return { kind: "all" };
  }
  return { kind: "list", names: new Set(value) };
}

function parseExtensions(
  value: RawExportConfig["included_extensions"],
): ExtensionFilter {
  if (value === undefined || value === "all") {
    return { kind: "all" };
  }
  return { kind: "set", extensions: new Set(value.map(normalizeExtension)) };
}

function toDepthLimit(value: number): DepthLimit {
  return value === UNBOUNDED_DEPTH
    ? { kind: "unbounded" }
    : { kind: "limited", levels: value };
}

function buildLineNumberOptions(raw: RawExportConfig): LineNumberOptions {
  const commentTokens = new Map<string, string>();
  for (const [extension, token] of Object.entries(DEFAULT_COMMENT_TOKENS)) {
    commentTokens.set(extension, token);
  }
  for (const [extension, token] of Object.entries(raw.comment_tokens ?? {})) {
    commentTokens.set(normalizeExtension(extension), token);
  }
  const annotate: readonly string[] =
    raw.annotate_extensions ?? DEFAULT_ANNOTATE_EXTENSIONS;

  return {
    interval: raw.line_number_interval ?? DEFAULT_LINE_NUMBER_INTERVAL,
    minLength: raw.line_number_min_length ?? DEFAULT_LINE_NUMBER_MIN_LENGTH,
    prefix: raw.line_number_prefix ?? DEFAULT_LINE_NUMBER_PREFIX,
    annotateExtensions: new Set(annotate.map(normalizeExtension)),
    commentTokens,
    dataExtensions: new Set<string>(DATA_FILE_EXTENSIONS),
  };
}

async function assertDirectory(rootPath: string): Promise<void> {
  let stats: Awaited<ReturnType<typeof fs.stat>>;
  try {
    stats = await fs.stat(rootPath);
  } catch (error) {
    throw new ConfigError(
      `repo_root does not exist: ${rootPath}. Provide a valid directory.`,
      "repo_root",
      { cause: error },
    );
  }
  if (!stats.isDirectory()) {
    throw new ConfigError(
      `repo_root must be a directory: ${rootPath}`,
      "repo_root",
    );
  }
}
