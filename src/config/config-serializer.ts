import yaml from "js-yaml";
import { compareStrings } from "../ingest/ordering.js";
import type {
  DepthLimit,
  ExportConfig,
  ExtensionFilter,
  RawExportConfig,
  TopLevelFiles,
} from "./types.js";

export type ConfigFormat = "json" | "yaml";

export function serializeConfig(
  config: RawExportConfig,
  format: ConfigFormat,
): string {
  if (format === "json") {
    return JSON.stringify(config, null, 2) + "\n";
  }
  return yaml.dump(config, { lineWidth: 120, noRefs: true });
}

export function configSnapshot(config: ExportConfig): Record<string, unknown> {
  return {
    repo_root: config.rootPath,
    output_file: config.outputPath,
    dirs_to_traverse: config.dirsToTraverse,
    additional_dirs_to_traverse: config.additionalDirs,
    include_top_level_files: topLevelValue(config.topLevelFiles),
    included_extensions: extensionValue(config.extensions),
    subdirs_to_exclude: config.subdirsToExclude,
    files_to_exclude: config.filesToExclude,
    files_to_include: config.filesToInclude,
    always_exclude_patterns: config.alwaysExcludePatterns,
    depth: depthValue(config.depth),
    exhaustive_dir_tree: config.exhaustiveDirTree,
    dirs_for_tree: config.dirsForTree,
    line_number_interval: config.lineNumbers.interval,
    line_number_min_length: config.lineNumbers.minLength,
    line_number_prefix: config.lineNumbers.prefix,
    annotate_extensions: sorted(config.lineNumbers.annotateExtensions),
    path_rewrites: config.pathRewrites,
  };
}

function topLevelValue(value: TopLevelFiles): string | string[] {
  return value.kind === "list" ? sorted(value.names) : value.kind;
}

function extensionValue(value: ExtensionFilter): string | string[] {
  return value.kind === "set" ? sorted(value.extensions) : "all";
}

function depthValue(value: DepthLimit): number {
  return value.kind === "limited" ? value.levels : -1;
}

function sorted(values: Iterable<string>): string[] {
  return [...values].sort(compareStrings);
}
