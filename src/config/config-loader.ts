import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigError, errorMessage } from "../errors.js";
import type { Logger } from "../logging/types.js";
import { validateConfig } from "./config-validator.js";
import {
  DEFAULT_DIRECTORY_DEPTH,
  DIRECTORY_ALWAYS_EXCLUDE_PATTERNS,
} from "./defaults.js";
import type { LoadedConfig, RawExportConfig } from "./types.js";

const CONFIG_EXTENSIONS = [".json", ".yaml", ".yml"] as const;

export interface LoadConfigOptions {
  readonly cwd?: string;
  readonly searchDirs?: readonly string[];
  readonly logger?: Logger;
}

export async function loadConfig(
  name: string,
  options: LoadConfigOptions = {},
): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();
  const candidates = configCandidates(name, cwd, options.searchDirs ?? []);

  let found: string | null = null;
  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      found = candidate;
      break;
    }
  }

  if (!found) {
    throw new ConfigError(
      `Config file '${name}' not found. Checked:\n - ${candidates.join("\n - ")}`,
      "config",
    );
  }

  options.logger?.info(`Loading config from: ${found}`);
  const raw = await parseConfigFile(found);
  const relative = path.relative(cwd, found);
  return {
    raw: validateConfig(raw),
    sourceLabel: relative && !path.isAbsolute(relative) ? relative : found,
    loadedFrom: found,
  };
}

export async function parseConfigFile(filePath: string): Promise<unknown> {
  const contents = await fs.readFile(filePath, "utf8");
  const extension = path.extname(filePath).toLowerCase();
  try {
    if (extension === ".yaml" || extension === ".yml") {
      return yaml.load(contents);
    }
    return JSON.parse(contents) as unknown;
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config ${filePath}: ${errorMessage(error)}`,
      "config",
      { cause: error },
    );
  }
}

export function defaultConfigFor(directory: string): LoadedConfig {
  const rootPath = path.resolve(directory);
  const name = path.basename(rootPath) || "repo";
  const exportName = `${name}_export.txt`;
  const raw: RawExportConfig = {
    repo_root: rootPath,
    export_name: exportName,
    dirs_to_traverse: ["."],
    include_top_level_files: "all",
    included_extensions: "all",
    subdirs_to_exclude: [],
    files_to_exclude: [],
    depth: DEFAULT_DIRECTORY_DEPTH,
    exhaustive_dir_tree: false,
    files_to_include: [],
    additional_dirs_to_traverse: [],
    always_exclude_patterns: [exportName, ...DIRECTORY_ALWAYS_EXCLUDE_PATTERNS],
    dump_config: false,
    dirs_for_tree: [],
  };
  return { raw, sourceLabel: `default_for_${name}` };
}

export async function resolveTarget(
  target: string,
  options: LoadConfigOptions = {},
): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();
  const directory = path.resolve(cwd, target);
  if (await isDirectory(directory)) {
    options.logger?.info(
      `Argument '${target}' is a directory. Using default config.`,
    );
    return defaultConfigFor(directory);
  }
  return await loadConfig(target, options);
}

function configCandidates(
  name: string,
  cwd: string,
  searchDirs: readonly string[],
): string[] {
  const hasExtension = CONFIG_EXTENSIONS.some((extension) =>
    name.toLowerCase().endsWith(extension),
  );
  const fileNames = hasExtension
    ? [name]
    : CONFIG_EXTENSIONS.map((extension) => name + extension);

  const candidates: string[] = [];
  for (const dir of [...searchDirs, cwd]) {
    for (const fileName of fileNames) {
      candidates.push(path.resolve(dir, fileName));
    }
  }
  candidates.push(path.resolve(cwd, name));
  return [...new Set(candidates)];
}

async function isFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}

async function isDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
