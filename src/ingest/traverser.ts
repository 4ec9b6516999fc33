import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import type { ExportConfig } from "../config/types.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logging/types.js";
import type { ContentBuffer } from "./content-buffer.js";
import type { FilterEngine } from "./filter-engine.js";
import { compareStrings } from "./ordering.js";
import type { PathNormalizer } from "./path-normalizer.js";
import type { TraversalOrigin } from "./types.js";

export interface TraverserDeps {
  readonly config: ExportConfig;
  readonly paths: PathNormalizer;
  readonly filters: FilterEngine;
  readonly buffer: ContentBuffer;
  readonly logger?: Logger;
}

export class Traverser {
  constructor(private readonly deps: TraverserDeps) {}

  async walk(start: string, origin: TraversalOrigin): Promise<void> {
    const { config, paths, logger } = this.deps;
    const startDir =
      origin === "internal"
        ? paths.resolve(start, config.rootPath)
        : paths.resolve(start, config.rootPath, config.pathRewrites);

    if (!(await isDirectory(startDir))) {
      logger?.warn(
        origin === "internal"
          ? `Directory '${start}' (${startDir}) does not exist relative to the repository root; skipping`
          : `External directory '${startDir}' does not exist or is not a directory; skipping`,
      );
      return;
    }

    logger?.info(
      `Traversing ${origin} dir: ${origin === "internal" ? start : startDir}`,
    );
    await this.walkDirectory(startDir, 0);
  }

  async includeTopLevelFiles(): Promise<void> {
    const { config, paths, buffer } = this.deps;
    const policy = config.topLevelFiles;
    if (policy.kind === "none") {
      return;
    }
    const entries = await this.listDirectory(config.rootPath);
    for (const entry of entries) {
      const absolutePath = paths.join(config.rootPath, entry.name);
      if (await isDirectoryEntry(entry, absolutePath)) {
        continue;
      }
      if (policy.kind === "list" && !policy.names.has(entry.name)) {
        continue;
      }
      await buffer.buffer(absolutePath);
    }
  }

  async includeExplicitFiles(): Promise<void> {
    const { config, paths, buffer, logger } = this.deps;
    if (config.filesToInclude.length === 0) {
      return;
    }
    logger?.info("Processing specific files to include");
    for (const entry of config.filesToInclude) {
      const absolutePath = paths.resolve(entry, config.rootPath);
      if (!(await isFile(absolutePath))) {
        logger?.warn(
          paths.isAbsolute(entry)
            ? `File to include not found or not a file: ${absolutePath}`
            : `File to include not found relative to the repository root: ${entry} (resolved to ${absolutePath})`,
        );
        continue;
      }
      await buffer.buffer(absolutePath, { forceInclude: true });
    }
  }

  private async walkDirectory(directory: string, depth: number): Promise<void> {
    const { config, paths, filters, buffer } = this.deps;
    if (config.depth.kind === "limited" && depth >= config.depth.levels) {
      return;
    }

    const entries = await this.listDirectory(directory);
    const subdirectories: string[] = [];
    for (const entry of entries) {
      const absolutePath = paths.join(directory, entry.name);
      if (entry.isDirectory()) {
        if (!filters.shouldExcludeDir(absolutePath)) {
          subdirectories.push(absolutePath);
        }
        continue;
      }
      // Directory symlinks are listed but not followed.
      if (await isDirectoryEntry(entry, absolutePath)) {
        continue;
      }
      await buffer.buffer(absolutePath);
    }

    for (const subdirectory of subdirectories) {
      await this.walkDirectory(subdirectory, depth + 1);
    }
  }

  private async listDirectory(directory: string): Promise<Dirent[]> {
    try {
      const entries = await fs.readdir(directory, { withFileTypes: true });
      return entries.sort((a, b) => compareStrings(a.name, b.name));
    } catch (error) {
      this.deps.logger?.warn(
        `Could not list directory ${directory}: ${errorMessage(error)}`,
      );
      return [];
    }
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function isDirectoryEntry(
  entry: Dirent,
  absolutePath: string,
): Promise<boolean> {
  return (
    entry.isDirectory() ||
    (entry.isSymbolicLink() && (await isDirectory(absolutePath)))
  );
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}
