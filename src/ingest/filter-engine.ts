import type { ExportConfig } from "../config/types.js";
import type { PathNormalizer } from "./path-normalizer.js";

export class FilterEngine {
  private readonly alwaysExclude: readonly string[];
  private readonly fileExcludes: readonly string[];
  private readonly subdirExcludes: readonly string[];

  constructor(
    private readonly config: ExportConfig,
    private readonly paths: PathNormalizer,
  ) {
    this.alwaysExclude = config.alwaysExcludePatterns
      .map((pattern) => pattern.replace(/^\*+/, ""))
      .filter((pattern) => pattern.length > 0);
    this.fileExcludes = config.filesToExclude.map((entry) =>
      paths.toSystemForm(entry),
    );
    this.subdirExcludes = config.subdirsToExclude.map((entry) =>
      paths.toSystemForm(entry),
    );
  }

  shouldExcludeFile(absolutePath: string, displayPath: string): boolean {
    const fileName = this.paths.basename(absolutePath);
    return (
      this.isBlacklistedFile(fileName) ||
      this.matchesAlwaysExclude(fileName) ||
      this.matchesFileExclude(displayPath)
    );
  }

  shouldExcludeDir(absoluteDirPath: string): boolean {
    return (
      this.isBlacklistedDir(this.paths.basename(absoluteDirPath)) ||
      this.matchesSubdirExclude(absoluteDirPath)
    );
  }

  admitsExtension(absolutePath: string): boolean {
    const { extensions } = this.config;
    if (extensions.kind === "all") {
      return true;
    }
    return extensions.extensions.has(this.paths.extension(absolutePath));
  }

  isBlacklistedFile(fileName: string): boolean {
    return this.config.blacklistedFiles.has(fileName);
  }

  isBlacklistedDir(dirName: string): boolean {
    return this.config.blacklistedDirs.has(dirName);
  }

  matchesAlwaysExclude(fileName: string): boolean {
    return this.alwaysExclude.some((pattern) => fileName.endsWith(pattern));
  }

  matchesFileExclude(displayPath: string): boolean {
    const normalized = this.paths.normalize(displayPath);
    return this.fileExcludes.some(
      (exclude) =>
        normalized === exclude ||
        normalized.endsWith(this.paths.sep + exclude),
    );
  }

  matchesSubdirExclude(absoluteDirPath: string): boolean {
    const root = this.config.rootPath;
    const candidate = this.paths.normalize(absoluteDirPath);
    if (!this.paths.isUnder(root, candidate)) {
      return false;
    }
    const relative = this.paths.relative(root, candidate);
    return this.subdirExcludes.some(
      (exclude) =>
        relative === exclude || relative.startsWith(exclude + this.paths.sep),
    );
  }
}
