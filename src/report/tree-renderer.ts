import type { ExportConfig } from "../config/types.js";
import type { FilterEngine } from "../ingest/filter-engine.js";
import { compareStrings } from "../ingest/ordering.js";
import type { PathNormalizer } from "../ingest/path-normalizer.js";
import type { FileStatistics, SelectedFile } from "../ingest/types.js";
import { formatCount } from "../stats/count-format.js";
import type { StatsAggregator } from "../stats/stats-aggregator.js";

const BRANCH = "|-- ";
const LAST_BRANCH = "\\-- ";
const PIPE = "|   ";
const SPACE = "    ";

export interface TreeRendererDeps {
  readonly config: ExportConfig;
  readonly paths: PathNormalizer;
  readonly filters: FilterEngine;
  readonly stats: StatsAggregator;
  readonly records: readonly SelectedFile[];
}

interface TreeEntry {
  readonly name: string;
  readonly absolutePath: string;
  readonly isDirectory: boolean;
}

export class TreeRenderer {
  constructor(private readonly deps: TreeRendererDeps) {}

  render(treeRoot: string): string {
    const { paths, stats } = this.deps;
    const root = paths.toSystemForm(treeRoot);
    const label = paths.basename(root) || root;
    const lines = [`${label}${formatStats(stats.statsFor("", root), true)}`];
    this.renderDirectory(root, root, "|", 0, lines);
    return lines.join("\n");
  }

  private renderDirectory(
    directory: string,
    treeRoot: string,
    prefix: string,
    depth: number,
    lines: string[],
  ): void {
    const { config, paths, stats } = this.deps;
    if (config.depth.kind === "limited" && depth > config.depth.levels) {
      return;
    }

    const entries = this.visibleEntries(directory, treeRoot);
    entries.forEach((entry, index) => {
      const last = index === entries.length - 1;
      const relativePath = paths.relative(treeRoot, entry.absolutePath);
      const suffix = formatStats(stats.statsFor(relativePath, treeRoot), false);
      lines.push(`${prefix}${last ? LAST_BRANCH : BRANCH}${entry.name}${suffix}`);
      if (entry.isDirectory) {
        this.renderDirectory(
          entry.absolutePath,
          treeRoot,
          prefix + (last ? SPACE : PIPE),
          depth + 1,
          lines,
        );
      }
    });
  }

  private visibleEntries(directory: string, treeRoot: string): TreeEntry[] {
    const { paths } = this.deps;
    const entries = new Map<string, TreeEntry>();
    for (const record of this.deps.records) {
      if (!paths.isUnder(directory, record.absolutePath)) {
        continue;
      }
      const [name, ...rest] = paths.split(paths.relative(directory, record.absolutePath));
      if (name === undefined || entries.has(name)) {
        continue;
      }
      const absolutePath = paths.join(directory, name);
      if (rest.length === 0) {
        entries.set(name, { name, absolutePath, isDirectory: false });
      } else if (this.isDirectoryVisible(absolutePath, treeRoot)) {
        entries.set(name, { name, absolutePath, isDirectory: true });
      }
    }
    return [...entries.values()].sort((a, b) => compareStrings(a.name, b.name));
  }

  isDirectoryVisible(directory: string, treeRoot: string): boolean {
    const { config, paths, filters, stats, records } = this.deps;
    if (!paths.isUnder(treeRoot, directory)) {
      return false;
    }
    if (filters.isBlacklistedDir(paths.basename(directory))) {
      return false;
    }
    if (!config.exhaustiveDirTree && filters.shouldExcludeDir(directory)) {
      return false;
    }
    const relativePath = paths.relative(treeRoot, directory);
    if (!this.withinTreeSelection(relativePath)) {
      return false;
    }
    if (records.some((record) => paths.dirname(record.absolutePath) === directory)) {
      return true;
    }
    const aggregate = stats.statsFor(relativePath, treeRoot);
    return aggregate.lines > 0 || aggregate.tokens > 0;
  }

  /**
   * With `dirs_for_tree` set, a directory is drawn when it is a listed
   * directory, lies below one, or leads to one.
   */
  private withinTreeSelection(relativePath: string): boolean {
    const { config, paths } = this.deps;
    if (config.dirsForTree.length === 0) {
      return true;
    }
    const sep = paths.sep;
    return config.dirsForTree.some(
      (listed) =>
        relativePath === listed ||
        relativePath.startsWith(listed + sep) ||
        listed.startsWith(relativePath + sep),
    );
  }
}

function formatStats(stats: FileStatistics, withUnits: boolean): string {
  const lines = formatCount(stats.lines);
  const tokens = formatCount(stats.tokens);
  return withUnits
    ? ` (${lines} lines/${tokens} tokens)`
    : ` (${lines}/${tokens})`;
}
