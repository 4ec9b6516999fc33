import type { FileStatistics, SelectedFile } from "../ingest/types.js";
import type { PathNormalizer } from "../ingest/path-normalizer.js";
import { ROOT_AGGREGATE_KEY } from "./types.js";
import type { DirectoryAggregate } from "./types.js";

const ZERO: FileStatistics = { lines: 0, tokens: 0 };

export function computeDirectoryAggregates(
  records: readonly SelectedFile[],
  sep: string,
): DirectoryAggregate {
  const aggregates = new Map<string, FileStatistics>();
  let root = ZERO;
  for (const record of records) {
    if (record.external) {
      continue;
    }
    root = addStats(root, record.stats);
    const parts = record.displayPath.split(sep);
    for (let end = 1; end < parts.length; end += 1) {
      const key = parts.slice(0, end).join(sep);
      aggregates.set(key, addStats(aggregates.get(key) ?? ZERO, record.stats));
    }
  }
  aggregates.set(ROOT_AGGREGATE_KEY, root);
  return aggregates;
}

export class StatsAggregator {
  private readonly byPath: ReadonlyMap<string, FileStatistics>;

  constructor(
    private readonly records: readonly SelectedFile[],
    private readonly paths: PathNormalizer,
  ) {
    this.byPath = new Map(
      records.map((record) => [record.absolutePath, record.stats]),
    );
  }

  directoryAggregates(): DirectoryAggregate {
    return computeDirectoryAggregates(this.records, this.paths.sep);
  }

  /**
   * Stats for a path relative to `treeRoot`. A buffered file wins over a
   * directory of the same name; a directory sums every buffered file
   * beneath it by absolute path, so external trees work too.
   */
  statsFor(relativePath: string, treeRoot: string): FileStatistics {
    const target = relativePath
      ? this.paths.normalize(this.paths.join(treeRoot, relativePath))
      : this.paths.normalize(treeRoot);
    const file = this.byPath.get(target);
    if (file) {
      return file;
    }
    let total = ZERO;
    for (const record of this.records) {
      if (this.paths.isUnder(target, record.absolutePath)) {
        total = addStats(total, record.stats);
      }
    }
    return total;
  }
}

function addStats(left: FileStatistics, right: FileStatistics): FileStatistics {
  return {
    lines: left.lines + right.lines,
    tokens: left.tokens + right.tokens,
  };
}
