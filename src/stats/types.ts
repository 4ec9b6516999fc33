import type { FileStatistics } from "../ingest/types.js";

export type DirectoryAggregate = ReadonlyMap<string, FileStatistics>;

export const ROOT_AGGREGATE_KEY = "";
