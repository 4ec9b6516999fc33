export { formatCount } from "./count-format.js";
export { StatsAggregator, computeDirectoryAggregates } from "./stats-aggregator.js";
export { ROOT_AGGREGATE_KEY } from "./types.js";
export type { DirectoryAggregate } from "./types.js";
