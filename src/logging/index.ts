export { ConsoleLogger, levelForFlags } from "./console-logger.js";
export type { ConsoleLoggerOptions, LogLevel, Logger } from "./types.js";
