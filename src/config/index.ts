export { buildExportConfig, normalizeExtension } from "./config-builder.js";
export type { BuildConfigOptions, ConfigOverrides } from "./config-builder.js";
export {
  defaultConfigFor,
  loadConfig,
  parseConfigFile,
  resolveTarget,
} from "./config-loader.js";
export type { LoadConfigOptions } from "./config-loader.js";
export { configSnapshot, serializeConfig } from "./config-serializer.js";
export type { ConfigFormat } from "./config-serializer.js";
export { validateConfig } from "./config-validator.js";
export type {
  DepthLimit,
  ExportConfig,
  ExtensionFilter,
  LineNumberOptions,
  LoadedConfig,
  PathFlavor,
  PathRewriteRule,
  RawExportConfig,
  TopLevelFiles,
} from "./types.js";
