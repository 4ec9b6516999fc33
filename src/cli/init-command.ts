import fs from "node:fs/promises";
import path from "node:path";
import { defaultConfigFor } from "../config/config-loader.js";
import { serializeConfig } from "../config/config-serializer.js";
import type { ConfigFormat } from "../config/config-serializer.js";
import { ConfigError } from "../errors.js";

export interface InitOptions {
  readonly directory: string;
  readonly format: ConfigFormat;
  readonly out?: string;
  readonly cwd?: string;
}

export async function runInitCommand(options: InitOptions): Promise<string> {
  const cwd = options.cwd ?? process.cwd();
  const directory = path.resolve(cwd, options.directory);
  if (!(await isDirectory(directory))) {
    throw new ConfigError(
      `repo_root does not exist: ${directory}. Provide a valid directory.`,
      "repo_root",
    );
  }
  const output = serializeConfig(defaultConfigFor(directory).raw, options.format);
  if (options.out) {
    const outPath = path.resolve(cwd, options.out);
    await fs.mkdir(path.dirname(outPath), { recursive: true });
    await fs.writeFile(outPath, output, "utf8");
  }
  return output;
}

export function parseConfigFormat(value: string): ConfigFormat {
  if (value === "json" || value === "yaml") {
    return value;
  }
  throw new ConfigError(`Unsupported format: ${value}`, "format");
}

async function isDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
