import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export async function resolveConfigsDirectory(): Promise<string | null> {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const bundledConfigsDir = path.resolve(moduleDir, "..", "..", "configs");
  if (await existsDirectory(bundledConfigsDir)) {
    return bundledConfigsDir;
  }
  return null;
}

export async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json = JSON.parse(raw) as { version?: string };
  return json.version ?? "0.0.0";
}

async function existsDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
