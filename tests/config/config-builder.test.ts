import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildExportConfig, normalizeExtension } from "../../src/config/config-builder.js";
import type { RawExportConfig } from "../../src/config/types.js";
import { CollectingLogger } from "../helpers.js";

let tempDir: string;
let rootDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-export-test-"));
  rootDir = path.join(tempDir, "repo");
  await fs.mkdir(rootDir);
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

function build(raw: RawExportConfig, logger?: CollectingLogger) {
  return buildExportConfig(
    { raw, sourceLabel: "test-config" },
    { cwd: tempDir, logger },
  );
}

describe("config builder", () => {
  it("fills defaults", async () => {
    const config = await build({ repo_root: rootDir });

    expect(config.rootPath).toBe(rootDir);
    expect(config.outputPath).toBe(path.join(rootDir, "export.txt"));
    expect(config.alwaysExcludePatterns).toEqual(["export.txt"]);
    expect(config.depth).toEqual({ kind: "unbounded" });
    expect(config.topLevelFiles).toEqual({ kind: "none" });
    expect(config.extensions).toEqual({ kind: "all" });
    expect(config.lineNumbers.interval).toBe(25);
    expect(config.lineNumbers.minLength).toBe(150);
    expect(config.lineNumbers.prefix).toBe("|LN|");
    expect(config.dumpConfig).toBe(false);
  });

  it("resolves a relative root against the working directory", async () => {
    const config = await build({ repo_root: "repo" });

    expect(config.rootPath).toBe(rootDir);
  });

  it("fails on a missing root naming the field", async () => {
    await expect(
      build({ repo_root: path.join(tempDir, "missing") }),
    ).rejects.toMatchObject({ code: "ConfigError", field: "repo_root" });
  });

  it("fails when the root is a file", async () => {
    const filePath = path.join(tempDir, "file.txt");
    await fs.writeFile(filePath, "x");

    await expect(build({ repo_root: filePath })).rejects.toThrow(
      `repo_root must be a directory: ${filePath}`,
    );
  });

  it("places the output under output_dir and excludes its name", async () => {
    const config = await build({
      repo_root: rootDir,
      export_name: "out.txt",
      output_dir: "exports",
    });

    expect(config.outputPath).toBe(path.join(tempDir, "exports", "out.txt"));
    expect(config.alwaysExcludePatterns).toEqual(["export.txt", "out.txt"]);
  });

  it("ignores output_dir for an absolute export_name", async () => {
    const logger = new CollectingLogger();
    const target = path.join(tempDir, "abs.txt");
    const config = await build(
      { repo_root: rootDir, export_name: target, output_dir: "exports" },
      logger,
    );

    expect(config.outputPath).toBe(target);
    expect(logger.messages("warn")).toEqual([
      `export_name '${target}' is absolute; ignoring output_dir`,
    ]);
  });

  it("normalizes extensions and comment tokens", async () => {
    const config = await build({
      repo_root: rootDir,
      included_extensions: ["PY", ".Md"],
      annotate_extensions: ["lua"],
      comment_tokens: { LUA: "--", ".py": ";" },
    });

    expect(config.extensions).toEqual({
      kind: "set",
      extensions: new Set([".py", ".md"]),
    });
    expect(config.lineNumbers.annotateExtensions).toEqual(new Set([".lua"]));
    expect(config.lineNumbers.commentTokens.get(".lua")).toBe("--");
    expect(config.lineNumbers.commentTokens.get(".py")).toBe(";");
    expect(config.lineNumbers.commentTokens.get(".ts")).toBe("//");
  });

  it("applies command-line overrides", async () => {
    const config = await buildExportConfig(
      { raw: { repo_root: rootDir, depth: 5 }, sourceLabel: "test-config" },
      {
        cwd: tempDir,
        overrides: { depth: 2, dumpConfig: true, outputPath: "out/doc.txt" },
      },
    );

    expect(config.depth).toEqual({ kind: "limited", levels: 2 });
    expect(config.dumpConfig).toBe(true);
    expect(config.outputPath).toBe(path.join(tempDir, "out", "doc.txt"));
    expect(config.alwaysExcludePatterns).toEqual(["export.txt", "doc.txt"]);
  });

  it("models top-level file lists", async () => {
    const config = await build({
      repo_root: rootDir,
      include_top_level_files: ["README.md"],
    });

    expect(config.topLevelFiles).toEqual({
      kind: "list",
      names: new Set(["README.md"]),
    });
  });

  it("warns about relative additional directories", async () => {
    const logger = new CollectingLogger();
    const config = await build(
      { repo_root: rootDir, additional_dirs_to_traverse: ["shared"] },
      logger,
    );

    expect(config.additionalDirs).toEqual([path.join(tempDir, "shared")]);
    expect(logger.messages("warn")).toEqual([
      `Path 'shared' in additional_dirs_to_traverse is relative; resolving against ${tempDir}`,
    ]);
  });
});

describe("normalizeExtension", () => {
  it("adds the dot and lower-cases", () => {
    expect(normalizeExtension("PY")).toBe(".py");
    expect(normalizeExtension(".Ts")).toBe(".ts");
    expect(normalizeExtension(" ")).toBe("");
  });
});
