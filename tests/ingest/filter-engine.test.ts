import { describe, expect, it } from "vitest";
import { FilterEngine } from "../../src/ingest/filter-engine.js";
import { PathNormalizer } from "../../src/ingest/path-normalizer.js";
import { testConfig } from "../helpers.js";

const paths = new PathNormalizer("posix");

function engine(overrides: Parameters<typeof testConfig>[1] = {}): FilterEngine {
  return new FilterEngine(testConfig("/repo", overrides), paths);
}

describe("filter engine", () => {
  it("excludes blacklisted file names anywhere", () => {
    const filters = engine();

    expect(filters.shouldExcludeFile("/repo/LICENSE", "LICENSE")).toBe(true);
    expect(filters.shouldExcludeFile("/repo/a/uv.lock", "a/uv.lock")).toBe(true);
    expect(filters.shouldExcludeFile("/repo/main.py", "main.py")).toBe(false);
  });

  it("matches always-exclude patterns as suffixes with leading stars dropped", () => {
    const filters = engine({
      alwaysExcludePatterns: ["export.txt", "*.pyc", "*"],
    });

    expect(filters.shouldExcludeFile("/repo/x.pyc", "x.pyc")).toBe(true);
    expect(filters.shouldExcludeFile("/repo/my_export.txt", "my_export.txt")).toBe(
      true,
    );
    expect(filters.shouldExcludeFile("/repo/main.py", "main.py")).toBe(false);
  });

  it("matches files_to_exclude exactly or as a trailing path", () => {
    const filters = engine({ filesToExclude: ["secret.py", "docs/notes.md"] });

    expect(filters.matchesFileExclude("secret.py")).toBe(true);
    expect(filters.matchesFileExclude("lib/secret.py")).toBe(true);
    expect(filters.matchesFileExclude("mysecret.py")).toBe(false);
    expect(filters.matchesFileExclude("docs/notes.md")).toBe(true);
    expect(filters.matchesFileExclude("other/docs/notes.md")).toBe(true);
    expect(filters.matchesFileExclude("docs/notes.mdx")).toBe(false);
  });

  it("excludes blacklisted directories wherever they are", () => {
    const filters = engine();

    expect(filters.shouldExcludeDir("/repo/node_modules")).toBe(true);
    expect(filters.shouldExcludeDir("/elsewhere/pkg/.git")).toBe(true);
    expect(filters.shouldExcludeDir("/repo/src")).toBe(false);
  });

  it("compares subdirs_to_exclude with root-relative directories", () => {
    const filters = engine({ subdirsToExclude: ["sub", "a/b"] });

    expect(filters.shouldExcludeDir("/repo/sub")).toBe(true);
    expect(filters.shouldExcludeDir("/repo/sub/deep")).toBe(true);
    expect(filters.shouldExcludeDir("/repo/subway")).toBe(false);
    expect(filters.shouldExcludeDir("/repo/a/b")).toBe(true);
    expect(filters.shouldExcludeDir("/repo/a")).toBe(false);
    expect(filters.shouldExcludeDir("/other/sub")).toBe(false);
  });

  it("gates on the extension allow-list case-insensitively", () => {
    const filters = engine({
      extensions: { kind: "set", extensions: new Set([".py"]) },
    });

    expect(filters.admitsExtension("/repo/a.PY")).toBe(true);
    expect(filters.admitsExtension("/repo/a.js")).toBe(false);
    expect(filters.admitsExtension("/repo/Makefile")).toBe(false);
    expect(engine().admitsExtension("/repo/Makefile")).toBe(true);
  });
});
