import { describe, expect, it } from "vitest";
import { renderSummary, summaryRows } from "../../src/report/summary-renderer.js";

const byExtension = new Map([
  [".py", { files: 2, lines: 1500, tokens: 30 }],
  ["._no_extension_", { files: 1, lines: 3, tokens: 0 }],
]);

describe("summary renderer", () => {
  it("sorts rows by extension", () => {
    expect(summaryRows(byExtension).map((row) => row.extension)).toEqual([
      "._no_extension_",
      ".py",
    ]);
  });

  it("renders totals and a per-extension table", () => {
    const output = renderSummary({
      outputPath: "/repo/export.txt",
      totals: { files: 3, lines: 1503, tokens: 30 },
      byExtension,
      tokenizerName: "o200k_base",
    });

    expect(output.split("\n")).toEqual([
      "Exported to: /repo/export.txt",
      "Total files exported: 3",
      "Total lines exported: 1503",
      "Total tokens exported (estimated, o200k_base): 30 (30)",
      "",
      "Exported content by extension:",
      "+-----------------+-------+-------+--------+",
      "| Extension       | Files | Lines | Tokens |",
      "+-----------------+-------+-------+--------+",
      "| ._no_extension_ | 1     | 3     | 0      |",
      "| .py             | 2     | 1.5k  | 30     |",
      "+-----------------+-------+-------+--------+",
    ]);
  });

  it("omits token totals without a tokenizer and notes an empty export", () => {
    const output = renderSummary({
      outputPath: "/repo/export.txt",
      totals: { files: 0, lines: 0, tokens: 0 },
      byExtension: new Map(),
    });

    expect(output.split("\n")).toEqual([
      "Exported to: /repo/export.txt",
      "Total files exported: 0",
      "Total lines exported: 0",
      "",
      "Exported content by extension:",
      "  (No files exported)",
    ]);
  });
});
