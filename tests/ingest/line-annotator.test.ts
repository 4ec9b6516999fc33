import { describe, expect, it } from "vitest";
import type { LineNumberOptions } from "../../src/config/types.js";
import { annotateLines, countLines } from "../../src/ingest/line-annotator.js";
import { linesOf, testConfig } from "../helpers.js";

const options: LineNumberOptions = {
  interval: 2,
  minLength: 4,
  prefix: "|LN|",
  annotateExtensions: new Set([".py", ".json", ".sql"]),
  commentTokens: new Map([
    [".py", "#"],
    [".json", "#"],
  ]),
  dataExtensions: new Set([".json"]),
};

describe("line annotator", () => {
  it("counts newlines plus one", () => {
    expect(countLines("")).toBe(1);
    expect(countLines("a\n")).toBe(2);
    expect(countLines("a\nb\nc")).toBe(3);
  });

  it("inserts a marker before every multiple of the interval", () => {
    expect(annotateLines("a\nb\nc\nd", ".py", options)).toEqual({
      content: "a\n#|LN|2|\nb\nc\n#|LN|4|\nd",
      interval: 2,
    });
  });

  it("does not mark the empty segment after a final newline", () => {
    const result = annotateLines("a\nb\n", ".py", {
      ...options,
      interval: 3,
      minLength: 1,
    });

    expect(result).toEqual({ content: "a\nb\n", interval: 3 });
  });

  it("skips files below the minimum length", () => {
    expect(annotateLines("a\nb\nc", ".py", options)).toEqual({
      content: "a\nb\nc",
      interval: 0,
    });
  });

  it("skips data formats, unlisted extensions and missing comment tokens", () => {
    const content = "a\nb\nc\nd";

    expect(annotateLines(content, ".json", options).interval).toBe(0);
    expect(annotateLines(content, ".js", options).interval).toBe(0);
    expect(annotateLines(content, ".sql", options).interval).toBe(0);
    expect(annotateLines(content, ".py", { ...options, interval: 0 }).interval).toBe(
      0,
    );
  });

  it("annotates exactly at the default threshold and not one line below", () => {
    const defaults = testConfig("/repo").lineNumbers;

    const atThreshold = annotateLines(linesOf(150), ".py", defaults);
    expect(atThreshold.interval).toBe(25);
    expect(atThreshold.content.split("\n")).toHaveLength(156);
    expect(atThreshold.content.split("\n").slice(24, 26)).toEqual([
      "#|LN|25|",
      "line25",
    ]);

    const below = annotateLines(linesOf(149), ".ts", defaults);
    expect(below).toEqual({ content: linesOf(149), interval: 0 });
  });
});
