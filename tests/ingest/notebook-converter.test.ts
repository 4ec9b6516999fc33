import { describe, expect, it } from "vitest";
import { convertNotebook } from "../../src/ingest/notebook-converter.js";
import { CollectingLogger } from "../helpers.js";

describe("notebook converter", () => {
  it("renders cells as markdown and drops outputs", () => {
    const notebook = JSON.stringify({
      cells: [
        { cell_type: "markdown", source: ["# Title\n", "Intro"] },
        {
          cell_type: "code",
          source: "print(1)",
          outputs: [{ output_type: "stream", text: "1\n" }],
        },
        { cell_type: "raw", source: "raw text" },
      ],
      metadata: { kernelspec: { language: "python" } },
    });

    expect(convertNotebook(notebook)).toBe(
      "# Title\nIntro\n\n```python\nprint(1)\n```\n\nraw text",
    );
  });

  it("falls back to language_info for the fence language", () => {
    const notebook = JSON.stringify({
      cells: [{ cell_type: "code", source: ["x = 1"] }],
      metadata: { language_info: { name: "julia" } },
    });

    expect(convertNotebook(notebook)).toBe("```julia\nx = 1\n```");
  });

  it("returns a marked placeholder with the original text on failure", () => {
    const logger = new CollectingLogger();
    const raw = '{"metadata":{}}';

    expect(convertNotebook(raw, logger)).toBe(
      `<!-- Error converting notebook: notebook has no cells array -->\n${raw}`,
    );
    expect(logger.messages("warn")).toEqual([
      "Failed to convert notebook: notebook has no cells array",
    ]);
  });

  it("survives invalid JSON", () => {
    const converted = convertNotebook("{not json");

    expect(converted.startsWith("<!-- Error converting notebook: ")).toBe(true);
    expect(converted.endsWith(" -->\n{not json")).toBe(true);
  });
});
