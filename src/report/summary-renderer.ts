import type { BufferTotals, ExtensionStats } from "../ingest/types.js";
import { compareStrings } from "../ingest/ordering.js";
import { formatCount } from "../stats/count-format.js";
import type { SummaryRow } from "./types.js";

export interface SummaryInput {
  readonly outputPath: string;
  readonly totals: BufferTotals;
  readonly byExtension: ReadonlyMap<string, ExtensionStats>;
  readonly tokenizerName?: string;
}

export function summaryRows(
  byExtension: ReadonlyMap<string, ExtensionStats>,
): SummaryRow[] {
  return [...byExtension.entries()]
    .sort(([a], [b]) => compareStrings(a, b))
    .map(([extension, stats]) => ({ extension, ...stats }));
}

export function renderSummary(input: SummaryInput): string {
  const { totals } = input;
  const lines = [
    `Exported to: ${input.outputPath}`,
    `Total files exported: ${totals.files}`,
    `Total lines exported: ${totals.lines}`,
  ];
  if (input.tokenizerName) {
    lines.push(
      `Total tokens exported (estimated, ${input.tokenizerName}): ${totals.tokens} (${formatCount(totals.tokens)})`,
    );
  }
  lines.push("");
  lines.push("Exported content by extension:");
  const rows = summaryRows(input.byExtension);
  if (rows.length === 0) {
    lines.push("  (No files exported)");
    return lines.join("\n");
  }
  lines.push(
    renderAsciiTable(
      rows.map((row) => [
        row.extension,
        String(row.files),
        formatCount(row.lines),
        formatCount(row.tokens),
      ]),
      ["Extension", "Files", "Lines", "Tokens"],
    ),
  );
  return lines.join("\n");
}

export function renderAsciiTable(
  rows: readonly string[][],
  headers: readonly string[],
): string {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const headerLine = `| ${headers
    .map((header, index) => header.padEnd(widths[index] ?? 0))
    .join(" | ")} |`;
  const body = rows.map(
    (row) =>
      `| ${row
        .map((cell, index) => cell.padEnd(widths[index] ?? 0))
        .join(" | ")} |`,
  );
  return [border, headerLine, border, ...body, border].join("\n");
}
