import { compareStrings } from "../ingest/ordering.js";
import type { SelectedFile } from "../ingest/types.js";
import { escapeAttribute, escapeText } from "./markup-escape.js";
import type { ConfigBlock, RenderedTree } from "./types.js";

export interface DocumentInput {
  readonly config?: ConfigBlock;
  readonly trees: readonly RenderedTree[];
  readonly records: readonly SelectedFile[];
  readonly sep: string;
}

interface NestedFile {
  readonly record: SelectedFile;
  readonly segments: readonly string[];
}

export function serializeDocument(input: DocumentInput): string {
  const lines: string[] = ["<codebase_context>"];

  if (input.config) {
    lines.push(`  <config source="${escapeAttribute(input.config.source)}">`);
    lines.push(escapeText(JSON.stringify(input.config.snapshot, null, 2)));
    lines.push("  </config>");
  }

  for (const tree of input.trees) {
    lines.push(`  <dirtree root="${escapeAttribute(tree.root)}">`);
    lines.push(tree.text);
    lines.push("  </dirtree>");
  }

  lines.push("  <files>");
  const internal = input.records
    .filter((record) => !record.external)
    .map((record) => ({ record, segments: record.displayPath.split(input.sep) }));
  appendLevel(lines, "", internal, 2, input.sep);

  const external = input.records
    .filter((record) => record.external)
    .sort((a, b) => compareStrings(a.absolutePath, b.absolutePath));
  if (external.length > 0) {
    lines.push("    <external_files>");
    for (const record of external) {
      appendFile(lines, record, 3);
    }
    lines.push("    </external_files>");
  }
  lines.push("  </files>");
  lines.push("</codebase_context>");
  return lines.join("\n");
}

function appendLevel(
  lines: string[],
  dirKey: string,
  files: readonly NestedFile[],
  level: number,
  sep: string,
): void {
  const here: SelectedFile[] = [];
  const subdirs = new Map<string, NestedFile[]>();
  for (const file of files) {
    const [head, ...rest] = file.segments;
    if (head === undefined || rest.length === 0) {
      here.push(file.record);
      continue;
    }
    const key = dirKey ? `${dirKey}${sep}${head}` : head;
    const group = subdirs.get(key) ?? [];
    group.push({ record: file.record, segments: rest });
    subdirs.set(key, group);
  }

  here.sort((a, b) => compareStrings(a.displayPath, b.displayPath));
  for (const record of here) {
    appendFile(lines, record, level);
  }

  const indent = "  ".repeat(level);
  const keys = [...subdirs.keys()].sort(compareStrings);
  for (const key of keys) {
    lines.push(`${indent}<dir path="${escapeAttribute(key)}">`);
    appendLevel(lines, key, subdirs.get(key) ?? [], level + 1, sep);
    lines.push(`${indent}</dir>`);
  }
}

function appendFile(lines: string[], record: SelectedFile, level: number): void {
  const indent = "  ".repeat(level);
  const notebook = record.convertedFromNotebook
    ? ' converted_from_ipynb="true"'
    : "";
  const interval =
    record.annotationInterval > 0
      ? ` line_interval="${record.annotationInterval}"`
      : "";
  lines.push(
    `${indent}<file path="${escapeAttribute(record.displayPath)}"${notebook}${interval}>`,
  );
  lines.push(record.content);
  lines.push(`${indent}</file>`);
}
