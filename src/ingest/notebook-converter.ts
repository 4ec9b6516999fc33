import { errorMessage } from "../errors.js";
import type { Logger } from "../logging/types.js";
import type { NotebookConverter } from "./types.js";

const DEFAULT_LANGUAGE = "python";

interface NotebookCell {
  readonly cellType: string;
  readonly source: string;
}

export function convertNotebook(rawJson: string, logger?: Logger): string {
  try {
    return renderNotebook(JSON.parse(rawJson));
  } catch (error) {
    const message = errorMessage(error);
    logger?.warn(`Failed to convert notebook: ${message}`);
    return `<!-- Error converting notebook: ${message} -->\n${rawJson}`;
  }
}

export function createNotebookConverter(logger?: Logger): NotebookConverter {
  return (rawJson) => convertNotebook(rawJson, logger);
}

function renderNotebook(notebook: unknown): string {
  if (!isRecord(notebook)) {
    throw new Error("notebook must be a JSON object");
  }
  if (!Array.isArray(notebook.cells)) {
    throw new Error("notebook has no cells array");
  }
  const language = notebookLanguage(notebook.metadata);
  const blocks: string[] = [];
  notebook.cells.forEach((entry: unknown, index) => {
    const cell = parseCell(entry, index);
    if (cell.cellType === "code") {
      blocks.push(`\`\`\`${language}\n${cell.source}\n\`\`\``);
      return;
    }
    if (cell.source.length > 0) {
      blocks.push(cell.source);
    }
  });
  return blocks.join("\n\n");
}

function parseCell(entry: unknown, index: number): NotebookCell {
  if (!isRecord(entry) || typeof entry.cell_type !== "string") {
    throw new Error(`cell ${index} has no cell_type`);
  }
  const { source } = entry;
  if (typeof source === "string") {
    return { cellType: entry.cell_type, source };
  }
  if (
    Array.isArray(source) &&
    source.every((part): part is string => typeof part === "string")
  ) {
    return { cellType: entry.cell_type, source: source.join("") };
  }
  throw new Error(`cell ${index} has an invalid source`);
}

function notebookLanguage(metadata: unknown): string {
  if (!isRecord(metadata)) {
    return DEFAULT_LANGUAGE;
  }
  const { kernelspec, language_info: languageInfo } = metadata;
  if (isRecord(kernelspec) && typeof kernelspec.language === "string") {
    return kernelspec.language;
  }
  if (isRecord(languageInfo) && typeof languageInfo.name === "string") {
    return languageInfo.name;
  }
  return DEFAULT_LANGUAGE;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
