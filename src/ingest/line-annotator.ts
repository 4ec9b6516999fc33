import type { LineNumberOptions } from "../config/types.js";

export interface AnnotationResult {
  readonly content: string;
  readonly interval: number;
}

export function countLines(text: string): number {
  let count = 1;
  for (const char of text) {
    if (char === "\n") {
      count += 1;
    }
  }
  return count;
}

export function annotateLines(
  content: string,
  extension: string,
  options: LineNumberOptions,
): AnnotationResult {
  const skipped = { content, interval: 0 };
  const { interval } = options;
  if (options.dataExtensions.has(extension) || interval <= 0) {
    return skipped;
  }
  if (!options.annotateExtensions.has(extension)) {
    return skipped;
  }
  const token = options.commentTokens.get(extension);
  if (!token) {
    return skipped;
  }
  if (countLines(content) < options.minLength) {
    return skipped;
  }

  const lines = content.split("\n");
  // A trailing newline leaves an empty final segment that is not a line.
  const lastLine = content.endsWith("\n") ? lines.length - 1 : lines.length;
  const output: string[] = [];
  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    if (lineNumber <= lastLine && lineNumber % interval === 0) {
      output.push(`${token}${options.prefix}${lineNumber}|`);
    }
    output.push(line);
  });
  return { content: output.join("\n"), interval };
}
