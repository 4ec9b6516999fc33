export type ExportErrorCode = "ConfigError" | "OutputError";

export interface ExportErrorOptions {
  readonly cause?: unknown;
}

export class ExportError extends Error {
  readonly code: ExportErrorCode;

  constructor(
    code: ExportErrorCode,
    message: string,
    options: ExportErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class ConfigError extends ExportError {
  readonly field?: string;

  constructor(
    message: string,
    field?: string,
    options: ExportErrorOptions = {},
  ) {
    super("ConfigError", message, options);
    this.field = field;
  }
}

export class OutputError extends ExportError {
  readonly outputPath: string;

  constructor(
    message: string,
    outputPath: string,
    options: ExportErrorOptions = {},
  ) {
    super("OutputError", message, options);
    this.outputPath = outputPath;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
