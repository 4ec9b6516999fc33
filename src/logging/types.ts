export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  child(bindings: Record<string, string>): Logger;
}

export interface ConsoleLoggerOptions {
  readonly level?: LogLevel;
  readonly color?: boolean;
  readonly write?: (line: string) => void;
}
