import pc from "picocolors";
import { errorMessage } from "../errors.js";
import type { ConsoleLoggerOptions, LogLevel, Logger } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly color: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LEVEL_ORDER[options.level ?? "info"];
    this.color = options.color ?? pc.isColorSupported;
    this.write =
      options.write ?? ((line: string) => process.stderr.write(line + "\n"));
  }

  debug(message: string): void {
    this.emit("debug", message);
  }

  info(message: string): void {
    this.emit("info", message);
  }

  warn(message: string): void {
    this.emit("warn", message);
  }

  error(message: string, error?: unknown): void {
    const detail = error === undefined ? "" : `: ${errorMessage(error)}`;
    this.emit("error", message + detail);
  }

  child(bindings: Record<string, string>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private emit(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < this.threshold) {
      return;
    }
    this.write(`${this.label(level)} ${message}`);
  }

  private label(level: LogLevel): string {
    const text = level.toUpperCase().padEnd(5);
    if (!this.color) {
      return text;
    }
    switch (level) {
      case "debug":
        return pc.gray(text);
      case "info":
        return pc.cyan(text);
      case "warn":
        return pc.yellow(text);
      case "error":
        return pc.red(text);
    }
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, string>,
  ) {}

  debug(message: string): void {
    this.base.debug(this.withPrefix(message));
  }

  info(message: string): void {
    this.base.info(this.withPrefix(message));
  }

  warn(message: string): void {
    this.base.warn(this.withPrefix(message));
  }

  error(message: string, error?: unknown): void {
    this.base.error(this.withPrefix(message), error);
  }

  child(bindings: Record<string, string>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([key, value]) => `${key}=${value}`)
      .join(" ");
    return prefix ? `[${prefix}] ${message}` : message;
  }
}

export function levelForFlags(flags: {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
}): LogLevel {
  if (flags.quiet) {
    return "warn";
  }
  return flags.verbose ? "debug" : "info";
}
