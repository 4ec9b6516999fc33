#!/usr/bin/env node
import { Command } from "commander";
import { ConfigError } from "../errors.js";
import { ConsoleLogger, levelForFlags } from "../logging/console-logger.js";
import type { Logger } from "../logging/types.js";
import { runExportCommand } from "./export-command.js";
import { parseConfigFormat, runInitCommand } from "./init-command.js";
import { loadVersion } from "./runtime-paths.js";

interface GlobalFlags {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  readonly color: boolean;
}

interface ExportFlags {
  readonly dumpConfig?: boolean;
  readonly out?: string;
  readonly depth?: string;
  readonly summary: boolean;
}

interface InitFlags {
  readonly format: string;
  readonly out?: string;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("repo-export")
  .version(toolVersion)
  .option("--verbose", "Verbose output")
  .option("--quiet", "Only print warnings and errors")
  .option("--no-color", "Disable colored output");

program
  .command("export")
  .argument("<target>", "Repository directory or config name/path")
  .option("--dump-config", "Embed the resolved configuration in the output")
  .option("--out <file>", "Write the document to this file")
  .option("--depth <n>", "Directory depth limit (-1 for unbounded)")
  .option("--no-summary", "Skip the per-extension summary")
  .action(async (target: string, options: ExportFlags) => {
    const logger = createLogger();
    try {
      await runExportCommand(
        {
          target,
          dumpConfig: Boolean(options.dumpConfig),
          out: options.out,
          depth:
            options.depth === undefined ? undefined : parseDepth(options.depth),
          summary: options.summary,
        },
        logger,
      );
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("init")
  .argument("<directory>", "Repository directory")
  .option("--format <format>", "Config format (yaml|json)", "yaml")
  .option("--out <file>", "Write the config to this file")
  .action(async (directory: string, options: InitFlags) => {
    try {
      const output = await runInitCommand({
        directory,
        format: parseConfigFormat(options.format),
        out: options.out,
      });
      if (!options.out) {
        await writeStdout(output);
      }
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);

function createLogger(): Logger {
  const flags = program.opts<GlobalFlags>();
  return new ConsoleLogger({
    level: levelForFlags(flags),
    color: flags.color ? undefined : false,
  });
}

function parseDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < -1) {
    throw new ConfigError(
      `depth must be -1 (unbounded) or a non-negative integer, got ${value}`,
      "depth",
    );
  }
  return depth;
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}
