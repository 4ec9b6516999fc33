import path from "node:path";
import type { Logger } from "../logging/types.js";
import type {
  PathFlavor,
  PathRewriteRule,
  RawExportConfig,
} from "../config/types.js";

export function hostFlavor(): PathFlavor {
  return process.platform === "win32" ? "win32" : "posix";
}

export class PathNormalizer {
  readonly flavor: PathFlavor;
  readonly sep: string;
  private readonly impl: path.PlatformPath;
  private readonly logger?: Logger;

  constructor(flavor: PathFlavor = hostFlavor(), logger?: Logger) {
    this.flavor = flavor;
    this.impl = flavor === "win32" ? path.win32 : path.posix;
    this.sep = this.impl.sep;
    this.logger = logger;
  }

  toSystemForm(input: string): string {
    if (input.length === 0 || input.includes("\0")) {
      this.logger?.warn(
        `Could not normalize path ${JSON.stringify(input)}; using it unchanged`,
      );
      return input;
    }
    const converted =
      this.flavor === "win32"
        ? input.replaceAll("/", "\\")
        : input.replaceAll("\\", "/");
    return this.stripTrailingSeparator(this.impl.normalize(converted));
  }

  // Lexical only: a backslash in a name read from disk stays a name character.
  normalize(input: string): string {
    return this.stripTrailingSeparator(this.impl.normalize(input));
  }

  rewrite(input: string, rules: readonly PathRewriteRule[]): string {
    const candidate = unifySeparators(input);
    for (const rule of rules) {
      const from = unifySeparators(rule.from).replace(/\/+$/, "");
      if (!from) {
        continue;
      }
      if (candidate !== from && !candidate.startsWith(from + "/")) {
        continue;
      }
      const remainder = candidate.slice(from.length).replace(/^\/+/, "");
      const target = this.toSystemForm(rule.to);
      return remainder
        ? this.toSystemForm(this.impl.join(target, remainder))
        : target;
    }
    return input;
  }

  resolve(
    input: string,
    base: string,
    rules: readonly PathRewriteRule[] = [],
  ): string {
    const normalized = this.toSystemForm(this.rewrite(input, rules));
    if (this.impl.isAbsolute(normalized)) {
      return normalized;
    }
    return this.toSystemForm(this.impl.resolve(base, normalized));
  }

  isAbsolute(input: string): boolean {
    return this.impl.isAbsolute(input);
  }

  join(...segments: string[]): string {
    return this.impl.join(...segments);
  }

  basename(input: string): string {
    return this.impl.basename(input);
  }

  dirname(input: string): string {
    return this.impl.dirname(input);
  }

  extension(input: string): string {
    return this.impl.extname(input).toLowerCase();
  }

  relative(from: string, to: string): string {
    return this.impl.relative(from, to);
  }

  isUnder(directory: string, candidate: string): boolean {
    const base = directory.endsWith(this.sep) ? directory : directory + this.sep;
    return candidate.startsWith(base) && candidate.length > base.length;
  }

  split(input: string): string[] {
    return input.split(this.sep).filter((segment) => segment.length > 0);
  }

  private stripTrailingSeparator(input: string): string {
    const root = this.impl.parse(input).root;
    let result = input;
    while (result.length > root.length && result.endsWith(this.sep)) {
      result = result.slice(0, -1);
    }
    return result;
  }
}

export function resolveRoot(
  config: RawExportConfig,
  paths: PathNormalizer,
  cwd: string,
): RawExportConfig {
  return {
    ...config,
    repo_root: paths.resolve(config.repo_root, cwd, config.path_rewrites),
  };
}

function unifySeparators(input: string): string {
  return input.replaceAll("\\", "/");
}
