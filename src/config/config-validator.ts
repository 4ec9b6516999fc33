import { ConfigError } from "../errors.js";
import type { PathRewriteRule, RawExportConfig } from "./types.js";

const CONFIG_KEYS = new Set([
  "repo_root",
  "export_name",
  "output_dir",
  "dirs_to_traverse",
  "include_top_level_files",
  "included_extensions",
  "subdirs_to_exclude",
  "files_to_exclude",
  "files_to_include",
  "additional_dirs_to_traverse",
  "always_exclude_patterns",
  "dirs_for_tree",
  "depth",
  "exhaustive_dir_tree",
  "dump_config",
  "line_number_interval",
  "line_number_min_length",
  "line_number_prefix",
  "annotate_extensions",
  "comment_tokens",
  "path_rewrites",
]);

const STRING_LIST_KEYS = [
  "dirs_to_traverse",
  "subdirs_to_exclude",
  "files_to_exclude",
  "files_to_include",
  "additional_dirs_to_traverse",
  "always_exclude_patterns",
  "dirs_for_tree",
  "annotate_extensions",
] as const;

const BOOLEAN_KEYS = ["exhaustive_dir_tree", "dump_config"] as const;

const INTEGER_KEYS = ["line_number_interval", "line_number_min_length"] as const;

const STRING_KEYS = ["export_name", "line_number_prefix", "output_dir"] as const;

const REWRITE_RULE_KEYS = new Set(["from", "to"]);

type MutableConfig = { -readonly [K in keyof RawExportConfig]: RawExportConfig[K] };

interface ValidationIssue {
  readonly field: string;
  readonly message: string;
}

/**
 * Validate an authored configuration object. Every problem is collected
 * before failing so one run reports them all.
 */
export function validateConfig(input: unknown): RawExportConfig {
  const issues: ValidationIssue[] = [];
  const config = parseConfig(input, issues);
  const first = issues[0];
  if (first) {
    throw new ConfigError(
      `Invalid configuration: ${issues.map((issue) => issue.message).join("; ")}`,
      first.field,
    );
  }
  return config;
}

function parseConfig(input: unknown, issues: ValidationIssue[]): RawExportConfig {
  if (!isRecord(input)) {
    issues.push({ field: "config", message: "config must be an object" });
    return { repo_root: "" };
  }

  for (const key of Object.keys(input)) {
    if (!CONFIG_KEYS.has(key)) {
      issues.push({
        field: key,
        message: `config contains unsupported field '${key}'`,
      });
    }
  }

  const repoRoot = input.repo_root;
  if (typeof repoRoot !== "string" || repoRoot.trim() === "") {
    issues.push({
      field: "repo_root",
      message: "repo_root must be a non-empty string",
    });
  }

  const config: MutableConfig = {
    repo_root: typeof repoRoot === "string" ? repoRoot : "",
  };

  for (const key of STRING_KEYS) {
    const value = input[key];
    if (value === undefined || (key === "output_dir" && value === null)) {
      continue;
    }
    if (typeof value !== "string") {
      issues.push({ field: key, message: `${key} must be a string` });
      continue;
    }
    config[key] = value;
  }

  for (const key of STRING_LIST_KEYS) {
    if (input[key] !== undefined) {
      config[key] = parseStringArray(input[key], key, issues);
    }
  }

  for (const key of BOOLEAN_KEYS) {
    const value = input[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "boolean") {
      issues.push({ field: key, message: `${key} must be a boolean` });
      continue;
    }
    config[key] = value;
  }

  const depth = input.depth;
  if (depth !== undefined) {
    if (typeof depth !== "number" || !Number.isInteger(depth) || depth < -1) {
      issues.push({
        field: "depth",
        message: "depth must be -1 (unbounded) or a non-negative integer",
      });
    } else {
      config.depth = depth;
    }
  }

  for (const key of INTEGER_KEYS) {
    const value = input[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "number" || !Number.isInteger(value)) {
      issues.push({ field: key, message: `${key} must be an integer` });
      continue;
    }
    config[key] = value;
  }

  const topLevel = input.include_top_level_files;
  if (topLevel !== undefined) {
    if (topLevel === "all" || topLevel === "none") {
      config.include_top_level_files = topLevel;
    } else if (Array.isArray(topLevel)) {
      config.include_top_level_files = parseStringArray(
        topLevel,
        "include_top_level_files",
        issues,
      );
    } else {
      issues.push({
        field: "include_top_level_files",
        message: "include_top_level_files must be 'all', 'none' or an array",
      });
    }
  }

  const extensions = input.included_extensions;
  if (extensions !== undefined) {
    if (extensions === "all") {
      config.included_extensions = "all";
    } else if (Array.isArray(extensions)) {
      config.included_extensions = parseStringArray(
        extensions,
        "included_extensions",
        issues,
      );
    } else {
      issues.push({
        field: "included_extensions",
        message: "included_extensions must be 'all' or an array",
      });
    }
  }

  if (input.comment_tokens !== undefined) {
    config.comment_tokens = parseCommentTokens(input.comment_tokens, issues);
  }

  if (input.path_rewrites !== undefined) {
    config.path_rewrites = parseRewriteRules(input.path_rewrites, issues);
  }

  return config;
}

function parseCommentTokens(
  input: unknown,
  issues: ValidationIssue[],
): Record<string, string> {
  if (!isRecord(input)) {
    issues.push({
      field: "comment_tokens",
      message: "comment_tokens must be an object",
    });
    return {};
  }
  const tokens: Record<string, string> = {};
  for (const [extension, token] of Object.entries(input)) {
    if (typeof token !== "string" || token.length === 0) {
      issues.push({
        field: "comment_tokens",
        message: `comment_tokens.${extension} must be a non-empty string`,
      });
      continue;
    }
    tokens[extension] = token;
  }
  return tokens;
}

function parseRewriteRules(
  input: unknown,
  issues: ValidationIssue[],
): PathRewriteRule[] {
  if (!Array.isArray(input)) {
    issues.push({
      field: "path_rewrites",
      message: "path_rewrites must be an array",
    });
    return [];
  }
  const rules: PathRewriteRule[] = [];
  input.forEach((entry: unknown, index) => {
    const label = `path_rewrites[${index}]`;
    if (!isRecord(entry)) {
      issues.push({ field: "path_rewrites", message: `${label} must be an object` });
      return;
    }
    for (const key of Object.keys(entry)) {
      if (!REWRITE_RULE_KEYS.has(key)) {
        issues.push({
          field: "path_rewrites",
          message: `${label} contains unsupported field '${key}'`,
        });
      }
    }
    const { from, to } = entry;
    if (typeof from !== "string" || from.length === 0) {
      issues.push({
        field: "path_rewrites",
        message: `${label}.from must be a non-empty string`,
      });
      return;
    }
    if (typeof to !== "string" || to.length === 0) {
      issues.push({
        field: "path_rewrites",
        message: `${label}.to must be a non-empty string`,
      });
      return;
    }
    rules.push({ from, to });
  });
  return rules;
}

function parseStringArray(
  input: unknown,
  field: string,
  issues: ValidationIssue[],
): string[] {
  if (!Array.isArray(input)) {
    issues.push({ field, message: `${field} must be an array` });
    return [];
  }
  const values: string[] = [];
  input.forEach((entry: unknown, index) => {
    if (typeof entry !== "string") {
      issues.push({ field, message: `${field}[${index}] must be a string` });
      return;
    }
    values.push(entry);
  });
  return values;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
