export const DEFAULT_EXPORT_NAME = "export.txt";
export const DEFAULT_LINE_NUMBER_INTERVAL = 25;
export const DEFAULT_LINE_NUMBER_MIN_LENGTH = 150;
export const DEFAULT_LINE_NUMBER_PREFIX = "|LN|";
export const DEFAULT_DIRECTORY_DEPTH = 10;
export const UNBOUNDED_DEPTH = -1;

export const DEFAULT_ANNOTATE_EXTENSIONS = [
  ".py",
  ".js",
  ".ts",
  ".tsx",
  ".java",
  ".cpp",
  ".c",
  ".go",
  ".rs",
  ".sh",
  ".sql",
] as const;

export const DEFAULT_COMMENT_TOKENS: Readonly<Record<string, string>> = {
  ".py": "#",
  ".sh": "#",
  ".rb": "#",
  ".pl": "#",
  ".yaml": "#",
  ".yml": "#",
  ".dockerfile": "#",
  ".r": "#",
  ".ps1": "#",
  ".js": "//",
  ".ts": "//",
  ".tsx": "//",
  ".java": "//",
  ".c": "//",
  ".cpp": "//",
  ".h": "//",
  ".hpp": "//",
  ".cs": "//",
  ".go": "//",
  ".rs": "//",
  ".kt": "//",
  ".kts": "//",
  ".scala": "//",
  ".swift": "//",
  ".php": "//",
  ".sql": "--",
  ".lua": "--",
  ".hs": "--",
  ".ada": "--",
};

// Tabular, markup and config formats never get line markers.
export const DATA_FILE_EXTENSIONS = [
  ".tsv",
  ".csv",
  ".json",
  ".xml",
  ".yaml",
  ".yml",
  ".toml",
] as const;

export const BLACKLISTED_DIRS = [
  "__pycache__",
  ".git",
  ".venv",
  ".vscode",
  "node_modules",
  "build",
  "dist",
] as const;

export const BLACKLISTED_FILES = ["uv.lock", "LICENSE", ".DS_Store"] as const;

export const DEFAULT_ALWAYS_EXCLUDE_PATTERNS = [DEFAULT_EXPORT_NAME] as const;

export const DIRECTORY_ALWAYS_EXCLUDE_PATTERNS = [
  ".DS_Store",
  "*.pyc",
  "*.swp",
  "*.swo",
  ".coverage",
] as const;
