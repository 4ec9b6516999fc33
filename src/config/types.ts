export type PathFlavor = "posix" | "win32";

export type ExtensionFilter =
  | { readonly kind: "all" }
  | { readonly kind: "set"; readonly extensions: ReadonlySet<string> };

export type TopLevelFiles =
  | { readonly kind: "none" }
  | { readonly kind: "all" }
  | { readonly kind: "list"; readonly names: ReadonlySet<string> };

export type DepthLimit =
  | { readonly kind: "unbounded" }
  | { readonly kind: "limited"; readonly levels: number };

export interface PathRewriteRule {
  readonly from: string;
  readonly to: string;
}

export interface LineNumberOptions {
  readonly interval: number;
  readonly minLength: number;
  readonly prefix: string;
  readonly annotateExtensions: ReadonlySet<string>;
  readonly commentTokens: ReadonlyMap<string, string>;
  readonly dataExtensions: ReadonlySet<string>;
}

export interface ExportConfig {
  readonly rootPath: string;
  readonly sourceLabel: string;
  readonly flavor: PathFlavor;
  readonly dirsToTraverse: readonly string[];
  readonly additionalDirs: readonly string[];
  readonly topLevelFiles: TopLevelFiles;
  readonly extensions: ExtensionFilter;
  readonly subdirsToExclude: readonly string[];
  readonly filesToExclude: readonly string[];
  readonly filesToInclude: readonly string[];
  readonly alwaysExcludePatterns: readonly string[];
  readonly blacklistedDirs: ReadonlySet<string>;
  readonly blacklistedFiles: ReadonlySet<string>;
  readonly depth: DepthLimit;
  readonly exhaustiveDirTree: boolean;
  readonly dirsForTree: readonly string[];
  readonly lineNumbers: LineNumberOptions;
  readonly pathRewrites: readonly PathRewriteRule[];
  readonly outputPath: string;
  readonly dumpConfig: boolean;
}

export interface RawExportConfig {
  readonly repo_root: string;
  readonly export_name?: string;
  readonly output_dir?: string | null;
  readonly dirs_to_traverse?: readonly string[];
  readonly include_top_level_files?: "all" | "none" | readonly string[];
  readonly included_extensions?: "all" | readonly string[];
  readonly subdirs_to_exclude?: readonly string[];
  readonly files_to_exclude?: readonly string[];
  readonly files_to_include?: readonly string[];
  readonly additional_dirs_to_traverse?: readonly string[];
  readonly always_exclude_patterns?: readonly string[];
  readonly dirs_for_tree?: readonly string[];
  readonly depth?: number;
  readonly exhaustive_dir_tree?: boolean;
  readonly dump_config?: boolean;
  readonly line_number_interval?: number;
  readonly line_number_min_length?: number;
  readonly line_number_prefix?: string;
  readonly annotate_extensions?: readonly string[];
  readonly comment_tokens?: Readonly<Record<string, string>>;
  readonly path_rewrites?: readonly PathRewriteRule[];
}

export interface LoadedConfig {
  readonly raw: RawExportConfig;
  readonly sourceLabel: string;
  readonly loadedFrom?: string;
}
