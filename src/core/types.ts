/** What a traversal yields */
export type TraversalKind = "files" | "dirs" | "both";

/** Options accepted by {@link PathMatcher.matches} */
export interface MatchOptions {
  /** Whether the path names a directory */
  isDir?: boolean;
  /** Patterns the path must match (empty = match all) */
  include?: readonly string[];
  /** Patterns that reject the path */
  exclude?: readonly string[];
}

/**
 * Checks relative paths against include/exclude pattern lists.
 *
 * A path matches when it matches at least one include pattern (or include is
 * empty) and no exclude pattern. Paths are relative to a search root and use
 * forward slashes.
 */
export interface PathMatcher {
  /** Whether `!pattern` re-includes previously matched paths */
  readonly supportsNegation: boolean;
  /** Whether `pattern/` only matches directories */
  readonly supportsDirOnly: boolean;
  matches(path: string, options?: MatchOptions): boolean;
}

/** Patterns collected from pattern files between an entry root and a candidate */
export interface AncestorPatterns {
  readonly include: readonly string[];
  readonly exclude: readonly string[];
}

/** One entry yielded by the internal walker */
export interface WalkEntry {
  /** Absolute path */
  path: string;
  /** Path relative to the walk root, forward slashes */
  relative: string;
  isDir: boolean;
}

export interface TraverseOptions {
  /** Glob-style pattern ORed with `include`. Defaults to "**" (no constraint). */
  pattern?: string;
  kind?: TraversalKind;
  include?: readonly string[];
  /** Also used to prune directories before descending */
  exclude?: readonly string[];
  /** Defaults to a new GlobMatcher */
  matcher?: PathMatcher;
  /** Defaults to true */
  followSymlinks?: boolean;
}

/** A single pattern or a list of them */
export type PatternInput = string | readonly string[];

/** A single pattern file path or a list of them */
export type PatternFileInput = string | readonly string[];

export interface SearchOptions {
  kind?: TraversalKind;
  include?: PatternInput;
  /** Strict pattern files whose lines are added to `include` */
  includeFrom?: PatternFileInput;
  /** Filename looked up in every directory from the entry root to the candidate */
  includeFromAncestors?: string;
  exclude?: PatternInput;
  excludeFrom?: PatternFileInput;
  excludeFromAncestors?: string;
  matcher?: PathMatcher;
  followSymlinks?: boolean;
}

export interface SearchAllOptions extends SearchOptions {
  /** Keep only the first match per relative path. Defaults to true. */
  dedupe?: boolean;
}

/**
 * A search path entry as accepted by the SearchPath constructor:
 * a `[scope, root]` tuple, a bare root (auto-named), or nothing.
 */
export type EntryInput =
  | readonly [scope: string, root: string | null | undefined]
  | string
  | null
  | undefined;
