/** Pattern that matches every path; adds no include constraint during traversal */
export const DEFAULT_PATTERN = "**";

/** Project-level configuration filename */
export const CONFIG_FILENAME = ".searchscope.toml";

/** Directory name used for config lookups under XDG directories */
export const APP_NAME = "searchscope";

/** Fallback for $XDG_CONFIG_DIRS */
export const DEFAULT_XDG_CONFIG_DIRS = "/etc/xdg";

/** Prefix for auto-named scopes of bare entries ("dir0", "dir1", ...) */
export const AUTO_SCOPE_PREFIX = "dir";

/** Marker files that identify a project root when walking upward */
export const PROJECT_MARKERS = [".git", CONFIG_FILENAME] as const;
