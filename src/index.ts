export { SearchPath } from "./core/search-path";
export { Match } from "./core/match";
export { GitignoreMatcher, GlobMatcher, RegexMatcher } from "./core/matchers";
export { compileGlob } from "./core/glob";
export { traverse } from "./core/traversal";
export { collectAncestorPatterns, mergePatterns } from "./core/ancestors";
export { loadPatterns, parsePatternLines } from "./core/pattern-file";
export { all, first, match, matches } from "./functions";
export {
  createMatcher,
  findConfigFile,
  findProjectRoot,
  getDefaultScopes,
  loadSearchConfig,
  toSearchOptions,
  toSearchPath,
  type MatcherName,
  type ScopeConfig,
  type SearchConfig,
} from "./config";
export {
  ConfigurationError,
  PatternError,
  PatternFileError,
  PatternSyntaxError,
  SearchPathError,
} from "./errors";
export { CONFIG_FILENAME, DEFAULT_PATTERN } from "./constants";
export type {
  AncestorPatterns,
  EntryInput,
  MatchOptions,
  PathMatcher,
  PatternFileInput,
  PatternInput,
  SearchAllOptions,
  SearchOptions,
  TraversalKind,
  TraverseOptions,
} from "./core/types";
