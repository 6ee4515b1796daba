import type { Match } from "./core/match";
import { SearchPath } from "./core/search-path";
import type { EntryInput, SearchAllOptions, SearchOptions } from "./core/types";

/**
 * One-shot search without keeping a SearchPath around.
 *
 * @example
 * ```typescript
 * const config = first("config.toml", [
 *   ["project", ".app"],
 *   ["user", path.join(os.homedir(), ".config", "app")],
 * ]);
 * ```
 */
export function first(
  pattern: string,
  entries: readonly EntryInput[],
  options: SearchOptions = {},
): string | null {
  return new SearchPath(...entries).first(pattern, options);
}

export function match(
  pattern: string,
  entries: readonly EntryInput[],
  options: SearchOptions = {},
): Match | null {
  return new SearchPath(...entries).match(pattern, options);
}

export function all(
  pattern: string,
  entries: readonly EntryInput[],
  options: SearchAllOptions = {},
): string[] {
  return new SearchPath(...entries).all(pattern, options);
}

export function matches(
  pattern: string,
  entries: readonly EntryInput[],
  options: SearchAllOptions = {},
): Match[] {
  return new SearchPath(...entries).matches(pattern, options);
}
