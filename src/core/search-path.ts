import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { AUTO_SCOPE_PREFIX, DEFAULT_PATTERN } from "../constants";
import { ConfigurationError } from "../errors";
import {
  collectAncestorPatterns,
  mergePatterns,
  type AncestorPatternCache,
} from "./ancestors";
import { Match } from "./match";
import { GlobMatcher } from "./matchers";
import { loadPatternFiles, toList } from "./pattern-file";
import { walk } from "./traversal";
import type {
  EntryInput,
  PathMatcher,
  SearchAllOptions,
  SearchOptions,
  TraversalKind,
} from "./types";

type ScopedRoot = readonly [scope: string, root: string];

/** Everything a search needs once pattern files have been read */
interface SearchPlan {
  pattern: string;
  kind: TraversalKind;
  include: string[];
  exclude: string[];
  includeFromAncestors?: string;
  excludeFromAncestors?: string;
  matcher: PathMatcher;
  followSymlinks: boolean;
}

/**
 * Drops empty entries and names bare roots "dir0", "dir1", ... by their
 * position among bare roots only.
 */
function parseEntries(entries: readonly EntryInput[]): ScopedRoot[] {
  const parsed: ScopedRoot[] = [];
  let autoIndex = 0;

  for (const entry of entries) {
    if (entry === null || entry === undefined || entry === "") continue;

    if (typeof entry === "string") {
      parsed.push([`${AUTO_SCOPE_PREFIX}${autoIndex}`, entry]);
      autoIndex++;
      continue;
    }

    if (entry.length !== 2) {
      throw new ConfigurationError(
        `Invalid search path entry ${JSON.stringify(entry)}: expected a path or a [scope, path] pair`,
      );
    }

    const [scope, root] = entry;
    if (typeof scope !== "string" || scope.length === 0) {
      throw new ConfigurationError(
        `Invalid scope name ${JSON.stringify(scope)} for ${String(root)}: expected a non-empty string`,
      );
    }
    if (root === null || root === undefined || root === "") continue;
    if (typeof root !== "string") {
      throw new ConfigurationError(
        `Invalid path for scope "${scope}": expected a string`,
      );
    }
    parsed.push([scope, root]);
  }

  return parsed;
}

function splitArgs<T extends SearchOptions>(
  patternOrOptions: string | T | undefined,
  options: T | undefined,
): [string, T | Partial<T>] {
  if (typeof patternOrOptions === "string") {
    return [patternOrOptions, options ?? {}];
  }
  return [DEFAULT_PATTERN, patternOrOptions ?? options ?? {}];
}

/**
 * An ordered list of directories to search, each labelled with a scope.
 *
 * Order is priority: `first` returns the hit from the earliest entry that has
 * one, and deduplicated `all` keeps the earliest entry's copy of each
 * relative path. Instances are immutable; helpers return new search paths.
 *
 * @example
 * ```typescript
 * const sp = new SearchPath(
 *   ["project", "/work/app/.config"],
 *   ["user", "/home/me/.config/app"],
 * );
 * const config = sp.first("config.toml");
 * const plugins = sp.matches("plugins/*.js", { exclude: "*.test.js" });
 * ```
 */
export class SearchPath implements Iterable<string> {
  private readonly entries: readonly ScopedRoot[];

  constructor(...entries: EntryInput[]) {
    this.entries = Object.freeze(parseEntries(entries));
  }

  /** Directories in priority order */
  get dirs(): string[] {
    return this.entries.map(([, root]) => root);
  }

  /** Scope names in priority order */
  get scopes(): string[] {
    return this.entries.map(([scope]) => scope);
  }

  get length(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  *[Symbol.iterator](): Iterator<string> {
    for (const [, root] of this.entries) {
      yield root;
    }
  }

  /** `[scope, directory]` pairs in priority order */
  *items(): Generator<[string, string], void, undefined> {
    for (const [scope, root] of this.entries) {
      yield [scope, root];
    }
  }

  /** A new search path with `other`'s entries after this one's */
  concat(other: SearchPath): SearchPath {
    return new SearchPath(...this.entries, ...other.entries);
  }

  /**
   * A new search path with `parts` joined onto every directory.
   *
   * @example
   * ```typescript
   * new SearchPath(["user", "/home/me"]).withSuffix(".config", "app").dirs;
   * // ["/home/me/.config/app"]
   * ```
   */
  withSuffix(...parts: string[]): SearchPath {
    return new SearchPath(
      ...this.entries.map(([scope, root]) => [scope, join(root, ...parts)] as const),
    );
  }

  /** A new search path keeping only entries the predicate accepts */
  filter(predicate: (dir: string, scope: string) => boolean): SearchPath {
    return new SearchPath(
      ...this.entries.filter(([scope, root]) => predicate(root, scope)),
    );
  }

  /** A new search path without entries whose directory does not exist */
  existing(): SearchPath {
    return this.filter((dir) => existsSync(dir));
  }

  /** Human-readable form for messages, e.g. "project: ./.config, user: ~/.config" */
  toString(): string {
    if (this.entries.length === 0) return "(empty)";
    return this.entries.map(([scope, root]) => `${scope}: ${root}`).join(", ");
  }

  /** Path of the first match across entries, or null. */
  first(options?: SearchOptions): string | null;
  first(pattern: string, options?: SearchOptions): string | null;
  first(
    patternOrOptions?: string | SearchOptions,
    options?: SearchOptions,
  ): string | null {
    const [pattern, opts] = splitArgs(patternOrOptions, options);
    return this.match(pattern, opts)?.path ?? null;
  }

  /** First match across entries with its provenance, or null. */
  match(options?: SearchOptions): Match | null;
  match(pattern: string, options?: SearchOptions): Match | null;
  match(
    patternOrOptions?: string | SearchOptions,
    options?: SearchOptions,
  ): Match | null {
    const [pattern, opts] = splitArgs(patternOrOptions, options);
    for (const match of this.search(pattern, opts)) {
      return match;
    }
    return null;
  }

  /** Paths of every match, in entry order. */
  all(options?: SearchAllOptions): string[];
  all(pattern: string, options?: SearchAllOptions): string[];
  all(
    patternOrOptions?: string | SearchAllOptions,
    options?: SearchAllOptions,
  ): string[] {
    const [pattern, opts] = splitArgs(patternOrOptions, options);
    return this.matches(pattern, opts).map((match) => match.path);
  }

  /**
   * Every match with provenance, in entry order. With `dedupe` (the default)
   * only the first match per relative path is kept.
   */
  matches(options?: SearchAllOptions): Match[];
  matches(pattern: string, options?: SearchAllOptions): Match[];
  matches(
    patternOrOptions?: string | SearchAllOptions,
    options?: SearchAllOptions,
  ): Match[] {
    const [pattern, opts] = splitArgs(patternOrOptions, options);
    const { dedupe = true } = opts;

    const results: Match[] = [];
    const seen = new Set<string>();
    for (const match of this.search(pattern, opts)) {
      if (dedupe) {
        const key = match.relative;
        if (seen.has(key)) continue;
        seen.add(key);
      }
      results.push(match);
    }
    return results;
  }

  /**
   * Reads pattern files up front, so a bad file fails the call before any
   * directory is walked, then returns the lazy match sequence.
   */
  private search(pattern: string, options: SearchOptions): Generator<Match, void, undefined> {
    const plan: SearchPlan = {
      pattern,
      kind: options.kind ?? "files",
      include: [...toList(options.include), ...loadPatternFiles(options.includeFrom)],
      exclude: [...toList(options.exclude), ...loadPatternFiles(options.excludeFrom)],
      includeFromAncestors: options.includeFromAncestors,
      excludeFromAncestors: options.excludeFromAncestors,
      matcher: options.matcher ?? new GlobMatcher(),
      followSymlinks: options.followSymlinks ?? true,
    };
    return this.iterate(plan);
  }

  private *iterate(plan: SearchPlan): Generator<Match, void, undefined> {
    const useAncestors =
      plan.includeFromAncestors !== undefined ||
      plan.excludeFromAncestors !== undefined;
    const cache: AncestorPatternCache = new Map();

    for (const [scope, root] of this.entries) {
      const source = resolve(root);
      const candidates = walk(source, {
        pattern: plan.pattern,
        kind: plan.kind,
        // With ancestor files, include is applied per candidate below
        include: useAncestors ? [] : plan.include,
        exclude: plan.exclude,
        matcher: plan.matcher,
        followSymlinks: plan.followSymlinks,
      });

      for (const candidate of candidates) {
        if (useAncestors) {
          const ancestors = collectAncestorPatterns(
            candidate.path,
            source,
            plan.includeFromAncestors,
            plan.excludeFromAncestors,
            cache,
          );
          const accepted = plan.matcher.matches(candidate.relative, {
            isDir: candidate.isDir,
            include: mergePatterns(ancestors.include, plan.include),
            exclude: mergePatterns(ancestors.exclude, plan.exclude),
          });
          if (!accepted) continue;
        }
        yield new Match(candidate.path, scope, source);
      }
    }
  }
}
