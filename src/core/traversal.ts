import { readdirSync, realpathSync, statSync, type Dirent } from "node:fs";
import { join, resolve } from "node:path";
import { DEFAULT_PATTERN } from "../constants";
import { debug } from "../logging";
import { GlobMatcher } from "./matchers";
import type {
  PathMatcher,
  TraversalKind,
  TraverseOptions,
  WalkEntry,
} from "./types";

interface WalkContext {
  kind: TraversalKind;
  include: readonly string[];
  exclude: readonly string[];
  matcher: PathMatcher;
  followSymlinks: boolean;
}

interface ChildDir {
  name: string;
  symlink: boolean;
}

interface Listing {
  dirs: ChildDir[];
  files: string[];
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Safely stat a path, returning null if it doesn't exist or fails.
 */
function safeStat(path: string) {
  try {
    return statSync(path);
  } catch {
    return null;
  }
}

/**
 * Safely get realpath, returning original path on failure.
 */
function safeRealpath(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return path;
  }
}

/**
 * Lists a directory split into child directories and everything else, sorted
 * by name. Returns null when the directory can't be read.
 */
function readListing(dir: string): Listing | null {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    debug(`Skipping unreadable directory ${dir}:`, error);
    return null;
  }

  const dirs: ChildDir[] = [];
  const files: string[] = [];

  for (const entry of entries.sort((a, b) => byName(a.name, b.name))) {
    if (entry.isSymbolicLink()) {
      const stat = safeStat(join(dir, entry.name));
      if (!stat) continue; // Skip broken symlinks
      if (stat.isDirectory()) {
        dirs.push({ name: entry.name, symlink: true });
      } else {
        files.push(entry.name);
      }
    } else if (entry.isDirectory()) {
      dirs.push({ name: entry.name, symlink: false });
    } else {
      files.push(entry.name);
    }
  }

  return { dirs, files };
}

function* walkDirectory(
  ctx: WalkContext,
  dir: string,
  rel: string,
  chain: Set<string>,
): Generator<WalkEntry, void, undefined> {
  const listing = readListing(dir);
  if (!listing) return;

  const childRel = (name: string) => (rel ? `${rel}/${name}` : name);

  // Prune on exclude only, before anything below is visited
  const dirs =
    ctx.exclude.length > 0
      ? listing.dirs.filter((d) =>
          ctx.matcher.matches(childRel(d.name), {
            isDir: true,
            exclude: ctx.exclude,
          }),
        )
      : listing.dirs;

  if (ctx.kind !== "files") {
    for (const d of dirs) {
      const relative = childRel(d.name);
      if (
        ctx.matcher.matches(relative, {
          isDir: true,
          include: ctx.include,
          exclude: ctx.exclude,
        })
      ) {
        yield { path: join(dir, d.name), relative, isDir: true };
      }
    }
  }

  if (ctx.kind !== "dirs") {
    for (const name of listing.files) {
      const relative = childRel(name);
      if (
        ctx.matcher.matches(relative, {
          isDir: false,
          include: ctx.include,
          exclude: ctx.exclude,
        })
      ) {
        yield { path: join(dir, name), relative, isDir: false };
      }
    }
  }

  for (const d of dirs) {
    if (d.symlink && !ctx.followSymlinks) continue;

    const fullPath = join(dir, d.name);
    const realPath = ctx.followSymlinks ? safeRealpath(fullPath) : fullPath;
    if (chain.has(realPath)) {
      debug(`Not re-entering ${fullPath}: symlink cycle back to ${realPath}`);
      continue;
    }

    chain.add(realPath);
    yield* walkDirectory(ctx, fullPath, childRel(d.name), chain);
    chain.delete(realPath);
  }
}

/**
 * Walks `root` lazily, yielding every matching entry with its relative path.
 * A missing or non-directory root yields nothing.
 */
export function* walk(
  root: string,
  options: TraverseOptions = {},
): Generator<WalkEntry, void, undefined> {
  const rootPath = resolve(root);
  if (!safeStat(rootPath)?.isDirectory()) return;

  const {
    pattern = DEFAULT_PATTERN,
    kind = "files",
    include = [],
    exclude = [],
    matcher = new GlobMatcher(),
    followSymlinks = true,
  } = options;

  const ctx: WalkContext = {
    kind,
    // "**" adds nothing; any other pattern is ORed with the include list
    include: pattern === DEFAULT_PATTERN ? include : [pattern, ...include],
    exclude,
    matcher,
    followSymlinks,
  };

  const chain = new Set([followSymlinks ? safeRealpath(rootPath) : rootPath]);
  yield* walkDirectory(ctx, rootPath, "", chain);
}

/**
 * Traverses a directory tree yielding absolute paths that match the filters.
 *
 * Directories matching an exclude pattern are pruned before descent.
 * Unreadable directories and broken symlinks are skipped. Entries are visited
 * in name order, directories before files at each level.
 *
 * @example
 * ```typescript
 * for (const file of traverse("/project", { pattern: "**\/*.py", exclude: ["__pycache__"] })) {
 *   console.log(file);
 * }
 * ```
 */
export function* traverse(
  root: string,
  options: TraverseOptions = {},
): Generator<string, void, undefined> {
  for (const entry of walk(root, options)) {
    yield entry.path;
  }
}
