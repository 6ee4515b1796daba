import { readFileSync } from "node:fs";
import { dirname, join, relative, sep, isAbsolute } from "node:path";
import { debug } from "../logging";
import { parsePatternLines } from "./pattern-file";
import type { AncestorPatterns } from "./types";

const EMPTY: AncestorPatterns = Object.freeze({
  include: Object.freeze([]),
  exclude: Object.freeze([]),
});

/** Pattern lists by absolute pattern-file path */
export type AncestorPatternCache = Map<string, string[]>;

/**
 * Reads a pattern file leniently. A missing, unreadable or undecodable file
 * contributes no patterns.
 */
function loadPatternsLenient(
  filePath: string,
  cache: AncestorPatternCache | undefined,
): string[] {
  const cached = cache?.get(filePath);
  if (cached) return cached;

  let patterns: string[] = [];
  try {
    const buffer = readFileSync(filePath);
    const content = new TextDecoder("utf-8", { fatal: true }).decode(buffer);
    patterns = parsePatternLines(content);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException)?.code;
    if (code !== "ENOENT") {
      debug(`Skipping unreadable pattern file ${filePath}:`, error);
    }
  }

  cache?.set(filePath, patterns);
  return patterns;
}

/**
 * Lists directories from `entryRoot` down to the parent of `filePath`,
 * root first. Empty when the file is not under `entryRoot`.
 */
function ancestorDirs(filePath: string, entryRoot: string): string[] {
  const rel = relative(entryRoot, dirname(filePath));
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return [];
  }

  const dirs = [entryRoot];
  let current = entryRoot;
  for (const part of rel.split(sep).filter(Boolean)) {
    current = join(current, part);
    dirs.push(current);
  }
  return dirs;
}

/**
 * Collects include/exclude patterns from pattern files in every directory
 * between `entryRoot` and the candidate's parent (both inclusive).
 *
 * Patterns come back root-to-leaf, so a child directory's patterns follow
 * its ancestors' and win for matchers that support negation. Nothing above
 * `entryRoot` is ever read.
 *
 * @param cache - reused across candidates of one search so each pattern file
 *   is read once
 */
export function collectAncestorPatterns(
  filePath: string,
  entryRoot: string,
  includeFilename?: string,
  excludeFilename?: string,
  cache?: AncestorPatternCache,
): AncestorPatterns {
  if (includeFilename === undefined && excludeFilename === undefined) {
    return EMPTY;
  }

  const include: string[] = [];
  const exclude: string[] = [];

  for (const dir of ancestorDirs(filePath, entryRoot)) {
    if (includeFilename !== undefined) {
      include.push(...loadPatternsLenient(join(dir, includeFilename), cache));
    }
    if (excludeFilename !== undefined) {
      exclude.push(...loadPatternsLenient(join(dir, excludeFilename), cache));
    }
  }

  return Object.freeze({
    include: Object.freeze(include),
    exclude: Object.freeze(exclude),
  });
}

/** Ancestor patterns first (general), inline patterns last (specific). */
export function mergePatterns(
  ancestorPatterns: readonly string[],
  inlinePatterns: readonly string[],
): string[] {
  return [...ancestorPatterns, ...inlinePatterns];
}
