import ignore, { type Ignore } from "ignore";
import { PatternSyntaxError } from "../errors";
import { compileGlob } from "./glob";
import type { MatchOptions, PathMatcher } from "./types";

/**
 * Shared include/exclude evaluation for matchers that test one pattern at a
 * time. Compiled patterns are cached per instance, keyed by source string.
 */
abstract class CompilingMatcher implements PathMatcher {
  readonly supportsNegation: boolean = false;
  readonly supportsDirOnly: boolean = false;

  private readonly cache = new Map<string, RegExp>();

  protected abstract compile(pattern: string): RegExp;

  matches(path: string, options: MatchOptions = {}): boolean {
    const { include = [], exclude = [] } = options;

    if (include.length > 0 && !include.some((p) => this.test(path, p))) {
      return false;
    }
    return !exclude.some((p) => this.test(path, p));
  }

  private test(path: string, pattern: string): boolean {
    let regex = this.cache.get(pattern);
    if (!regex) {
      regex = this.compile(pattern);
      this.cache.set(pattern, regex);
    }
    return regex.test(path);
  }
}

/**
 * Glob patterns: `*`, `?`, `[...]`, and `**` as a whole path component.
 * Patterns are matched against the full relative path.
 *
 * @example
 * ```typescript
 * const matcher = new GlobMatcher();
 * matcher.matches("src/main.py", { include: ["**\/*.py"] }); // true
 * matcher.matches("test_main.py", { exclude: ["test_*"] }); // false
 * ```
 */
export class GlobMatcher extends CompilingMatcher {
  protected compile(pattern: string): RegExp {
    return compileGlob(pattern);
  }
}

/** JavaScript regular expressions, matched against the full relative path. */
export class RegexMatcher extends CompilingMatcher {
  protected compile(pattern: string): RegExp {
    if (!pattern) {
      throw new PatternSyntaxError(pattern, "empty pattern");
    }
    try {
      // Validate on its own first so a stray ")" can't escape the anchoring group
      new RegExp(pattern);
      return new RegExp(`^(?:${pattern})$`);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new PatternSyntaxError(pattern, reason);
    }
  }
}

/**
 * Gitignore semantics via the `ignore` package: negation (`!pattern`),
 * directory-only (`pattern/`) and anchored (`/pattern`) patterns.
 * Patterns are evaluated in order, so later patterns override earlier ones.
 */
export class GitignoreMatcher implements PathMatcher {
  readonly supportsNegation = true;
  readonly supportsDirOnly = true;

  /** Keyed by the ordered pattern list; order matters for negation */
  private readonly specCache = new Map<string, Ignore>();

  matches(path: string, options: MatchOptions = {}): boolean {
    const { isDir = false, include = [], exclude = [] } = options;
    const candidate = isDir && !path.endsWith("/") ? `${path}/` : path;

    if (include.length > 0 && !this.hits(include, candidate)) {
      return false;
    }
    return !(exclude.length > 0 && this.hits(exclude, candidate));
  }

  /** Names the engine rejects (such as "..." or ".../x") match no pattern */
  private hits(patterns: readonly string[], candidate: string): boolean {
    const spec = this.spec(patterns);
    return ignore.isPathValid(candidate) && spec.ignores(candidate);
  }

  private spec(patterns: readonly string[]): Ignore {
    for (const pattern of patterns) {
      if (!pattern) {
        throw new PatternSyntaxError(pattern, "empty pattern");
      }
    }

    const key = JSON.stringify(patterns);
    let spec = this.specCache.get(key);
    if (!spec) {
      try {
        spec = ignore({ ignorecase: false }).add([...patterns]);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new PatternSyntaxError(patterns.join(", "), reason);
      }
      this.specCache.set(key, spec);
    }
    return spec;
  }
}
