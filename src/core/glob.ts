import { PatternSyntaxError } from "../errors";

function escapeRegex(input: string): string {
  return input.replace(/[|\\{}()[\]^$+?.*/]/g, "\\$&");
}

/** Characters that keep their backslash inside a character class */
const CLASS_SPECIALS = /[\\\]\[^-]/;

/**
 * Translates a glob pattern into RegExp source (without anchors).
 *
 * `**` is recursive only when it is a whole path component; anywhere else it
 * behaves like `*`. Negated classes never match `/`.
 */
export function globToRegexSource(pattern: string): string {
  let regex = "";
  let i = 0;

  while (i < pattern.length) {
    const char = pattern[i];

    if (char === "*") {
      if (pattern[i + 1] !== "*") {
        regex += "[^/]*";
        i++;
        continue;
      }

      const next = i + 2;
      const atStart = i === 0;
      const atEnd = next >= pattern.length;
      const afterSlash = i > 0 && pattern[i - 1] === "/";
      const beforeSlash = pattern[next] === "/";

      if (!((atStart || afterSlash) && (atEnd || beforeSlash))) {
        regex += "[^/]*";
        i = next;
      } else if (beforeSlash) {
        // "**/" also matches zero segments, so "a/**/b" matches "a/b"
        regex += "(?:.*/)?";
        i = next + 1;
      } else {
        regex += ".*";
        i = next;
      }
      continue;
    }

    if (char === "?") {
      regex += "[^/]";
      i++;
      continue;
    }

    if (char === "[") {
      const [classSource, end] = translateBracket(pattern, i);
      regex += classSource;
      i = end;
      continue;
    }

    regex += escapeRegex(char);
    i++;
  }

  return regex;
}

/**
 * Translates the class starting at `start` (pointing at `[`).
 * Returns the class source and the index just past the closing `]`.
 */
function translateBracket(pattern: string, start: number): [string, number] {
  const unclosed = () =>
    new PatternSyntaxError(pattern, "unclosed bracket", start);

  let i = start + 1;
  if (i >= pattern.length) throw unclosed();

  let source: string;
  if (pattern[i] === "!" || pattern[i] === "^") {
    source = "[^/";
    i++;
  } else {
    source = "[";
  }
  if (i >= pattern.length) throw unclosed();

  // A leading "]" is a member of the class, not its end
  if (pattern[i] === "]") {
    source += "\\]";
    i++;
  }

  while (i < pattern.length && pattern[i] !== "]") {
    const char = pattern[i];
    if (char === "\\") {
      i++;
      if (i < pattern.length) {
        // Escapes go to the regex engine as written: [a\nb] holds a newline
        source += `\\${pattern[i]}`;
        i++;
      }
    } else if (char === "-") {
      source += "-";
      i++;
    } else {
      source += CLASS_SPECIALS.test(char) ? `\\${char}` : char;
      i++;
    }
  }

  if (i >= pattern.length) throw unclosed();
  source += "]";

  try {
    new RegExp(source, "u");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PatternSyntaxError(
      pattern,
      `invalid character class: ${reason}`,
      start,
    );
  }

  return [source, i + 1];
}

/**
 * Compiles a glob pattern into an anchored, full-string RegExp. Dot-all, so
 * `**` also crosses line terminators in names.
 */
export function compileGlob(pattern: string): RegExp {
  if (!pattern) {
    throw new PatternSyntaxError(pattern, "empty pattern");
  }
  return new RegExp(`^(?:${globToRegexSource(pattern)})$`, "su");
}
