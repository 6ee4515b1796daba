/** Base class for every error raised by searchscope. */
export class SearchPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SearchPathError";
  }
}

/** Base class for pattern text and pattern file failures. */
export class PatternError extends SearchPathError {
  constructor(message: string) {
    super(message);
    this.name = "PatternError";
  }
}

/**
 * Thrown when a pattern cannot be compiled: an empty pattern, an unclosed
 * bracket, or a regular expression the engine rejects.
 */
export class PatternSyntaxError extends PatternError {
  /** The pattern that failed to compile */
  readonly pattern: string;
  /** Description of the problem, without the pattern or position */
  readonly detail: string;
  /** Character offset where the problem starts, when known */
  readonly position?: number;

  constructor(pattern: string, detail: string, position?: number) {
    super(
      position !== undefined
        ? `Invalid pattern ${JSON.stringify(pattern)} at position ${position}: ${detail}`
        : `Invalid pattern ${JSON.stringify(pattern)}: ${detail}`,
    );
    this.name = "PatternSyntaxError";
    this.pattern = pattern;
    this.detail = detail;
    this.position = position;
  }
}

/** Thrown by the strict pattern file loader (`includeFrom` / `excludeFrom`). */
export class PatternFileError extends PatternError {
  /** Path of the pattern file */
  readonly path: string;
  readonly detail: string;
  /** 1-based line number, when the failure is tied to a line */
  readonly lineNumber?: number;

  constructor(path: string, detail: string, lineNumber?: number) {
    super(
      lineNumber !== undefined
        ? `Error in pattern file ${path}:${lineNumber}: ${detail}`
        : `Error in pattern file ${path}: ${detail}`,
    );
    this.name = "PatternFileError";
    this.path = path;
    this.detail = detail;
    this.lineNumber = lineNumber;
  }
}

/** Thrown for an invalid search path or search configuration. */
export class ConfigurationError extends SearchPathError {
  /** File the configuration was read from, if any */
  readonly source?: string;

  constructor(message: string, source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = "ConfigurationError";
    this.source = source;
  }
}
