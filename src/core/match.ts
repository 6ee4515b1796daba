import { relative, sep } from "node:path";

/**
 * A file or directory found by a search, with provenance: the scope of the
 * entry it came from and that entry's root directory.
 */
export class Match {
  /** Absolute path to the matched file or directory */
  readonly path: string;
  /** Scope name of the search path entry (e.g. "user", "project") */
  readonly scope: string;
  /** Root directory of the entry this match came from */
  readonly source: string;

  constructor(path: string, scope: string, source: string) {
    this.path = path;
    this.scope = scope;
    this.source = source;
    Object.freeze(this);
  }

  /** Path relative to `source`, always with forward slashes */
  get relative(): string {
    const rel = relative(this.source, this.path);
    return sep === "/" ? rel : rel.split(sep).join("/");
  }

  toString(): string {
    return `${this.scope}: ${this.path}`;
  }
}
