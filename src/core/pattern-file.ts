import { readFileSync } from "node:fs";
import { PatternFileError } from "../errors";
import type { PatternFileInput, PatternInput } from "./types";

/**
 * Parses pattern file content: one pattern per line, surrounding whitespace
 * trimmed, blank lines and `#` comments dropped.
 */
export function parsePatternLines(content: string): string[] {
  return content
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
}

/** Decodes UTF-8, reporting the first line that is not valid UTF-8. */
function decodeUtf8(filePath: string, buffer: Buffer): string {
  const decoder = new TextDecoder("utf-8", { fatal: true });
  try {
    return decoder.decode(buffer);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    let start = 0;
    let lineNumber = 1;
    while (start <= buffer.length) {
      const newline = buffer.indexOf(0x0a, start);
      const end = newline === -1 ? buffer.length : newline;
      try {
        decoder.decode(buffer.subarray(start, end));
      } catch {
        throw new PatternFileError(filePath, `invalid encoding: ${reason}`, lineNumber);
      }
      if (newline === -1) break;
      start = newline + 1;
      lineNumber++;
    }
    throw new PatternFileError(filePath, `invalid encoding: ${reason}`);
  }
}

/**
 * Loads patterns from a file, strictly: any failure to read or decode the
 * file raises a {@link PatternFileError}.
 */
export function loadPatterns(filePath: string): string[] {
  let buffer: Buffer;
  try {
    buffer = readFileSync(filePath);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException)?.code;
    switch (code) {
      case "ENOENT":
      case "ENOTDIR":
        throw new PatternFileError(filePath, "file not found");
      case "EACCES":
      case "EPERM":
        throw new PatternFileError(filePath, "permission denied");
      case "EISDIR":
        throw new PatternFileError(filePath, "is a directory");
      default:
        throw new PatternFileError(
          filePath,
          error instanceof Error ? error.message : String(error),
        );
    }
  }
  return parsePatternLines(decodeUtf8(filePath, buffer));
}

/** Loads and concatenates patterns from every file, in order. */
export function loadPatternFiles(files: PatternFileInput | undefined): string[] {
  return toList(files).flatMap((file) => loadPatterns(file));
}

/** Normalizes a single value or list into a fresh array. */
export function toList(value: PatternInput | undefined): string[] {
  if (value === undefined) return [];
  return typeof value === "string" ? [value] : [...value];
}
