import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

/**
 * Creates a file (and its parent directories) under `root`.
 * Returns the absolute path.
 */
export async function touch(
  root: string,
  relativePath: string,
  content = "",
): Promise<string> {
  const filePath = path.join(root, relativePath);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content);
  return filePath;
}

/**
 * Creates a tree of files under `root`. Keys are relative paths; a value of
 * `null` creates an empty directory instead of a file.
 */
export async function createTree(
  root: string,
  tree: Record<string, string | null>,
): Promise<void> {
  for (const [relativePath, content] of Object.entries(tree)) {
    if (content === null) {
      await mkdir(path.join(root, relativePath), { recursive: true });
    } else {
      await touch(root, relativePath, content);
    }
  }
}

/** Relative paths with forward slashes, for comparing search results. */
export function relativeAll(root: string, paths: readonly string[]): string[] {
  return paths.map((p) => path.relative(root, p).split(path.sep).join("/"));
}
