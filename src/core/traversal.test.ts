import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { createTree, relativeAll } from "../test-utils";
import { GitignoreMatcher } from "./matchers";
import { traverse, walk } from "./traversal";

describe("traverse", () => {
  let root: string;

  const list = (options: Parameters<typeof traverse>[1] = {}) =>
    relativeAll(root, [...traverse(root, options)]);

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "searchscope-traverse-"));
    await createTree(root, {
      "a.py": "",
      "b.txt": "",
      "docs/readme.md": "",
      "src/main.py": "",
      "src/__pycache__/main.cpython.pyc": "",
      "src/sub/deep.py": "",
    });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("yields files in name order, each level's files before its subdirectories", () => {
    expect(list()).toEqual([
      "a.py",
      "b.txt",
      "docs/readme.md",
      "src/main.py",
      "src/__pycache__/main.cpython.pyc",
      "src/sub/deep.py",
    ]);
  });

  it("yields directories with kind dirs", () => {
    expect(list({ kind: "dirs" })).toEqual(["docs", "src", "src/__pycache__", "src/sub"]);
  });

  it("yields directories before files with kind both", () => {
    expect(list({ kind: "both", pattern: "src/**" })).toEqual([
      "src/__pycache__",
      "src/sub",
      "src/main.py",
      "src/__pycache__/main.cpython.pyc",
      "src/sub/deep.py",
    ]);
  });

  it("prunes excluded directories", () => {
    expect(list({ pattern: "**/*.py", exclude: ["**/__pycache__"] })).toEqual([
      "a.py",
      "src/main.py",
      "src/sub/deep.py",
    ]);
    expect(list({ exclude: ["src"] })).toEqual(["a.py", "b.txt", "docs/readme.md"]);
  });

  it("ORs the pattern with include", () => {
    expect(list({ pattern: "*.txt", include: ["**/*.md"] })).toEqual(["b.txt", "docs/readme.md"]);
  });

  it("adds no constraint for the default pattern", () => {
    expect(list({ include: ["**/*.md"] })).toEqual(["docs/readme.md"]);
  });

  it("uses the given matcher", () => {
    expect(list({ matcher: new GitignoreMatcher(), include: ["*.py"], exclude: ["sub/"] })).toEqual([
      "a.py",
      "src/main.py",
    ]);
  });

  it.skipIf(process.getuid?.() === 0)("skips an unreadable directory and keeps its siblings", async () => {
    const locked = path.join(root, "docs");
    await fs.chmod(locked, 0o000);
    try {
      expect(list({ pattern: "**/*.*" })).toEqual([
        "a.py",
        "b.txt",
        "src/main.py",
        "src/__pycache__/main.cpython.pyc",
        "src/sub/deep.py",
      ]);
    } finally {
      await fs.chmod(locked, 0o755);
    }
  });

  it("yields nothing for a missing root or a file root", () => {
    expect([...traverse(path.join(root, "missing"))]).toEqual([]);
    expect([...traverse(path.join(root, "a.py"))]).toEqual([]);
  });

  it("returns absolute paths under the root", () => {
    const [first] = traverse(root);
    expect(first).toBe(path.join(root, "a.py"));
  });

  it("reports directories from walk", () => {
    const entries = [...walk(root, { kind: "both", pattern: "docs/**" })];
    expect(entries).toEqual([
      { path: path.join(root, "docs", "readme.md"), relative: "docs/readme.md", isDir: false },
    ]);
    expect([...walk(root, { kind: "dirs", pattern: "docs" })][0]?.isDir).toBe(true);
  });
});

describe("traverse with symlinks", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "searchscope-links-"));
    await createTree(root, { "real/file.py": "", "a/file.py": "" });
    await fs.symlink(path.join(root, "real"), path.join(root, "link"), "dir");
    await fs.symlink(path.join(root, "a"), path.join(root, "a", "loop"), "dir");
    await fs.symlink(path.join(root, "missing"), path.join(root, "broken"));
    await fs.symlink(path.join(root, "real", "file.py"), path.join(root, "alias.py"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("follows directory links once and skips cycles and broken links", () => {
    expect(relativeAll(root, [...traverse(root)])).toEqual([
      "alias.py",
      "a/file.py",
      "link/file.py",
      "real/file.py",
    ]);
  });

  it("does not descend into linked directories when not following", () => {
    expect(relativeAll(root, [...traverse(root, { followSymlinks: false })])).toEqual([
      "alias.py",
      "a/file.py",
      "real/file.py",
    ]);
  });
});
