import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  createMatcher,
  findConfigFile,
  findProjectRoot,
  getDefaultScopes,
  loadSearchConfig,
  toSearchOptions,
  toSearchPath,
} from "./config";
import { GitignoreMatcher, GlobMatcher, RegexMatcher } from "./core/matchers";
import { ConfigurationError } from "./errors";
import { touch } from "./test-utils";

const FULL_CONFIG = `matcher = "gitignore"
kind = "both"
include = "*.py"
exclude = ["build", "dist"]
include-from = "patterns/include.txt"
exclude-from-ancestors = ".searchignore"
follow-symlinks = false
dedupe = false

[[scopes]]
name = "project"
path = "conf"

[[scopes]]
name = "system"
path = "/etc/app"
`;

describe("loadSearchConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "searchscope-config-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("loads a config and resolves paths against its directory", async () => {
    const file = await touch(tempDir, ".searchscope.toml", FULL_CONFIG);
    const config = loadSearchConfig(file);

    expect(config).toEqual({
      source: file,
      scopes: [
        { name: "project", path: path.join(tempDir, "conf") },
        { name: "system", path: "/etc/app" },
      ],
      include: ["*.py"],
      exclude: ["build", "dist"],
      includeFrom: [path.join(tempDir, "patterns", "include.txt")],
      excludeFrom: [],
      includeFromAncestors: undefined,
      excludeFromAncestors: ".searchignore",
      matcher: "gitignore",
      kind: "both",
      followSymlinks: false,
      dedupe: false,
    });
  });

  it("defaults to the glob matcher and no scopes", async () => {
    const file = await touch(tempDir, "empty.toml", "");
    const config = loadSearchConfig(file);

    expect(config.matcher).toBe("glob");
    expect(config.scopes).toEqual([]);
    expect(toSearchPath(config).isEmpty).toBe(true);
  });

  it("converts to a search path and options", async () => {
    const file = await touch(tempDir, "search.toml", FULL_CONFIG);
    const config = loadSearchConfig(file);

    const sp = toSearchPath(config);
    expect(sp.scopes).toEqual(["project", "system"]);
    expect(sp.dirs).toEqual([path.join(tempDir, "conf"), "/etc/app"]);

    const options = toSearchOptions(config);
    expect(options.matcher).toBeInstanceOf(GitignoreMatcher);
    expect(options.kind).toBe("both");
    expect(options.exclude).toEqual(["build", "dist"]);
    expect(options.followSymlinks).toBe(false);
    expect(options.dedupe).toBe(false);
  });

  it("lists schema problems by key", async () => {
    const file = await touch(
      tempDir,
      "bad.toml",
      'matcher = "fuzzy"\ncolour = "red"\n\n[[scopes]]\nname = "x"\n',
    );

    let error: unknown;
    try {
      loadSearchConfig(file);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigurationError);
    const message = error instanceof Error ? error.message : "";
    expect(message.startsWith(`${file}: invalid configuration\n`)).toBe(true);
    expect(message).toContain("  scopes.0.path: Required");
    expect(message).toContain("  matcher: Invalid enum value.");
    expect(message).toContain("  (root): Unrecognized key(s) in object: 'colour'");
  });

  it("rejects malformed TOML", async () => {
    const file = await touch(tempDir, "broken.toml", "matcher = \n");
    expect(() => loadSearchConfig(file)).toThrow(/: invalid TOML: /);
  });

  it("reports a missing file", () => {
    const file = path.join(tempDir, "nope.toml");
    expect(() => loadSearchConfig(file)).toThrow(`${file}: cannot read configuration: file not found`);
  });
});

describe("createMatcher", () => {
  it("creates a fresh matcher per name", () => {
    expect(createMatcher("glob")).toBeInstanceOf(GlobMatcher);
    expect(createMatcher("regex")).toBeInstanceOf(RegexMatcher);
    expect(createMatcher("gitignore")).toBeInstanceOf(GitignoreMatcher);
    expect(createMatcher("glob")).not.toBe(createMatcher("glob"));
  });
});

describe("getDefaultScopes", () => {
  it("orders project, user and system locations", () => {
    const sp = getDefaultScopes("app", "/work/proj", {
      XDG_CONFIG_HOME: "/xdg/home",
      XDG_CONFIG_DIRS: ":/xdg/sys:/other",
    });

    expect(sp.scopes).toEqual(["project", "user", "system"]);
    expect(sp.dirs).toEqual(["/work/proj/.app", "/xdg/home/app", "/xdg/sys/app"]);
  });

  it("falls back to the home directory and /etc/xdg", () => {
    const sp = getDefaultScopes("app", undefined, {});

    expect(sp.scopes).toEqual(["user", "system"]);
    expect(sp.dirs).toEqual([path.join(os.homedir(), ".config", "app"), "/etc/xdg/app"]);
  });
});

describe("findProjectRoot", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "searchscope-root-"));
    await fs.mkdir(path.join(tempDir, ".git"));
    await fs.mkdir(path.join(tempDir, "a", "b"), { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("finds the nearest directory with a marker", async () => {
    expect(findProjectRoot(path.join(tempDir, "a", "b"))).toBe(tempDir);

    await touch(tempDir, "a/.searchscope.toml", "");
    expect(findProjectRoot(path.join(tempDir, "a", "b"))).toBe(path.join(tempDir, "a"));
  });

  it("finds the project config file", async () => {
    expect(findConfigFile(path.join(tempDir, "a", "b"))).toBeNull();

    const file = await touch(tempDir, ".searchscope.toml", "");
    expect(findConfigFile(path.join(tempDir, "a"))).toBe(file);
  });
});
