import { describe, it, expect } from "vitest";

import { createExcludeMatcher } from "./exclude-patterns";

describe("createExcludeMatcher", () => {
  const isExcluded = createExcludeMatcher([
    "*.log",
    "cache/",
    ".git/",
    "*_backup.sql",
    "/build",
    "docs/*.tmp",
    "assets/**/*.map",
    "file?.txt",
  ]);

  it("matches slash-free patterns against the entry name at any depth", () => {
    expect(isExcluded("error.log", false)).toBe(true);
    expect(isExcluded("wp-content/logs/debug.log", false)).toBe(true);
    expect(isExcluded("app.log.bak", false)).toBe(false);
    expect(isExcluded("shop_backup.sql", false)).toBe(true);
  });

  it("limits trailing-slash patterns to directories", () => {
    expect(isExcluded("cache", true)).toBe(true);
    expect(isExcluded("wp-content/cache", true)).toBe(true);
    expect(isExcluded("cache", false)).toBe(false);
    expect(isExcluded(".git", true)).toBe(true);
  });

  it("anchors leading-slash patterns to the root", () => {
    expect(isExcluded("build", true)).toBe(true);
    expect(isExcluded("src/build", true)).toBe(false);
  });

  it("matches patterns with a slash against trailing path segments", () => {
    expect(isExcluded("docs/a.tmp", false)).toBe(true);
    expect(isExcluded("site/docs/a.tmp", false)).toBe(true);
    expect(isExcluded("docs/sub/a.tmp", false)).toBe(false);
  });

  it("lets ** cross directories and ? match one character", () => {
    expect(isExcluded("assets/js/vendor/app.map", false)).toBe(true);
    expect(isExcluded("file1.txt", false)).toBe(true);
    expect(isExcluded("file10.txt", false)).toBe(false);
  });

  it("normalizes separators and never excludes the root itself", () => {
    expect(isExcluded("logs\\today.log", false)).toBe(true);
    expect(isExcluded("", true)).toBe(false);
  });

  it("ignores blank patterns", () => {
    const none = createExcludeMatcher(["", "  ", "/"]);
    expect(none("anything", false)).toBe(false);
  });
});
