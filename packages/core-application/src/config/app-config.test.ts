import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import {
  DEFAULT_EXCLUDE_PATTERNS,
  findSite,
  loadAppConfig,
  parseAppConfig,
  siteRepositoryPath,
  siteSourcePath,
} from "./app-config";
import { parseSiteRegistry } from "./site-registry";
import { ConfigurationError } from "../application/errors";

const site = (outputLabel: string, sourcePath = outputLabel) => ({
  sourcePath,
  outputLabel,
  dbName: `${outputLabel}_db`,
  dbUser: "backup",
  dbPassword: "test-secret",
});

describe("parseSiteRegistry", () => {
  it("accepts well-formed records in order", () => {
    const sites = parseSiteRegistry([site("shop"), site("blog")]);
    expect(sites.map((s) => s.outputLabel)).toEqual(["shop", "blog"]);
  });

  it("rejects duplicate output labels", () => {
    let caught: unknown;
    try {
      parseSiteRegistry([site("shop"), site("blog"), site("shop", "other")]);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.issues).toEqual(['2.outputLabel: duplicate outputLabel "shop" (first used by entry 0)']);
  });

  it("rejects malformed entries eagerly", () => {
    expect(() => parseSiteRegistry([{ ...site("shop"), dbName: "" }])).toThrow(ConfigurationError);
    expect(() => parseSiteRegistry([{ ...site("shop"), outputLabel: "../escape" }])).toThrow(
      ConfigurationError
    );
    expect(() => parseSiteRegistry("not a list")).toThrow(ConfigurationError);
  });
});

describe("parseAppConfig", () => {
  it("applies defaults and resolves paths against the base directory", () => {
    const config = parseAppConfig({ sites: [site("shop", "public_html/shop")] }, { baseDir: "/srv/sv" });

    expect(config.backupRoot).toBe("/srv/sv/backups");
    expect(config.sitesRoot).toBe("/srv/sv");
    expect(config.runLogPath).toBe("/srv/sv/backup_log.md");
    expect(config.excludePatterns).toEqual([...DEFAULT_EXCLUDE_PATTERNS]);
    expect(config.mirror).toBe("rsync");
    expect(config.captureDeletions).toBe(false);

    const shop = findSite(config, "shop");
    expect(siteSourcePath(config, shop)).toBe("/srv/sv/public_html/shop");
    expect(siteRepositoryPath(config, shop)).toBe("/srv/sv/backups/shop");
  });

  it("lets SITES_ROOT override the sites root and keeps absolute source paths", () => {
    const config = parseAppConfig(
      { sitesRoot: "sites", sites: [site("shop"), site("blog", "/var/www/blog")] },
      { baseDir: "/srv/sv", env: { SITES_ROOT: "/home/web" } }
    );

    expect(siteSourcePath(config, findSite(config, "shop"))).toBe("/home/web/shop");
    expect(siteSourcePath(config, findSite(config, "blog"))).toBe("/var/www/blog");
  });

  it("returns a frozen value", () => {
    const config = parseAppConfig({ sites: [site("shop")] }, { baseDir: "/srv/sv" });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.sites)).toBe(true);
    expect(Object.isFrozen(config.sites[0])).toBe(true);
  });

  it("reports invalid fields with their path", () => {
    expect(() => parseAppConfig({ mirror: "ftp", sites: [] }, { baseDir: "/" })).toThrow(/mirror/);
  });
});

describe("findSite", () => {
  it("raises ConfigurationError for an unknown label", () => {
    const config = parseAppConfig({ sites: [site("shop")] }, { baseDir: "/srv/sv" });
    expect(() => findSite(config, "nope")).toThrow(
      "site 'nope' not found in configuration (available: shop)"
    );
  });
});

describe("loadAppConfig", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), "sitevault-config-"));
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  it("reads a JSON file relative to its own directory", async () => {
    const file = path.join(tmp, "sitevault.config.json");
    await fs.writeFile(file, JSON.stringify({ backupRoot: "snapshots", sites: [site("shop")] }), "utf-8");

    const config = await loadAppConfig(file, {});

    expect(config.backupRoot).toBe(path.join(tmp, "snapshots"));
    expect(config.sites).toHaveLength(1);
  });

  it("wraps unreadable files in ConfigurationError", async () => {
    await expect(loadAppConfig(path.join(tmp, "missing.json"), {})).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});
