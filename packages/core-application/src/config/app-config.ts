import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";
import type { SiteLabel, SiteSpec } from "@sitevault/core-domain";

import { ConfigurationError, describeError } from "../application/errors";
import { formatIssues, siteRegistrySchema } from "./site-registry";

export const DEFAULT_CONFIG_FILE = "sitevault.config.json";

export const DEFAULT_EXCLUDE_PATTERNS = [
  "*.log",
  "cache/",
  "tmp/",
  ".git/",
  "node_modules/",
  "*_backup.sql",
] as const;

export type MirrorKind = "rsync" | "node";

export interface AppConfig {
  readonly backupRoot: string;
  readonly sitesRoot: string;
  readonly runLogPath: string;
  readonly excludePatterns: readonly string[];
  readonly mysqlBinPath?: string;
  readonly gitBinary: string;
  readonly rsyncBinary: string;
  readonly mirror: MirrorKind;
  /** Mirror backups with deletion so removed source files are committed as removals. */
  readonly captureDeletions: boolean;
  readonly commitIdentity?: { readonly name: string; readonly email: string };
  readonly sites: readonly SiteSpec[];
}

const appConfigSchema = z.object({
  backupRoot: z.string().min(1).default("backups"),
  sitesRoot: z.string().min(1).optional(),
  runLogPath: z.string().min(1).default("backup_log.md"),
  excludePatterns: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDE_PATTERNS]),
  mysqlBinPath: z.string().min(1).optional(),
  gitBinary: z.string().min(1).default("git"),
  rsyncBinary: z.string().min(1).default("rsync"),
  mirror: z.enum(["rsync", "node"]).default("rsync"),
  captureDeletions: z.boolean().default(false),
  commitIdentity: z.object({ name: z.string().min(1), email: z.string().min(1) }).optional(),
  sites: siteRegistrySchema,
});

export type ParseConfigOptions = {
  /** Directory relative paths in the file are resolved against. */
  baseDir: string;
  env?: Record<string, string | undefined>;
};

/**
 * Validates a raw config object and resolves its paths. The returned value is
 * frozen: it is built once per process and handed to every service.
 */
export function parseAppConfig(raw: unknown, options: ParseConfigOptions): AppConfig {
  const result = appConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`invalid configuration: ${issues.join("; ")}`, issues);
  }

  const data = result.data;
  const env = options.env ?? {};
  const resolve = (p: string) => path.resolve(options.baseDir, p);
  const sitesRoot = env.SITES_ROOT ? resolve(env.SITES_ROOT) : resolve(data.sitesRoot ?? ".");

  return Object.freeze({
    backupRoot: resolve(data.backupRoot),
    sitesRoot,
    runLogPath: resolve(data.runLogPath),
    excludePatterns: Object.freeze([...data.excludePatterns]),
    mysqlBinPath: data.mysqlBinPath ? resolve(data.mysqlBinPath) : undefined,
    gitBinary: data.gitBinary,
    rsyncBinary: data.rsyncBinary,
    mirror: data.mirror,
    captureDeletions: data.captureDeletions,
    commitIdentity: data.commitIdentity ? Object.freeze({ ...data.commitIdentity }) : undefined,
    sites: Object.freeze(data.sites.map((s) => Object.freeze({ ...s }))),
  });
}

export async function loadAppConfig(
  filePath: string,
  env: Record<string, string | undefined> = process.env
): Promise<AppConfig> {
  const abs = path.resolve(filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(abs, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`cannot read config file ${abs}: ${describeError(err)}`, [], err);
  }

  return parseAppConfig(raw, { baseDir: path.dirname(abs), env });
}

export function findSite(config: AppConfig, label: SiteLabel): SiteSpec {
  const site = config.sites.find((s) => s.outputLabel === label);
  if (!site) {
    const known = config.sites.map((s) => s.outputLabel).join(", ") || "none";
    throw new ConfigurationError(`site '${label}' not found in configuration (available: ${known})`);
  }
  return site;
}

export function siteSourcePath(config: AppConfig, site: SiteSpec): string {
  return path.resolve(config.sitesRoot, site.sourcePath);
}

export function siteRepositoryPath(config: AppConfig, site: SiteSpec): string {
  return path.join(config.backupRoot, site.outputLabel);
}
